import { endpointFromEnv, resolveEndpoint } from '@tagstream/core';

test('resolveEndpoint fills in the public broker defaults', () => {
  const endpoint = resolveEndpoint();

  expect(endpoint).toMatchObject({
    host: 'test.mosquitto.org',
    port: 1883,
    protocol: 'mqtt',
    keepaliveSec: 60,
  });
  expect(endpoint.clientId).toMatch(/^tagstream-\d+$/);
});

test('resolveEndpoint keeps explicit values', () => {
  expect(resolveEndpoint({ host: 'localhost', port: 8883, protocol: 'mqtts', keepaliveSec: 0, clientId: 'me' })).toEqual({
    host: 'localhost',
    port: 8883,
    protocol: 'mqtts',
    keepaliveSec: 0,
    clientId: 'me',
  });
});

test('resolveEndpoint rejects invalid settings', () => {
  expect(() => resolveEndpoint({ host: ' ' })).toThrow('Invalid broker host');
  expect(() => resolveEndpoint({ port: 70_000 })).toThrow('Invalid broker port: 70000');
  expect(() => resolveEndpoint({ port: Number('abc') })).toThrow(TypeError);
  expect(() => resolveEndpoint({ keepaliveSec: -1 })).toThrow('Invalid keep-alive interval: -1');
});

test('endpointFromEnv reads only the variables that are set', () => {
  expect(endpointFromEnv({
    TAGSTREAM_BROKER_HOST: 'mqtt.local',
    TAGSTREAM_BROKER_PORT: '1999',
    TAGSTREAM_KEEPALIVE: '15',
  })).toEqual({ host: 'mqtt.local', port: 1999, keepaliveSec: 15 });
  expect(endpointFromEnv({})).toEqual({});
});

test('endpointFromEnv rejects an unknown protocol', () => {
  expect(() => endpointFromEnv({ TAGSTREAM_BROKER_PROTOCOL: 'ws' })).toThrow('Invalid broker protocol: ws');
});
