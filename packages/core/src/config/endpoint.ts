export type BrokerProtocol = 'mqtt' | 'mqtts';

/** Where and how to reach the broker. Not negotiated with it. */
export interface BrokerEndpoint {
  host: string;
  port: number;
  protocol: BrokerProtocol;
  /** Keep-alive interval in seconds; 0 disables it. */
  keepaliveSec: number;
  clientId: string;
}

export const DEFAULT_BROKER_HOST = 'test.mosquitto.org';
export const DEFAULT_BROKER_PORT = 1883;
export const DEFAULT_KEEPALIVE_SEC = 60;

export function defaultClientId(now: number = Date.now()): string {
  return `tagstream-${Math.floor(now / 1000)}`;
}

/**
 * Fills in defaults and validates an endpoint.
 *
 * @throws {TypeError} on an empty host, a port outside 1-65535 or a negative keep-alive.
 */
export function resolveEndpoint(partial: Partial<BrokerEndpoint> = {}): BrokerEndpoint {
  const endpoint: BrokerEndpoint = {
    host: partial.host ?? DEFAULT_BROKER_HOST,
    port: partial.port ?? DEFAULT_BROKER_PORT,
    protocol: partial.protocol ?? 'mqtt',
    keepaliveSec: partial.keepaliveSec ?? DEFAULT_KEEPALIVE_SEC,
    clientId: partial.clientId ?? defaultClientId(),
  };

  if (typeof endpoint.host !== 'string' || !endpoint.host.trim()) {
    throw new TypeError(`Invalid broker host: ${endpoint.host}`);
  }
  if (!Number.isInteger(endpoint.port) || endpoint.port < 1 || endpoint.port > 65_535) {
    throw new TypeError(`Invalid broker port: ${endpoint.port}`);
  }
  if (endpoint.protocol !== 'mqtt' && endpoint.protocol !== 'mqtts') {
    throw new TypeError(`Invalid broker protocol: ${endpoint.protocol}`);
  }
  if (!Number.isInteger(endpoint.keepaliveSec) || endpoint.keepaliveSec < 0) {
    throw new TypeError(`Invalid keep-alive interval: ${endpoint.keepaliveSec}`);
  }
  return endpoint;
}

/**
 * Reads endpoint settings from `TAGSTREAM_*` environment variables.
 * Unset variables are left out so {@link resolveEndpoint} can default them.
 */
export function endpointFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<BrokerEndpoint> {
  const partial: Partial<BrokerEndpoint> = {};
  if (env.TAGSTREAM_BROKER_HOST) partial.host = env.TAGSTREAM_BROKER_HOST;
  if (env.TAGSTREAM_BROKER_PORT) partial.port = Number(env.TAGSTREAM_BROKER_PORT);
  const protocol = env.TAGSTREAM_BROKER_PROTOCOL;
  if (protocol === 'mqtt' || protocol === 'mqtts') partial.protocol = protocol;
  else if (protocol) throw new TypeError(`Invalid broker protocol: ${protocol}`);
  if (env.TAGSTREAM_KEEPALIVE) partial.keepaliveSec = Number(env.TAGSTREAM_KEEPALIVE);
  if (env.TAGSTREAM_CLIENT_ID) partial.clientId = env.TAGSTREAM_CLIENT_ID;
  return partial;
}
