import type { TopicSessionOptions } from '@tagstream/client';
import type { QueueOverflow } from '@tagstream/core';
import { gunzipSync, gzipSync } from 'node:zlib';
import { TopicSession } from '@tagstream/client';
import { InvalidTopicError, NotConnectedError, SendError, SubscriptionError, silentLogger } from '@tagstream/core';
import { FakeTransport } from './src/FakeTransport.js';
import { spyLogger, text, waitForState } from './src/helpers.js';

const TOPIC = 'twitter/test';

function createSession(options: TopicSessionOptions = {}, transport = new FakeTransport()) {
  const session = new TopicSession({
    endpoint: { host: 'broker.test', clientId: 'test-client' },
    transport,
    autoStart: false,
    backoff: { floorMs: 5 },
    replayRetryDelayMs: 1,
    logger: silentLogger,
    ...options,
  });
  return { session, transport };
}

async function connected(options: TopicSessionOptions = {}, transport?: FakeTransport) {
  const created = createSession(options, transport);
  const ready = waitForState(created.session, 'connected');
  created.session.start();
  await ready;
  return created;
}

const sessions: TopicSession[] = [];
afterEach(async () => {
  await Promise.all(sessions.splice(0).map((session) => session.stop()));
});

test('publish while disconnected fails with NotConnected and touches no connection', () => {
  const { session, transport } = createSession();
  sessions.push(session);

  const result = session.publish(TOPIC, 'anon_user: hello');

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error).toBeInstanceOf(NotConnectedError);
    expect(result.error.code).toBe('NOT_CONNECTED');
  }
  expect(transport.calls).toEqual([]);
  expect(transport.published).toEqual([]);
});

test('publish rejects an invalid topic before any I/O', async () => {
  const { session, transport } = await connected();
  sessions.push(session);

  const result = session.publish('', 'hello');

  expect(result.ok).toBe(false);
  if (!result.ok) expect(result.error).toBeInstanceOf(InvalidTopicError);
  expect(transport.count('write')).toBe(0);
});

test('publish sends the payload once connected', async () => {
  const { session, transport } = await connected();
  sessions.push(session);

  expect(session.publish(TOPIC, 'anon_user: hello')).toEqual({ ok: true, value: undefined });

  expect(transport.published).toHaveLength(1);
  expect(transport.published[0].topic).toBe(TOPIC);
  expect(text(transport.published[0].payload)).toBe('anon_user: hello');
});

test('publish reports payloads over the transport limit', async () => {
  const { session } = await connected({}, new FakeTransport({ maxPayloadBytes: 4 }));
  sessions.push(session);

  const result = session.publish(TOPIC, 'too long');

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error).toBeInstanceOf(SendError);
    expect(result.error instanceof SendError && result.error.reason).toBe('payload-too-large');
  }
});

test('subscribe while disconnected is deferred until the connection is up', async () => {
  const { session, transport } = createSession();
  sessions.push(session);

  expect(await session.subscribe(TOPIC)).toEqual({ ok: true, value: 'deferred' });
  expect(session.activeTopics()).toEqual(new Set([TOPIC]));
  expect(transport.count('subscribe')).toBe(0);

  const ready = waitForState(session, 'connected');
  session.start();
  await ready;

  expect(transport.count('subscribe', TOPIC)).toBe(1);
});

test('subscribe while connected is applied immediately and only once', async () => {
  const { session, transport } = await connected();
  sessions.push(session);

  expect(await session.subscribe(TOPIC)).toEqual({ ok: true, value: 'applied' });
  expect(await session.subscribe(TOPIC)).toEqual({ ok: true, value: 'applied' });

  expect(transport.count('subscribe', TOPIC)).toBe(1);
});

test('a rejected subscribe is returned and the topic stays wanted', async () => {
  const { session, transport } = await connected();
  sessions.push(session);
  transport.failSubscribe(TOPIC, 1);

  const result = await session.subscribe(TOPIC);

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error).toBeInstanceOf(SubscriptionError);
    expect(result.error instanceof SubscriptionError && result.error.reason).toBe('rejected');
  }
  expect(session.activeTopics().has(TOPIC)).toBe(true);
});

test('subscribe and unsubscribe reject invalid topics', async () => {
  const { session, transport } = await connected();
  sessions.push(session);

  const subscribed = await session.subscribe('/leading');
  const unsubscribed = await session.unsubscribe('');

  expect(subscribed.ok || subscribed.error).toBeInstanceOf(InvalidTopicError);
  expect(unsubscribed.ok || unsubscribed.error).toBeInstanceOf(InvalidTopicError);
  expect(transport.count('subscribe')).toBe(0);
});

test('unsubscribe while connected removes the broker subscription', async () => {
  const { session, transport } = await connected();
  sessions.push(session);
  await session.subscribe(TOPIC);

  expect(await session.unsubscribe(TOPIC)).toEqual({ ok: true, value: 'applied' });

  expect(transport.count('unsubscribe', TOPIC)).toBe(1);
  expect(session.activeTopics().size).toBe(0);
});

test('subscribe and unsubscribe issued together leave the topic unsubscribed', async () => {
  const { session, transport } = await connected();
  sessions.push(session);

  const [subscribed, unsubscribed] = await Promise.all([session.subscribe(TOPIC), session.unsubscribe(TOPIC)]);

  expect(subscribed).toEqual({ ok: true, value: 'applied' });
  expect(unsubscribed).toEqual({ ok: true, value: 'applied' });
  expect(session.activeTopics().has(TOPIC)).toBe(false);
  expect(transport.held).toEqual(new Set());
});

test('unsubscribe and subscribe issued together leave the topic subscribed', async () => {
  const { session, transport } = await connected();
  sessions.push(session);
  await session.subscribe(TOPIC);

  const [unsubscribed, subscribed] = await Promise.all([session.unsubscribe(TOPIC), session.subscribe(TOPIC)]);

  expect(unsubscribed).toEqual({ ok: true, value: 'applied' });
  expect(subscribed).toEqual({ ok: true, value: 'applied' });
  expect(session.activeTopics().has(TOPIC)).toBe(true);
  expect(transport.held).toEqual(new Set([TOPIC]));
});

test('an unsubscribe made while the subscribe is in flight is applied after it', async () => {
  const { session, transport } = await connected();
  sessions.push(session);
  const pending: Promise<unknown>[] = [];
  transport.beforeSubscribe = (topic) => {
    transport.beforeSubscribe = undefined;
    pending.push(session.unsubscribe(topic));
  };

  await session.subscribe(TOPIC);
  await Promise.all(pending);

  expect(transport.count('subscribe', TOPIC)).toBe(1);
  expect(transport.count('unsubscribe', TOPIC)).toBe(1);
  expect(session.activeTopics().has(TOPIC)).toBe(false);
  expect(transport.held).toEqual(new Set());
});

test('received messages are popped in arrival order', async () => {
  const { session, transport } = await connected();
  sessions.push(session);

  transport.deliver('twitter/a', 'alice: one');
  transport.deliver('twitter/b', 'bob: two');
  transport.deliver('twitter/a', 'alice: three');

  const popped: string[] = [];
  for (let i = 0; i < 3; i++) {
    const next = await session.pop();
    if (!next.done) popped.push(`${next.value.topic} ${text(next.value.payload)}`);
  }
  expect(popped).toEqual(['twitter/a alice: one', 'twitter/b bob: two', 'twitter/a alice: three']);
  expect(session.stats()).toEqual({ state: 'connected', queued: 0, dropped: 0, activeTopics: 0 });
});

test('stop wakes a blocked pop', async () => {
  const { session, transport } = await connected();
  const pending = session.pop();

  await session.stop();

  expect(await pending).toEqual({ done: true, reason: 'closed' });
  expect(session.state).toBe('disconnected');
  expect(transport.count('close')).toBe(1);
});

test('consume keeps delivering after a handler failure', async () => {
  const logger = spyLogger();
  const { session, transport } = await connected({ logger });
  const seen: string[] = [];

  const consuming = session.consume((message) => {
    const body = text(message.payload);
    if (body === 'boom') throw new Error('handler failed');
    seen.push(body);
  });
  transport.deliver(TOPIC, 'boom');
  transport.deliver(TOPIC, 'fine');
  await new Promise((resolve) => setImmediate(resolve));
  await session.stop();
  await consuming;

  expect(seen).toEqual(['fine']);
  expect(logger.error).toHaveBeenCalledWith(`Message handler failed for ${TOPIC}:`, expect.any(Error));
});

test('overflow is forwarded and counted', async () => {
  const { session, transport } = await connected({ queueCapacity: 1 });
  sessions.push(session);
  const overflows: QueueOverflow[] = [];
  session.on('overflow', (overflow) => overflows.push(overflow));

  transport.deliver(TOPIC, 'first');
  transport.deliver(TOPIC, 'second');

  expect(overflows).toHaveLength(1);
  expect(text(overflows[0].droppedMessage.payload)).toBe('first');
  expect(session.stats().dropped).toBe(1);
  expect(session.stats().queued).toBe(1);
});

test('gzip compression applies to published and received payloads', async () => {
  const { session, transport } = await connected({ compression: { codec: 'gzip' } });
  sessions.push(session);

  session.publish(TOPIC, 'alice: hello');
  expect(gunzipSync(transport.published[0].payload).toString('utf8')).toBe('alice: hello');

  transport.deliver(TOPIC, new Uint8Array(gzipSync('bob: hi')));
  const next = await session.pop();
  expect(next.done || text(next.value.payload)).toBe('bob: hi');
});

test('payloads that fail to decompress are dropped', async () => {
  const { session, transport } = await connected({ compression: { codec: 'gzip' } });
  sessions.push(session);

  transport.deliver(TOPIC, 'not gzip');

  expect(session.stats().queued).toBe(0);
});

test('hashtagTopic normalizes into the session namespace', () => {
  const { session } = createSession({ topicNamespace: 'tags' });
  sessions.push(session);

  expect(session.hashtagTopic('  #Test ')).toEqual({ ok: true, value: 'tags/Test' });
  const empty = session.hashtagTopic('#');
  expect(empty.ok || empty.error).toBeInstanceOf(InvalidTopicError);
});

test('connection failures surface as events, never as exceptions', async () => {
  const transport = new FakeTransport();
  transport.failConnects(1, 'timeout');
  const { session } = createSession({}, transport);
  sessions.push(session);
  const reasons: string[] = [];
  session.on('connectError', (error) => reasons.push(error.reason));

  const ready = waitForState(session, 'connected');
  session.start();
  await ready;

  expect(reasons).toEqual(['timeout']);
});
