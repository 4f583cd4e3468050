import type {
  CompressionSetting,
  ConnectionState,
  InboundMessage,
  PopResult,
  PublishError,
  Result,
  Topic,
  Transport,
} from '@tagstream/core';
import type {
  SessionStats,
  SubscriptionOutcome,
  TopicSessionEvents,
  TopicSessionOptions,
} from './types.js';

import {
  DeliveryQueue,
  InvalidTopicError,
  MqttTransport,
  NotConnectedError,
  SubscriptionError,
  SubscriptionRegistry,
  TypedEventEmitter,
  compress,
  createLogger,
  decompress,
  DEFAULT_TOPIC_NAMESPACE,
  err,
  isCompressionEnabled,
  isValidTopic,
  normalizeTopic,
  ok,
  resolveEndpoint,
} from '@tagstream/core';
import { ReconnectSupervisor } from './ReconnectSupervisor.js';

const encoder = new TextEncoder();

/**
 * TopicSession is the publish/subscribe entry point.
 *
 * It keeps a connection to the broker alive (reconnecting with backoff and
 * replaying subscriptions), remembers which topics the caller wants across
 * disconnects, and hands received messages to consumers in arrival order
 * through a bounded queue.
 *
 * Connection problems never throw; watch the `state` and `connectError`
 * events. Per-call problems come back as {@link Result} values.
 *
 * @example
 * const session = new TopicSession({ endpoint: { host: 'localhost' } });
 * const topic = session.hashtagTopic('#nodejs');
 * if (topic.ok) await session.subscribe(topic.value);
 * for await (const message of session.messages()) {
 *   console.log(message.topic, decodeTweet(message.payload));
 * }
 */
export class TopicSession extends TypedEventEmitter<TopicSessionEvents> {
  private readonly transport: Transport;
  private readonly registry = new SubscriptionRegistry();
  private readonly supervisor: ReconnectSupervisor;
  private readonly queue: DeliveryQueue;
  private readonly compression: CompressionSetting;
  private readonly topicNamespace: string;

  /**
   * Creates a new instance of {@link TopicSession}.
   *
   * @param options - Session configuration; every field is optional.
   * @throws {TypeError} when the endpoint or backoff settings are invalid.
   */
  constructor(options: TopicSessionOptions = {}) {
    const logger = options.logger ?? createLogger('TopicSession');
    super(logger);

    const endpoint = resolveEndpoint(options.endpoint);
    this.compression = options.compression ?? false;
    this.topicNamespace = options.topicNamespace ?? DEFAULT_TOPIC_NAMESPACE;
    this.transport = options.transport ?? new MqttTransport({ qos: options.qos, logger: options.logger });

    this.queue = new DeliveryQueue({ capacity: options.queueCapacity, logger: options.logger });
    this.queue.on('overflow', (overflow) => {
      this.logger.debug(overflow.message);
      this.emit('overflow', overflow);
    });

    this.supervisor = new ReconnectSupervisor(this.transport, this.registry, {
      ...options,
      endpoint,
    });
    this.supervisor.on('state', (change) => this.emit('state', change));
    this.supervisor.on('connectError', (error) => this.emit('connectError', error));
    this.supervisor.on('degraded', (topic, error) => this.emit('degraded', topic, error));

    this.transport.onMessage((message) => this.accept(message));

    if (options.autoStart ?? true) this.start();
  }

  public get state(): ConnectionState {
    return this.supervisor.state;
  }

  /** Starts connecting. Called by the constructor unless `autoStart` is false. */
  public start(): void {
    this.supervisor.start();
  }

  /**
   * Closes the connection, cancels any pending reconnect and wakes every
   * pending {@link pop} with `{ done: true, reason: 'closed' }`. Final.
   */
  public async stop(): Promise<void> {
    const stopping = this.supervisor.stop();
    this.queue.close();
    await stopping;
  }

  /**
   * Normalizes hashtag input into a topic of this session's namespace.
   *
   * @example
   * session.hashtagTopic('  #Test ') // { ok: true, value: 'twitter/Test' }
   */
  public hashtagTopic(raw: string): Result<Topic, InvalidTopicError> {
    const topic = normalizeTopic(raw, this.topicNamespace);
    return topic ? ok(topic) : err(new InvalidTopicError(raw));
  }

  /**
   * Publishes once, without buffering or retry.
   *
   * Fails with `NotConnectedError` (and touches no connection) unless the
   * session is `connected`.
   */
  public publish(topic: Topic, payload: Uint8Array | string): Result<void, PublishError> {
    if (!isValidTopic(topic)) return err(new InvalidTopicError(topic));

    const handle = this.supervisor.currentHandle;
    if (!handle) return err(new NotConnectedError(`Cannot publish to ${topic} while ${this.state}`));

    const bytes = typeof payload === 'string' ? encoder.encode(payload) : payload;
    return this.transport.send(handle, topic, compress(bytes, this.compression));
  }

  /**
   * Records `topic` as wanted and, when connected, subscribes right away.
   *
   * Resolves `deferred` when offline: the subscription is made on the next
   * connection. A broker failure leaves the topic wanted, so a later replay
   * retries it.
   */
  public async subscribe(topic: Topic): Promise<Result<SubscriptionOutcome, SubscriptionError | InvalidTopicError>> {
    if (!isValidTopic(topic)) return err(new InvalidTopicError(topic));
    if (this.registry.setActive(topic)) this.logger.debug(`subscribe ${topic}`);
    return this.supervisor.applySubscribe(topic);
  }

  /** Records `topic` as no longer wanted and, when connected, unsubscribes right away. */
  public async unsubscribe(topic: Topic): Promise<Result<SubscriptionOutcome, SubscriptionError | InvalidTopicError>> {
    if (!isValidTopic(topic)) return err(new InvalidTopicError(topic));
    if (this.registry.setInactive(topic)) this.logger.debug(`unsubscribe ${topic}`);
    return this.supervisor.applyUnsubscribe(topic);
  }

  /** Topics this session wants, whether or not it is connected. */
  public activeTopics(): ReadonlySet<Topic> {
    return this.registry.activeTopics();
  }

  /** Waits for the next received message. See {@link DeliveryQueue.pop}. */
  public pop(signal?: AbortSignal): Promise<PopResult> {
    return this.queue.pop(signal);
  }

  /** Received messages in arrival order; ends when the session stops. */
  public messages(): AsyncIterable<InboundMessage> {
    return this.queue;
  }

  /**
   * Feeds messages to `handler` one at a time, in order, until the session
   * stops or `signal` aborts. A handler failure is logged and the next
   * message is delivered.
   */
  public async consume(
    handler: (message: InboundMessage) => void | Promise<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    for (;;) {
      const next = await this.queue.pop(signal);
      if (next.done) return;
      try {
        await handler(next.value);
      } catch (error) {
        this.logger.error(`Message handler failed for ${next.value.topic}:`, error);
      }
    }
  }

  public stats(): SessionStats {
    return {
      state: this.state,
      queued: this.queue.size,
      dropped: this.queue.dropped,
      activeTopics: this.registry.activeTopics().size,
    };
  }

  private accept(message: InboundMessage) {
    if (!isCompressionEnabled(this.compression)) {
      this.queue.push(message);
      return;
    }

    let payload: Uint8Array;
    try {
      payload = decompress(message.payload, this.compression);
    } catch (error) {
      this.logger.warn(`Dropping undecodable message #${message.sequence} on ${message.topic}:`, error);
      return;
    }
    this.queue.push(Object.freeze({ ...message, payload }));
  }
}
