import type {
  BrokerEndpoint,
  CompressionSetting,
  ConnectError,
  ConnectionState,
  Logger,
  QoS,
  QueueOverflow,
  SubscriptionError,
  Topic,
  Transport,
} from '@tagstream/core';
import type { BackoffOptions } from './backoff.js';

/** `applied` when the broker confirmed the change, `deferred` when it waits for the next connection. */
export type SubscriptionOutcome = 'applied' | 'deferred';

/** One transition of the connection state machine. */
export interface StateChange {
  from: ConnectionState;
  to: ConnectionState;
  /** Set when entering `backoff`: how long until the next attempt. */
  delayMs?: number;
  /** Set when entering `backoff` after a failed attempt. */
  error?: ConnectError;
}

/**
 * Configuration options for {@link ReconnectSupervisor}.
 */
export interface ReconnectSupervisorOptions {
  endpoint: BrokerEndpoint;

  /**
   * How long a single connection attempt may take.
   * @default 10000
   */
  connectTimeoutMs?: number;

  /** Reconnect delays. See {@link BackoffPolicy}. */
  backoff?: BackoffOptions;

  /**
   * Attempts per topic when replaying subscriptions after a reconnect.
   * A topic still failing after this many attempts is reported as `degraded`.
   * @default 3
   */
  replayAttempts?: number;

  /**
   * Pause between attempts for the same topic during replay.
   * @default 250
   */
  replayRetryDelayMs?: number;

  /**
   * Subscribe requests in flight at once during replay.
   * @default 4
   */
  replayConcurrency?: number;

  logger?: Logger;
}

/**
 * Event definitions for {@link ReconnectSupervisor}.
 */
export interface ReconnectSupervisorEvents {
  /** Emitted on every state transition, including each entry into `backoff`. */
  state: (change: StateChange) => void;

  /** Emitted when a connection attempt fails. */
  connectError: (error: ConnectError) => void;

  /** Emitted when a topic could not be (un)subscribed during replay after every attempt. */
  degraded: (topic: Topic, error: SubscriptionError) => void;
}

/**
 * Configuration options for {@link TopicSession}.
 */
export interface TopicSessionOptions extends Omit<ReconnectSupervisorOptions, 'endpoint'> {
  /** Broker to connect to; unset fields use the defaults of `resolveEndpoint`. */
  endpoint?: Partial<BrokerEndpoint>;

  /** Transport to use instead of an {@link MqttTransport}. */
  transport?: Transport;

  /**
   * QoS for the default MQTT transport. Ignored when `transport` is given.
   * @default 0
   */
  qos?: QoS;

  /**
   * Inbound messages buffered for consumers before the oldest is dropped.
   * @default 1000
   */
  queueCapacity?: number;

  /**
   * Payload compression, applied to publishes and reversed on receipt.
   * Every peer on the topic must use the same setting.
   *
   *  - false (default)           → disabled
   *  - true                      → snappy
   *  - { codec: 'gzip'|'snappy'} → explicit object form
   */
  compression?: CompressionSetting;

  /**
   * Namespace segment used by {@link TopicSession.hashtagTopic}.
   * @default 'twitter'
   */
  topicNamespace?: string;

  /**
   * Start connecting from the constructor.
   * @default true
   */
  autoStart?: boolean;
}

/**
 * Event definitions for {@link TopicSession}.
 */
export interface TopicSessionEvents extends ReconnectSupervisorEvents {
  /** Emitted when the delivery queue drops its oldest message. */
  overflow: (overflow: QueueOverflow) => void;
}

export interface SessionStats {
  state: ConnectionState;
  /** Messages waiting in the delivery queue. */
  queued: number;
  /** Messages dropped by the delivery queue since the session started. */
  dropped: number;
  activeTopics: number;
}
