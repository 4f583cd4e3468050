import type { BrokerEndpoint } from '../config/index.js';
import type { ConnectError, SendError, SubscriptionError } from '../errors/index.js';
import type { InboundMessage, Result, Topic } from '../types/index.js';

/** Names one physical connection; stale once that connection is gone. */
export interface TransportHandle {
  readonly id: number;
  readonly endpoint: BrokerEndpoint;
}

export type MessageCallback = (message: InboundMessage) => void;
export type DisconnectCallback = (handle: TransportHandle, cause?: Error) => void;

/**
 * A single logical connection to a broker.
 *
 * Callbacks fire from the transport's own I/O events, never from inside a
 * call made on the transport. Exceptions thrown by callbacks are logged and
 * do not propagate into the transport.
 */
export interface Transport {
  /** Opens a connection, replacing the current one if any. */
  connect(endpoint: BrokerEndpoint, timeoutMs: number): Promise<Result<TransportHandle, ConnectError>>;

  /** Closes `handle`. Does not fire the disconnect callback. No-op for stale handles. */
  disconnect(handle: TransportHandle): Promise<void>;

  /** Admits a publish; the write itself completes asynchronously. */
  send(handle: TransportHandle, topic: Topic, payload: Uint8Array): Result<void, SendError>;

  subscribeRaw(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>>;

  unsubscribeRaw(handle: TransportHandle, topic: Topic): Promise<Result<void, SubscriptionError>>;

  /** Invoked once per inbound message on the current connection. */
  onMessage(callback: MessageCallback): void;

  /** Invoked once when the current connection drops without `disconnect()`. */
  onDisconnect(callback: DisconnectCallback): void;
}
