/**
 * A normalized routing key, e.g. `twitter/nodejs`.
 *
 * Non-empty and never starting with `/`; see {@link isValidTopic}.
 */
export type Topic = string;

/**
 * A message received from the broker.
 *
 * Created by the transport on receipt and frozen; `sequence` increases
 * monotonically per transport so consumers can detect gaps left by the
 * delivery queue dropping old entries.
 */
export interface InboundMessage {
  readonly topic: Topic;
  readonly payload: Uint8Array;
  /** Epoch milliseconds at which the transport received the message. */
  readonly receivedAt: number;
  readonly sequence: number;
}

/** A single publish, consumed synchronously by the transport. */
export interface OutboundRequest {
  readonly topic: Topic;
  readonly payload: Uint8Array;
}

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'backoff'
  | 'disconnecting';

export function isValidTopic(topic: string): topic is Topic {
  return topic.length > 0 && !topic.startsWith('/');
}
