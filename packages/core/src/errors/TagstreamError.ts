import type { InboundMessage, Topic } from '../types/index.js';

export type TagstreamErrorCode =
  | 'CONNECT_FAILED'
  | 'SEND_FAILED'
  | 'SUBSCRIPTION_FAILED'
  | 'NOT_CONNECTED'
  | 'QUEUE_OVERFLOW'
  | 'INVALID_TOPIC'
  | 'INVALID_PAYLOAD';

/**
 * Base class for every failure this library reports.
 *
 * `code` is the discriminant; subclasses add a `reason` where a failure has
 * several distinct causes.
 */
export abstract class TagstreamError extends Error {
  abstract readonly code: TagstreamErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ConnectFailure = 'timeout' | 'refused' | 'unreachable';

export class ConnectError extends TagstreamError {
  readonly code = 'CONNECT_FAILED';

  constructor(
    public readonly reason: ConnectFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type SendFailure = 'not-connected' | 'payload-too-large';

export class SendError extends TagstreamError {
  readonly code = 'SEND_FAILED';

  constructor(
    public readonly reason: SendFailure,
    message: string,
  ) {
    super(message);
  }
}

export type SubscriptionFailure = 'not-connected' | 'rejected' | 'transport';

export class SubscriptionError extends TagstreamError {
  readonly code = 'SUBSCRIPTION_FAILED';

  constructor(
    public readonly reason: SubscriptionFailure,
    public readonly topic: Topic,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Returned by `publish()` when the session is not in the `connected` state. */
export class NotConnectedError extends TagstreamError {
  readonly code = 'NOT_CONNECTED';

  constructor(message = 'Session is not connected') {
    super(message);
  }
}

/**
 * Describes a message the delivery queue discarded to make room.
 * Never thrown; carried by the overflow notification.
 */
export class QueueOverflow extends TagstreamError {
  readonly code = 'QUEUE_OVERFLOW';

  constructor(
    public readonly droppedMessage: InboundMessage,
    public readonly totalDropped: number,
  ) {
    super(`Delivery queue full; dropped message #${droppedMessage.sequence} on ${droppedMessage.topic}`);
  }
}

export class InvalidTopicError extends TagstreamError {
  readonly code = 'INVALID_TOPIC';

  constructor(public readonly input: string) {
    super(`Invalid topic: ${JSON.stringify(input)}`);
  }
}

export class InvalidPayloadError extends TagstreamError {
  readonly code = 'INVALID_PAYLOAD';
}

export type PublishError = NotConnectedError | SendError | InvalidTopicError;
