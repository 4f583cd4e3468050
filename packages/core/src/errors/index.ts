export type {
  TagstreamErrorCode,
  ConnectFailure,
  SendFailure,
  SubscriptionFailure,
  PublishError,
} from './TagstreamError.js';
export {
  TagstreamError,
  ConnectError,
  SendError,
  SubscriptionError,
  NotConnectedError,
  QueueOverflow,
  InvalidTopicError,
  InvalidPayloadError,
} from './TagstreamError.js';
