export { TopicSession } from './TopicSession.js';
export { ReconnectSupervisor } from './ReconnectSupervisor.js';
export type { BackoffOptions } from './backoff.js';
export { BackoffPolicy } from './backoff.js';
export type {
  SubscriptionOutcome,
  StateChange,
  ReconnectSupervisorOptions,
  ReconnectSupervisorEvents,
  TopicSessionOptions,
  TopicSessionEvents,
  SessionStats,
} from './types.js';
