export type { SubscriptionState } from './SubscriptionRegistry.js';
export { SubscriptionRegistry } from './SubscriptionRegistry.js';
