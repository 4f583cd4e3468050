export type { PopResult, DeliveryQueueEvents, DeliveryQueueOptions } from './DeliveryQueue.js';
export { DeliveryQueue, DEFAULT_QUEUE_CAPACITY } from './DeliveryQueue.js';
