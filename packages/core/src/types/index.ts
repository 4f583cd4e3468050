export type { Result } from './result.js';
export { ok, err } from './result.js';
export type { Topic, InboundMessage, OutboundRequest, ConnectionState } from './message.js';
export { isValidTopic } from './message.js';
