export { Deque } from './Deque.js';
export { TypedEventEmitter } from './TypedEventEmitter.js';
