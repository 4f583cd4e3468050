export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './topic/index.js';
export * from './registry/index.js';
export * from './delivery/index.js';
export { Deque, TypedEventEmitter } from './pipe/index.js';
export * from './transports/index.js';

export type { CompressionCodec, CompressionSetting } from './utils/compression.js';
export { compress, decompress, isCompressionEnabled } from './utils/compression.js';
export type { Logger } from './utils/logger.js';
export { createLogger, silentLogger } from './utils/logger.js';
export { dlog, isDebugEnabled } from './utils/debug.js';
