export {
  ConversionError,
  createAbortError,
  isAbortError,
  type ConversionErrorCategory,
} from './errors/conversion-error';
export { ConcurrentPool } from './utils/concurrent-pool';
export { fingerprint } from './utils/fingerprint';
export { KeyedMemo } from './utils/keyed-memo';
export { LruCache } from './utils/lru-cache';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  OPERATION_TIMEOUT,
  TimeoutError,
  resolveOperationTimeout,
  withTimeout,
} from './utils/timeout';
