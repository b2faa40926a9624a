export {
  type CacheConfig,
  config,
  loadConfig,
  readEnvFile,
} from "./utils/config";
export { DEFAULT_CAPACITY } from "./utils/constants";
export {
  CacheError,
  type CacheErrorCode,
  InvalidArgumentError,
  InvalidStateError,
  KeyNotFoundError,
} from "./utils/errors";
export {
  createLogger,
  type Level,
  type Logger,
  type LoggerSettings,
  logger,
  prefixedLogger,
} from "./utils/logger";
export { LRUCache, type LRUCacheOptions } from "./utils/lru-cache";
export { memoize, type Memoized, type MemoizeOptions } from "./utils/memoize";
