// Common constants used across the project

// Capacity used when a cache is created without one and
// LRU_CACHE_DEFAULT_CAPACITY is unset
export const DEFAULT_CAPACITY = 100;

export const DEFAULT_DEBUG_LOG_MAX_BYTES = 5 * 1024 * 1024;

export const DEFAULT_CACHE_NAME = "LRUCache";
