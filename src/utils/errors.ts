import { formatValue } from "./format";

export type CacheErrorCode =
  | "INVALID_ARGUMENT"
  | "KEY_NOT_FOUND"
  | "INVALID_STATE";

/**
 * Base class for every error the cache throws.
 * Switch on `code` or use `instanceof` on the subclasses.
 */
export class CacheError extends Error {
  readonly code: CacheErrorCode;

  constructor(code: CacheErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A capacity argument was rejected: not a positive integer at
 * construction, or not strictly greater than the current capacity.
 */
export class InvalidArgumentError extends CacheError {
  readonly argument: string;
  readonly value: unknown;

  constructor(argument: string, value: unknown, reason: string) {
    super(
      "INVALID_ARGUMENT",
      `Invalid ${argument} (${formatValue(value)}): ${reason}`
    );
    this.argument = argument;
    this.value = value;
  }
}

/**
 * Raised by `get` for a key that is not cached.
 * Callers treating a miss as control flow can read `key` back.
 */
export class KeyNotFoundError<K = unknown> extends CacheError {
  readonly key: K;

  constructor(key: K) {
    super("KEY_NOT_FOUND", `Key not found: ${formatValue(key)}`);
    this.key = key;
  }
}

export class InvalidStateError extends CacheError {
  constructor(message: string) {
    super("INVALID_STATE", message);
  }
}
