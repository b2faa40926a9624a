import { LRUCache } from "./lru-cache";

export type MemoizeOptions<A extends unknown[]> = {
  capacity?: number;
  keyFor?: (...args: A) => string;
  name?: string;
  debug?: boolean;
};

export type Memoized<A extends unknown[], R> = ((...args: A) => R) & {
  readonly cache: LRUCache<string, R>;
};

// Values JSON would collapse into null or reject get a tag starting with
// NUL. Strings that already start with NUL get a second one.
const TAG = "\u0000";

const tagged = (_key: string, value: unknown): unknown => {
  if (value === undefined) {
    return `${TAG}undefined`;
  }
  if (typeof value === "bigint") {
    return `${TAG}bigint:${value}`;
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return `${TAG}number:${value}`;
  }
  if (typeof value === "string" && value.startsWith(TAG)) {
    return `${TAG}${value}`;
  }
  return value;
};

const defaultKeyFor = (...args: unknown[]): string =>
  JSON.stringify(args, tagged);

/**
 * Wraps `fn` with an LRU cache keyed by its arguments.
 * The default key is the arguments' JSON, with `undefined`, `NaN`,
 * `Infinity` and bigints kept distinct. Pass `keyFor` for arguments
 * JSON cannot tell apart, such as functions, symbols or class instances.
 * Results are stored exactly as returned, so a memoized async function
 * caches its promise. A call that throws stores nothing.
 */
export const memoize = <A extends unknown[], R>(
  fn: (...args: A) => R,
  options: MemoizeOptions<A> = {}
): Memoized<A, R> => {
  const cache = new LRUCache<string, R>(options.capacity, {
    name: options.name ?? (fn.name || "memoize"),
    debug: options.debug,
  });
  const keyFor = options.keyFor ?? defaultKeyFor;

  const memoized = (...args: A): R => {
    const key = keyFor(...args);
    if (cache.has(key)) {
      return cache.get(key);
    }
    const result = fn(...args);
    cache.put(key, result);
    return result;
  };

  return Object.assign(memoized, { cache });
};
