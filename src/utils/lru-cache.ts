/**
 * Fixed-capacity cache with least-recently-used eviction.
 *
 * A Map indexes keys to entries of a doubly linked recency chain bounded by
 * two sentinel nodes. `head.next` is the most recently used entry and
 * `tail.prev` the least recently used one, so lookup, insertion, update and
 * eviction are all O(1).
 */
import { config } from "./config";
import { DEFAULT_CACHE_NAME } from "./constants";
import {
  InvalidArgumentError,
  InvalidStateError,
  KeyNotFoundError,
} from "./errors";
import { formatValue } from "./format";
import { logger, prefixedLogger } from "./logger";

// Sentinels are bare nodes; their links start out pointing at themselves
class ListNode<K, V> {
  prev: ListNode<K, V> = this;
  next: ListNode<K, V> = this;
}

class Entry<K, V> extends ListNode<K, V> {
  constructor(
    readonly key: K,
    public value: V
  ) {
    super();
  }
}

export type LRUCacheOptions<K, V> = {
  // Decides whether `put` on an existing key writes the new value
  valueEquals?: (a: V, b: V) => boolean;
  // Runs once per evicted entry after the evicting `put` has completed
  onEvict?: (key: K, value: V) => void;
  name?: string;
  // Defaults to whether the shared logger runs at debug level
  debug?: boolean;
};

const isPositiveInteger = (value: number) =>
  Number.isInteger(value) && value > 0;

export class LRUCache<K, V> {
  private readonly index = new Map<K, Entry<K, V>>();
  private readonly head = new ListNode<K, V>();
  private readonly tail = new ListNode<K, V>();
  private readonly valueEquals: (a: V, b: V) => boolean;
  private readonly options: LRUCacheOptions<K, V>;
  private readonly debug: boolean;
  private readonly log: ReturnType<typeof prefixedLogger>;
  private _capacity: number;
  private _count = 0;

  constructor(
    capacity: number = config.defaultCapacity,
    options: LRUCacheOptions<K, V> = {}
  ) {
    if (!isPositiveInteger(capacity)) {
      throw new InvalidArgumentError(
        "capacity",
        capacity,
        "capacity must be a positive integer"
      );
    }
    this._capacity = capacity;
    this.options = options;
    this.valueEquals = options.valueEquals ?? Object.is;
    this.debug = options.debug ?? logger.isDebugEnabled();
    this.log = prefixedLogger(options.name ?? DEFAULT_CACHE_NAME);

    this.head.next = this.tail;
    this.tail.prev = this.head;

    if (this.debug) {
      this.log.debug(`Created with capacity ${capacity}`);
    }
  }

  get capacity(): number {
    return this._capacity;
  }

  get count(): number {
    return this._count;
  }

  get isEmpty(): boolean {
    return this._count === 0;
  }

  get isFull(): boolean {
    return this._count === this._capacity;
  }

  /**
   * Key of the most recently used entry. Reading it does not touch the entry.
   */
  get mru(): K {
    return this.entryAt(this.head.next, "MRU").key;
  }

  /**
   * Key of the least recently used entry, the next one to be evicted.
   * Reading it does not touch the entry.
   */
  get lru(): K {
    return this.entryAt(this.tail.prev, "LRU").key;
  }

  put(key: K, value: V): void {
    const existing = this.index.get(key);
    if (existing) {
      if (!this.valueEquals(existing.value, value)) {
        existing.value = value;
      }
      this.moveToHead(existing);
      return;
    }

    const evicted = this.isFull ? this.removeLRU() : undefined;

    const entry = new Entry(key, value);
    this.index.set(key, entry);
    this.addNode(entry);
    this._count++;

    if (evicted) {
      this.options.onEvict?.(evicted.key, evicted.value);
    }
  }

  /**
   * Returns the cached value and marks it most recently used.
   * Throws `KeyNotFoundError` on a miss; use `tryGet` to get `undefined`.
   */
  get(key: K): V {
    const entry = this.index.get(key);
    if (!entry) {
      throw new KeyNotFoundError(key);
    }
    this.moveToHead(entry);
    return entry.value;
  }

  tryGet(key: K): V | undefined {
    const entry = this.index.get(key);
    if (!entry) {
      return undefined;
    }
    this.moveToHead(entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.index.has(key);
  }

  increaseSize(newCapacity: number): void {
    if (!Number.isInteger(newCapacity) || newCapacity <= this._capacity) {
      throw new InvalidArgumentError(
        "newCapacity",
        newCapacity,
        `capacity must be an integer greater than ${this._capacity}`
      );
    }
    if (this.debug) {
      this.log.debug(
        `Capacity increased ${this._capacity} -> ${newCapacity}`
      );
    }
    this._capacity = newCapacity;
  }

  *keys(): IterableIterator<K> {
    for (const entry of this.walk()) {
      yield entry.key;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const entry of this.walk()) {
      yield [entry.key, entry.value];
    }
  }

  // MRU to LRU
  private *walk(): Generator<Entry<K, V>> {
    let node = this.head.next;
    while (node instanceof Entry) {
      yield node;
      node = node.next;
    }
  }

  private entryAt(node: ListNode<K, V>, label: string): Entry<K, V> {
    if (!(node instanceof Entry)) {
      throw new InvalidStateError(`Cache is empty, there is no ${label} entry`);
    }
    return node;
  }

  private moveToHead(entry: Entry<K, V>): void {
    this.removeNode(entry);
    this.addNode(entry);
  }

  private removeNode(node: ListNode<K, V>): void {
    const { prev, next } = node;
    prev.next = next;
    next.prev = prev;
  }

  // Inserts right after head
  private addNode(node: ListNode<K, V>): void {
    node.next = this.head.next;
    node.next.prev = node;
    this.head.next = node;
    node.prev = this.head;
  }

  private removeLRU(): Entry<K, V> {
    const victim = this.entryAt(this.tail.prev, "LRU");
    this.index.delete(victim.key);
    this.removeNode(victim);
    this._count--;
    if (this.debug) {
      this.log.debug(
        `Evicted ${formatValue(victim.key)} (capacity ${this._capacity})`
      );
    }
    return victim;
  }
}
