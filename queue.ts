/**
 * A growable FIFO queue backed by a circular buffer.
 *
 * Enqueue and dequeue run in amortized O(1) time. When the buffer is full
 * it doubles in place instead of rejecting the item, so buffers of
 * operators such as `zip` can grow without a fixed upper bound.
 *
 * @example
 * ```
 * import { createQueue, enqueue, dequeue, peek } from './queue.ts';
 *
 * const pending = createQueue<string>(4);
 * enqueue(pending, 'a');
 * enqueue(pending, 'b');
 *
 * peek(pending);    // 'a' (doesn't remove)
 * dequeue(pending); // 'a' (removes and returns)
 *
 * clear(pending);   // empty the queue instantly
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Represents a circular buffer-based queue for efficient FIFO operations.
 *
 * Slots hold boxes so that `undefined` can be queued like any other value.
 *
 * @template T - The type of elements stored in the queue
 */
export interface Queue<T> {
  /** The backing array that holds queue elements */
  items: Array<{ value: T } | undefined>;
  /** Index pointing to the front element (next to dequeue) */
  head: number;
  /** Index pointing to where the next element will be added */
  tail: number;
  /** Current number of elements in the queue */
  size: number;
  /** Current capacity of the backing array */
  capacity: number;
}

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates a new empty queue.
 *
 * @param capacity - Initial size of the backing array (default: 16). The
 *   queue grows past it as needed.
 */
export function createQueue<T>(capacity: number = 16): Queue<T> {
  const initial = Math.max(1, Math.floor(capacity));
  return {
    items: new Array<{ value: T } | undefined>(initial),
    head: 0,
    tail: 0,
    size: 0,
    capacity: initial
  };
}

/////////////////////////
// Core Queue Operations //
/////////////////////////

/**
 * Adds an item to the back of the queue, doubling the buffer when it is
 * full.
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (queue.size >= queue.capacity) grow(queue);

  queue.items[queue.tail] = { value: item };
  queue.tail = (queue.tail + 1) % queue.capacity;  // wrap around using modulo
  queue.size++;
}

/**
 * Removes and returns the item at the front of the queue.
 *
 * @throws {RangeError} When the queue is empty; check {@link isEmpty} first
 *   when emptiness is expected.
 */
export function dequeue<T>(queue: Queue<T>): T {
  const slot = queue.items[queue.head];
  if (queue.size === 0 || !slot) {
    throw new RangeError('Queue underflow: cannot dequeue from an empty queue');
  }

  queue.items[queue.head] = undefined;              // help garbage collector
  queue.head = (queue.head + 1) % queue.capacity;   // wrap around
  queue.size--;

  return slot.value;
}

/**
 * Returns the item at the front without removing it, or `undefined` when
 * the queue is empty.
 */
export function peek<T>(queue: Queue<T>): T | undefined {
  return queue.size === 0 ? undefined : queue.items[queue.head]?.value;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

export function getSize<T>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Drops every item and shrinks the buffer back to `capacity`.
 */
export function clear<T>(queue: Queue<T>, capacity: number = 16): void {
  // Fast array truncation releases references for GC
  queue.items.length = 0;
  queue.capacity = Math.max(1, Math.floor(capacity));
  queue.items.length = queue.capacity;

  queue.head = 0;
  queue.tail = 0;
  queue.size = 0;
}

/**
 * Copies the queue's items, front to back, into a new array.
 */
export function toArray<T>(queue: Queue<T>): T[] {
  const result: T[] = [];
  for (let i = 0; i < queue.size; i++) {
    const slot = queue.items[(queue.head + i) % queue.capacity];
    if (slot) result.push(slot.value);
  }
  return result;
}

function grow<T>(queue: Queue<T>): void {
  const next = new Array<{ value: T } | undefined>(queue.capacity * 2);

  // Unwrap so the live items start at index 0
  for (let i = 0; i < queue.size; i++) {
    next[i] = queue.items[(queue.head + i) % queue.capacity];
  }

  queue.items = next;
  queue.head = 0;
  queue.tail = queue.size;
  queue.capacity = next.length;
}
