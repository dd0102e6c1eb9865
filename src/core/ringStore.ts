/**
 * Bounded FIFO storage.
 *
 * Appends at the tail and evicts from the head once `capacity` is reached.
 * The newest element can also be removed from the tail (`pop`), so the
 * store works as a stack over a sliding window of the most recent values.
 *
 * Slots are allocated on demand: a store created with a capacity of one
 * million holds a small array until it actually fills up. Until the first
 * eviction the oldest element always sits in slot 0.
 */

type Slot<T> = { value: T }

export type PushResult<T> =
  | { evicted: false }
  | { evicted: true; value: T }

export class RingStore<T> {
  readonly capacity: number
  #slots: Array<Slot<T> | undefined> = []
  #start = 0
  #size = 0

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingStore capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  get size(): number {
    return this.#size
  }

  push(value: T): PushResult<T> {
    const index = this.#physical(this.#size)

    if (this.#size < this.capacity) {
      if (index === this.#slots.length) this.#slots.push({ value })
      else this.#slots[index] = { value }
      this.#size += 1
      return { evicted: false }
    }

    // Full: the tail slot is the head slot.
    const oldest = this.#slots[index]
    this.#slots[index] = { value }
    this.#start = (this.#start + 1) % this.capacity
    return oldest ? { evicted: true, value: oldest.value } : { evicted: false }
  }

  /**
   * Remove and return the newest element, or `undefined` when empty.
   */
  pop(): T | undefined {
    if (this.#size === 0) return undefined
    const index = this.#physical(this.#size - 1)
    const slot = this.#slots[index]
    this.#slots[index] = undefined
    this.#size -= 1
    return slot?.value
  }

  peekLast(): T | undefined {
    return this.at(-1)
  }

  peekFirst(): T | undefined {
    return this.at(0)
  }

  /**
   * Element at logical position `index` (oldest = 0). Negative indices
   * count back from the newest.
   */
  at(index: number): T | undefined {
    const logical = index < 0 ? this.#size + index : index
    if (!Number.isInteger(logical) || logical < 0 || logical >= this.#size) return undefined
    return this.#slots[this.#physical(logical)]?.value
  }

  /**
   * Oldest-first copy of the stored elements.
   */
  toArray(): T[] {
    const out: T[] = []
    for (let i = 0; i < this.#size; i++) {
      const slot = this.#slots[this.#physical(i)]
      if (slot) out.push(slot.value)
    }
    return out
  }

  clear(): void {
    this.#slots = []
    this.#start = 0
    this.#size = 0
  }

  #physical(logical: number): number {
    return (this.#start + logical) % this.capacity
  }
}
