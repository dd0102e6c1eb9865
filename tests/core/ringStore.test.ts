import { describe, expect, test } from 'vitest'
import { RingStore } from '../../src/core/ringStore.js'

function filled(capacity: number, values: number[]): RingStore<number> {
  const store = new RingStore<number>(capacity)
  for (const v of values) store.push(v)
  return store
}

describe('RingStore', () => {
  test('rejects capacities that are not positive integers', () => {
    expect(() => new RingStore(0)).toThrow(RangeError)
    expect(() => new RingStore(-1)).toThrow(RangeError)
    expect(() => new RingStore(1.5)).toThrow(RangeError)
  })

  test('keeps insertion order below capacity', () => {
    const store = filled(5, [1, 2, 3])
    expect(store.size).toBe(3)
    expect(store.toArray()).toEqual([1, 2, 3])
    expect(store.peekFirst()).toBe(1)
    expect(store.peekLast()).toBe(3)
  })

  test('evicts exactly the oldest element once full', () => {
    const store = filled(3, [1, 2, 3])
    expect(store.push(4)).toEqual({ evicted: true, value: 1 })
    expect(store.push(5)).toEqual({ evicted: true, value: 2 })
    expect(store.toArray()).toEqual([3, 4, 5])
    expect(store.size).toBe(3)
  })

  test('reports no eviction while there is room', () => {
    const store = new RingStore<string>(2)
    expect(store.push('a')).toEqual({ evicted: false })
    expect(store.push('b')).toEqual({ evicted: false })
    expect(store.push('c')).toEqual({ evicted: true, value: 'a' })
  })

  test('retains the last C of N values across several wraparounds', () => {
    const values = Array.from({ length: 23 }, (_, i) => i)
    const store = filled(4, values)
    expect(store.toArray()).toEqual([19, 20, 21, 22])
  })

  test('capacity of one keeps only the newest value', () => {
    const store = filled(1, [7, 8, 9])
    expect(store.toArray()).toEqual([9])
    expect(store.pop()).toBe(9)
    expect(store.size).toBe(0)
  })

  test('pop removes from the newest end, including after wraparound', () => {
    const store = filled(3, [1, 2, 3, 4, 5])
    expect(store.pop()).toBe(5)
    expect(store.pop()).toBe(4)
    expect(store.toArray()).toEqual([3])
    store.push(6)
    store.push(7)
    expect(store.toArray()).toEqual([3, 6, 7])
    store.push(8)
    expect(store.toArray()).toEqual([6, 7, 8])
  })

  test('pop on empty returns undefined and leaves the store empty', () => {
    const store = new RingStore<number>(2)
    expect(store.pop()).toBeUndefined()
    expect(store.size).toBe(0)
    expect(store.peekLast()).toBeUndefined()
  })

  test('at() supports negative indices and rejects out-of-range ones', () => {
    const store = filled(3, [1, 2, 3, 4])
    expect(store.at(0)).toBe(2)
    expect(store.at(2)).toBe(4)
    expect(store.at(-1)).toBe(4)
    expect(store.at(-3)).toBe(2)
    expect(store.at(3)).toBeUndefined()
    expect(store.at(-4)).toBeUndefined()
  })

  test('stores undefined values as real entries', () => {
    const store = new RingStore<number | undefined>(2)
    store.push(undefined)
    store.push(1)
    expect(store.size).toBe(2)
    expect(store.toArray()).toEqual([undefined, 1])
  })

  test('toArray returns a copy', () => {
    const store = filled(3, [1, 2])
    const snapshot = store.toArray()
    snapshot.push(99)
    snapshot[0] = -1
    expect(store.toArray()).toEqual([1, 2])
  })

  test('clear empties the store and it can be refilled', () => {
    const store = filled(2, [1, 2, 3])
    store.clear()
    expect(store.size).toBe(0)
    expect(store.toArray()).toEqual([])
    store.push(4)
    store.push(5)
    store.push(6)
    expect(store.toArray()).toEqual([5, 6])
  })

  test('a large capacity does not limit small workloads', () => {
    const store = filled(1_000_000, [1, 2, 3])
    expect(store.capacity).toBe(1_000_000)
    expect(store.toArray()).toEqual([1, 2, 3])
  })
})
