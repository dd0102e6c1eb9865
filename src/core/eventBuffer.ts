/**
 * Core Layer - Event Buffer
 *
 * Attaches to one channel of a `ChannelSource` and keeps the most recent
 * notifications (optionally transformed) in a bounded, ordered store.
 *
 * Lifecycle: `active` ⇄ `paused` via `stop()`/`start()`, and `closed` after
 * `dispose()`. The subscription stays live while paused; only storage is
 * gated. Notifications are stored in delivery order: one that arrives
 * while another is still being handled (a transform emitting on the same
 * source, say) is queued and handled once the current one is stored.
 */

import { Subject } from 'rxjs'
import { nanoid } from 'nanoid'
import type {
  ChannelMap,
  ChannelName,
  ChannelSource,
  Subscribable,
  Subscription
} from './ports/channelSource.js'
import { EventBufferError, TransformError } from './errors.js'
import {
  resolveOptions,
  type EventBufferInit,
  type EventBufferOptions,
  type Transform
} from './options.js'
import { RingStore } from './ringStore.js'

// ============================================================================
// Types
// ============================================================================

export type EventBufferState = 'active' | 'paused' | 'closed'

export type EventBufferStats = {
  /** Notifications delivered while subscribed, accepted or not. */
  received: number
  accepted: number
  /** Ignored because the buffer was paused. */
  dropped: number
  /** Transform failures. */
  failed: number
  /** Oldest values removed to stay within capacity. */
  evicted: number
}

export type EventBufferStatus = {
  id: string
  label: string | null
  channel: string
  state: EventBufferState
  running: boolean
  hasTransform: boolean
  transformName: string | null
  count: number
  capacity: number
}

// ============================================================================
// Implementation
// ============================================================================

export class EventBuffer<
  TChannels extends ChannelMap,
  K extends ChannelName<TChannels>,
  Stored = TChannels[K]
> {
  readonly id = nanoid(10)
  readonly channel: K
  readonly capacity: number
  readonly label: string | undefined

  readonly #transform: Transform<TChannels[K], Stored>
  readonly #transformed: boolean
  readonly #onError: ((error: TransformError) => void) | undefined
  readonly #store: RingStore<Stored>

  // RxJS internals, exposed as Subscribable at the boundary
  readonly #errorSubject = new Subject<TransformError>()

  #subscription: Subscription | null = null
  #pending: Array<{ notification: TChannels[K] }> = []
  #delivering = false
  #state: EventBufferState = 'active'
  #stats: EventBufferStats = { received: 0, accepted: 0, dropped: 0, failed: 0, evicted: 0 }

  /**
   * Subscribe to `channel` on `source` and start capturing immediately.
   *
   * Use `createEventBuffer` when no transform is needed.
   *
   * @throws EventBufferError `INVALID_CHANNEL` when the source does not
   *   expose `channel`, `INVALID_CAPACITY` for a capacity that is not a
   *   positive integer, `INVALID_OPTIONS` for a missing source or a
   *   transform/onError that is not a function
   */
  constructor(
    source: ChannelSource<TChannels>,
    channel: K,
    options: EventBufferInit<TChannels[K], Stored>
  ) {
    if (!source || typeof source.subscribe !== 'function' || typeof source.hasChannel !== 'function') {
      throw new EventBufferError('INVALID_OPTIONS', 'source must implement hasChannel() and subscribe()')
    }
    if (!source.hasChannel(channel)) {
      throw new EventBufferError('INVALID_CHANNEL', `source has no channel "${String(channel)}"`)
    }

    const resolved = resolveOptions(options)
    if (typeof options.transform !== 'function') {
      throw new EventBufferError('INVALID_OPTIONS', 'transform: Expected function')
    }

    this.channel = channel
    this.capacity = resolved.capacity
    this.label = resolved.label
    this.#onError = resolved.onError
    this.#transform = options.transform
    this.#transformed = options.transformed ?? true
    this.#store = new RingStore<Stored>(resolved.capacity)

    // Sources may deliver synchronously from inside subscribe(); all state
    // the handler touches is initialised above.
    this.#subscription = source.subscribe(channel, (notification) => this.#receive(notification))
  }

  // ======================== Subscribable ========================

  /**
   * Every transform failure, in delivery order. Completes on `dispose()`.
   */
  get errors$(): Subscribable<TransformError> {
    return this.#errorSubject.asObservable()
  }

  // ======================== Lifecycle ========================

  get state(): EventBufferState {
    return this.#state
  }

  isRunning(): boolean {
    return this.#state === 'active'
  }

  start(): void {
    if (this.#state === 'paused') this.#state = 'active'
  }

  stop(): void {
    if (this.#state === 'active') this.#state = 'paused'
  }

  /**
   * Release the subscription. Idempotent; stored values stay readable.
   */
  dispose(): void {
    if (this.#state === 'closed') return
    this.#state = 'closed'

    const subscription = this.#subscription
    this.#subscription = null
    try {
      subscription?.unsubscribe()
    } catch (err) {
      console.error(`[EventBuffer] ${this.id}: failed to release subscription:`, err)
    }
    this.#errorSubject.complete()
  }

  // ======================== Store access ========================

  get count(): number {
    return this.#store.size
  }

  /**
   * Most recently stored value, or `undefined` when empty.
   */
  last(): Stored | undefined {
    return this.#store.peekLast()
  }

  /**
   * Remove and return the most recently stored value. Returns `undefined`
   * and leaves the store untouched when empty.
   */
  pop(): Stored | undefined {
    return this.#store.pop()
  }

  /**
   * Oldest-first snapshot; mutating it does not affect the buffer.
   */
  all(): Stored[] {
    return this.#store.toArray()
  }

  clear(): void {
    this.#store.clear()
  }

  // ======================== Introspection ========================

  get stats(): EventBufferStats {
    return { ...this.#stats }
  }

  status(): EventBufferStatus {
    return {
      id: this.id,
      label: this.label ?? null,
      channel: this.channel,
      state: this.#state,
      running: this.isRunning(),
      hasTransform: this.#transformed,
      transformName: this.#transformed ? this.#transform.name || null : null,
      count: this.#store.size,
      capacity: this.capacity
    }
  }

  // ======================== Delivery ========================

  #receive(notification: TChannels[K]): void {
    // A source that still calls a released handler must not reach the store.
    if (this.#state === 'closed') return

    this.#pending.push({ notification })
    if (this.#delivering) return

    this.#delivering = true
    try {
      for (let next = this.#pending.shift(); next; next = this.#pending.shift()) {
        this.#accept(next.notification)
      }
    } finally {
      this.#pending = []
      this.#delivering = false
    }
  }

  #accept(notification: TChannels[K]): void {
    if (this.#state === 'closed') return

    this.#stats.received += 1
    if (this.#state === 'paused') {
      this.#stats.dropped += 1
      return
    }

    let stored: Stored
    try {
      stored = this.#transform(notification)
    } catch (err) {
      this.#stats.failed += 1
      this.#report(new TransformError(this.channel, notification, err))
      return
    }

    this.#stats.accepted += 1
    if (this.#store.push(stored).evicted) this.#stats.evicted += 1
  }

  #report(error: TransformError): void {
    this.#errorSubject.next(error)

    if (!this.#onError) {
      console.error(`[EventBuffer] ${this.id}: ${error.message}`)
      return
    }
    try {
      this.#onError(error)
    } catch (err) {
      console.error(`[EventBuffer] ${this.id}: onError handler threw:`, err)
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Attach a buffer to `channel` on `source`.
 *
 * Without a `transform` the raw notifications are stored as-is.
 */
export function createEventBuffer<
  TChannels extends ChannelMap,
  K extends ChannelName<TChannels>,
  Stored
>(
  source: ChannelSource<TChannels>,
  channel: K,
  options: EventBufferOptions<TChannels[K], Stored> & { transform: Transform<TChannels[K], Stored> }
): EventBuffer<TChannels, K, Stored>
export function createEventBuffer<
  TChannels extends ChannelMap,
  K extends ChannelName<TChannels>
>(
  source: ChannelSource<TChannels>,
  channel: K,
  options?: EventBufferOptions<TChannels[K], TChannels[K]>
): EventBuffer<TChannels, K>
export function createEventBuffer<
  TChannels extends ChannelMap,
  K extends ChannelName<TChannels>,
  Stored
>(
  source: ChannelSource<TChannels>,
  channel: K,
  options?: EventBufferOptions<TChannels[K], Stored>
): EventBuffer<TChannels, K, Stored> | EventBuffer<TChannels, K> {
  const transform = options?.transform
  if (transform !== undefined) {
    return new EventBuffer(source, channel, { ...options, transform })
  }
  return new EventBuffer(source, channel, {
    capacity: options?.capacity,
    onError: options?.onError,
    label: options?.label,
    transform: (notification: TChannels[K]) => notification,
    transformed: false
  })
}
