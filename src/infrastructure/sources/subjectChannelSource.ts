/**
 * Infrastructure Layer - Subject Channel Source
 *
 * In-process notifier with a fixed set of named channels. Notifications
 * travel through a single RxJS Subject as `{ channel, value }` envelopes;
 * the port contract stays the framework-agnostic `ChannelSource`.
 */

import { Subject, filter } from 'rxjs'
import type {
  ChannelHandler,
  ChannelMap,
  ChannelName,
  ChannelSource,
  Subscription
} from '../../core/ports/channelSource.js'

type Envelope = { channel: string; value: unknown }

export class SubjectChannelSource<TChannels extends ChannelMap> implements ChannelSource<TChannels> {
  declare readonly channelTypes?: TChannels
  readonly #subject = new Subject<Envelope>()
  readonly #channels: ReadonlySet<string>

  constructor(channels: readonly ChannelName<TChannels>[]) {
    this.#channels = new Set(channels)
  }

  get channels(): string[] {
    return [...this.#channels]
  }

  hasChannel(channel: string): channel is ChannelName<TChannels> {
    return this.#channels.has(channel)
  }

  subscribe<K extends ChannelName<TChannels>>(
    channel: K,
    handler: ChannelHandler<TChannels, K>
  ): Subscription {
    const onChannel = (e: Envelope): e is { channel: K; value: TChannels[K] } => e.channel === channel

    return this.#subject.pipe(filter(onChannel)).subscribe((e) => {
      try {
        handler(e.value)
      } catch (err) {
        console.error(`[SubjectChannelSource] subscriber error on "${channel}":`, err)
      }
    })
  }

  /**
   * Deliver `value` to every current subscriber of `channel`, synchronously
   * and in subscription order.
   */
  emit<K extends ChannelName<TChannels>>(channel: K, value: TChannels[K]): void {
    if (!this.#channels.has(channel)) {
      throw new Error(`unknown channel "${channel}"`)
    }
    this.#subject.next({ channel, value })
  }

  /**
   * End the stream; existing subscriptions are released and later `emit`
   * calls are ignored.
   */
  complete(): void {
    this.#subject.complete()
  }
}

export function createSubjectChannelSource<TChannels extends ChannelMap>(
  channels: readonly ChannelName<TChannels>[]
): SubjectChannelSource<TChannels> {
  return new SubjectChannelSource<TChannels>(channels)
}
