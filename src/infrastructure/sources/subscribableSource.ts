/**
 * Infrastructure Layer - Subscribable Source
 *
 * Presents a record of streams (RxJS Observables, Subjects or anything
 * else speaking the observer protocol) as a `ChannelSource`, one channel
 * per key.
 *
 * Streams are subscribed with a full observer so that an erroring stream
 * ends its channel with a log line instead of an unhandled error.
 */

import type { Subscribable as ObservableLike } from 'rxjs'
import type {
  ChannelHandler,
  ChannelMap,
  ChannelName,
  ChannelSource,
  Subscription
} from '../../core/ports/channelSource.js'

export type StreamMap<TChannels extends ChannelMap> = {
  [K in keyof TChannels]: ObservableLike<TChannels[K]>
}

export class SubscribableChannelSource<TChannels extends ChannelMap> implements ChannelSource<TChannels> {
  declare readonly channelTypes?: TChannels
  readonly #streams: StreamMap<TChannels>

  constructor(streams: StreamMap<TChannels>) {
    this.#streams = streams
  }

  hasChannel(channel: string): channel is ChannelName<TChannels> {
    return Object.hasOwn(this.#streams, channel)
  }

  subscribe<K extends ChannelName<TChannels>>(
    channel: K,
    handler: ChannelHandler<TChannels, K>
  ): Subscription {
    const stream = this.#streams[channel]
    if (!stream) throw new Error(`unknown channel "${channel}"`)
    return stream.subscribe({
      next: handler,
      error: (err: unknown) => {
        console.error(`[SubscribableChannelSource] stream error on "${channel}":`, err)
      }
    })
  }
}

export function fromSubscribables<TChannels extends ChannelMap>(
  streams: StreamMap<TChannels>
): SubscribableChannelSource<TChannels> {
  return new SubscribableChannelSource(streams)
}
