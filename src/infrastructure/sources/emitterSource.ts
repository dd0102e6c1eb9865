/**
 * Infrastructure Layer - EventEmitter Source
 *
 * Adapts a Node.js EventEmitter to `ChannelSource`. Only the event names
 * passed in are treated as channels; a listener receives the first
 * argument of each `emit`.
 */

import type { EventEmitter } from 'node:events'
import type {
  ChannelHandler,
  ChannelMap,
  ChannelName,
  ChannelSource,
  Subscription
} from '../../core/ports/channelSource.js'

export class EmitterChannelSource<TChannels extends ChannelMap> implements ChannelSource<TChannels> {
  declare readonly channelTypes?: TChannels
  readonly #emitter: EventEmitter
  readonly #channels: ReadonlySet<string>

  constructor(emitter: EventEmitter, channels: readonly ChannelName<TChannels>[]) {
    this.#emitter = emitter
    this.#channels = new Set(channels)
  }

  hasChannel(channel: string): channel is ChannelName<TChannels> {
    return this.#channels.has(channel)
  }

  subscribe<K extends ChannelName<TChannels>>(
    channel: K,
    handler: ChannelHandler<TChannels, K>
  ): Subscription {
    // Own listener per subscription so off() removes exactly this one.
    const listener = (notification: TChannels[K]) => handler(notification)
    this.#emitter.on(channel, listener)

    let released = false
    return {
      unsubscribe: () => {
        if (released) return
        released = true
        this.#emitter.off(channel, listener)
      }
    }
  }
}

export function fromEventEmitter<TChannels extends ChannelMap>(
  emitter: EventEmitter,
  channels: readonly ChannelName<TChannels>[]
): EmitterChannelSource<TChannels> {
  return new EmitterChannelSource<TChannels>(emitter, channels)
}
