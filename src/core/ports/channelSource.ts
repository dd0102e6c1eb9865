/**
 * Core Layer - Channel Source Port
 *
 * A notifier exposing several named channels. `TChannels` maps each
 * channel name to the notification type delivered on it. Buffers only see
 * this contract; adapters in `infrastructure/sources` back it with RxJS,
 * EventEmitter or plain streams.
 */

/**
 * Registration handle. Releasing it stops further deliveries to the
 * handler it was created for.
 */
export interface Subscription {
  unsubscribe(): void
}

/**
 * Callback-style stream. An RxJS Observable satisfies it as-is.
 */
export interface Subscribable<T> {
  subscribe(callback: (value: T) => void): Subscription
}

export type ChannelMap = Record<string, unknown>

export type ChannelName<TChannels extends ChannelMap> = keyof TChannels & string

export type ChannelHandler<TChannels extends ChannelMap, K extends ChannelName<TChannels>> = (
  notification: TChannels[K]
) => void

export interface ChannelSource<TChannels extends ChannelMap> {
  /**
   * Type-only marker that lets callers infer `TChannels` from a source
   * value. Never set at run time.
   */
  readonly channelTypes?: TChannels

  /**
   * Whether `channel` is one this source actually emits on.
   */
  hasChannel(channel: string): channel is ChannelName<TChannels>

  /**
   * Register `handler` for every notification on `channel`.
   *
   * Registering the same channel more than once is allowed; each call
   * returns its own independent subscription.
   */
  subscribe<K extends ChannelName<TChannels>>(
    channel: K,
    handler: ChannelHandler<TChannels, K>
  ): Subscription
}
