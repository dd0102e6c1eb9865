/**
 * Machine-readable error type for buffer construction failures.
 *
 * These are caller mistakes and are always thrown synchronously from the
 * constructor; a buffer that fails validation never subscribes.
 */
export class EventBufferError extends Error {
  readonly code:
    | 'INVALID_CHANNEL'
    | 'INVALID_CAPACITY'
    | 'INVALID_OPTIONS'

  constructor(
    code: EventBufferError['code'],
    message: string
  ) {
    super(message)
    this.name = 'EventBufferError'
    this.code = code
  }
}

/**
 * A transform threw while handling one notification.
 *
 * The notification is dropped and the buffer keeps running; the error is
 * reported through `EventBuffer.errors$` and the `onError` option.
 */
export class TransformError extends Error {
  readonly channel: string
  readonly notification: unknown

  constructor(channel: string, notification: unknown, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`transform failed on channel "${channel}": ${reason}`, { cause })
    this.name = 'TransformError'
    this.channel = channel
    this.notification = notification
  }
}
