import { z } from 'zod'
import { EventBufferError, type TransformError } from './errors.js'

export const DEFAULT_CAPACITY = 1_000_000

export type Transform<Raw, Stored> = (notification: Raw) => Stored

export type EventBufferOptions<Raw, Stored> = {
  /** Maximum number of retained values. Defaults to 1,000,000. */
  capacity?: number
  transform?: Transform<Raw, Stored>
  /** Called for every transform failure. Without it failures are logged. */
  onError?: (error: TransformError) => void
  /** Free-form name of the observed source, shown in status output. */
  label?: string
}

const CapacitySchema = z.number().int().positive()

const OptionsSchema = z.object({
  capacity: z.unknown().optional(),
  transform: z.function().optional(),
  onError: z.function().optional(),
  label: z.string().optional(),
  transformed: z.boolean().optional(),
}).passthrough()

/**
 * Options as the `EventBuffer` constructor takes them: the transform is
 * always present, `transformed: false` marks the pass-through installed
 * when the caller supplied none.
 */
export type EventBufferInit<Raw, Stored> = EventBufferOptions<Raw, Stored> & {
  transform: Transform<Raw, Stored>
  transformed?: boolean
}

export type ResolvedOptions = {
  capacity: number
  onError: ((error: TransformError) => void) | undefined
  label: string | undefined
}

/**
 * Validate construction options and fill in defaults.
 *
 * @throws EventBufferError with `INVALID_CAPACITY` or `INVALID_OPTIONS`
 */
export function resolveOptions<Raw, Stored>(
  options: EventBufferOptions<Raw, Stored> | undefined
): ResolvedOptions {
  const shape = OptionsSchema.safeParse(options ?? {})
  if (!shape.success) {
    const issue = shape.error.issues[0]
    const where = issue?.path.join('.') || 'options'
    throw new EventBufferError('INVALID_OPTIONS', `${where}: ${issue?.message ?? 'invalid value'}`)
  }

  const rawCapacity = options?.capacity ?? DEFAULT_CAPACITY
  const capacity = CapacitySchema.safeParse(rawCapacity)
  if (!capacity.success) {
    throw new EventBufferError(
      'INVALID_CAPACITY',
      `capacity must be a positive integer, got ${String(rawCapacity)}`
    )
  }

  return {
    capacity: capacity.data,
    onError: options?.onError,
    label: options?.label,
  }
}
