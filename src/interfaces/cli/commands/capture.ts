import type { Argv } from 'yargs'
import { z } from 'zod'
import { formatIssues, loadCaptureConfig } from '../../../config/captureConfig.js'
import { createEventBuffer } from '../../../core/eventBuffer.js'
import type { TransformError } from '../../../core/errors.js'
import type { Transform } from '../../../core/options.js'
import { describeStatus } from '../../../core/status.js'
import { createSubjectChannelSource } from '../../../infrastructure/sources/subjectChannelSource.js'
import type { IO } from '../io.js'

/**
 * Transform that parses a line as a JSON object and keeps one property.
 */
export function fieldExtractor(field: string): Transform<string, unknown> {
  return function extractField(line: string): unknown {
    const parsed: unknown = JSON.parse(line)
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('line is not a JSON object')
    }
    const property = Object.getOwnPropertyDescriptor(parsed, field)
    if (!property) throw new Error(`missing field "${field}"`)
    return property.value
  }
}

// Capacity is left to the buffer, which reports INVALID_CAPACITY itself.
const CaptureFlagsSchema = z.object({
  tail: z.number().int().nonnegative().optional(),
  pop: z.number().int().nonnegative()
})

function formatEntry(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value)
}

export function registerCaptureCommand(parser: Argv, opts: {
  baseDir: string
  env: NodeJS.ProcessEnv
  io: IO
}): Argv {
  const { baseDir, env, io } = opts

  return parser.command(
    'capture',
    'Capture stdin lines into a bounded buffer and print the most recent ones',
    (y) =>
      y
        .option('capacity', { type: 'number', describe: 'Maximum number of retained lines' })
        .option('tail', { type: 'number', describe: 'How many of the newest entries to print' })
        .option('field', { type: 'string', describe: 'Parse each line as JSON and keep only this property' })
        .option('pop', { type: 'number', default: 0, describe: 'Pop this many newest entries before printing' })
        .option('config', { type: 'string', describe: 'Path to a JSON config file' }),
    async (args) => {
      const flags = CaptureFlagsSchema.safeParse({ tail: args.tail, pop: args.pop })
      if (!flags.success) {
        throw new Error(`invalid flags: ${formatIssues(flags.error)}`)
      }
      const config = loadCaptureConfig({ env, configPath: args.config, baseDir })
      const capacity = args.capacity ?? config.capacity
      const tail = flags.data.tail ?? config.tail

      const source = createSubjectChannelSource<Record<string, string>>([config.channel])
      const onError = (error: TransformError) => io.stderr(`${error.message}\n`)
      const buffer = args.field
        ? createEventBuffer(source, config.channel, {
            capacity,
            label: 'stdin',
            onError,
            transform: fieldExtractor(args.field)
          })
        : createEventBuffer(source, config.channel, { capacity, label: 'stdin', onError })

      try {
        for await (const line of io.lines()) {
          if (line.trim() === '') continue
          source.emit(config.channel, line)
        }

        const pops = Math.min(flags.data.pop, buffer.count)
        for (let i = 0; i < pops; i++) buffer.pop()

        io.stdout(`${describeStatus(buffer.status())}\n`)
        const entries = tail > 0 ? buffer.all().slice(-tail) : []
        for (const entry of entries) io.stdout(`${formatEntry(entry)}\n`)
      } finally {
        buffer.dispose()
        source.complete()
      }
    }
  )
}
