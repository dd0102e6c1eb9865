import { readFileSync } from 'node:fs'
import { isAbsolute, resolve } from 'node:path'
import { z } from 'zod'
import { DEFAULT_CAPACITY } from '../core/options.js'

export type CaptureConfig = {
  channel: string
  capacity: number
  tail: number
}

export const defaultCaptureConfig: CaptureConfig = {
  channel: 'line',
  capacity: DEFAULT_CAPACITY,
  tail: 20
}

const CaptureConfigFileSchema = z.object({
  channel: z.string().min(1).optional(),
  capacity: z.number().int().positive().optional(),
  tail: z.number().int().nonnegative().optional(),
}).strict()

const EnvSchema = z.object({
  EVENT_CAPTURE_CAPACITY: z.coerce.number().int().positive().optional(),
  EVENT_CAPTURE_TAIL: z.coerce.number().int().nonnegative().optional(),
})

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')
}

function readConfigFile(configPath: string): unknown {
  let raw = ''
  try {
    raw = readFileSync(configPath, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`config file is unreadable: ${configPath} (${reason})`)
  }
  try {
    const parsed: unknown = JSON.parse(raw)
    return parsed
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`config file (${configPath}) is not valid JSON: ${reason}`)
  }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}

/**
 * Resolve CLI configuration.
 *
 * Precedence, lowest first:
 * 1. built-in defaults
 * 2. JSON file at `configPath` (relative paths resolve against `baseDir`)
 * 3. `EVENT_CAPTURE_CAPACITY` / `EVENT_CAPTURE_TAIL`
 */
export function loadCaptureConfig(opts: {
  env: NodeJS.ProcessEnv
  configPath?: string
  baseDir?: string
}): CaptureConfig {
  const config: CaptureConfig = { ...defaultCaptureConfig }

  if (opts.configPath) {
    const baseDir = opts.baseDir ?? process.cwd()
    const configPath = isAbsolute(opts.configPath) ? opts.configPath : resolve(baseDir, opts.configPath)
    const parsed = CaptureConfigFileSchema.safeParse(readConfigFile(configPath))
    if (!parsed.success) {
      throw new Error(`config file (${configPath}) validation failed: ${formatIssues(parsed.error)}`)
    }
    if (parsed.data.channel !== undefined) config.channel = parsed.data.channel
    if (parsed.data.capacity !== undefined) config.capacity = parsed.data.capacity
    if (parsed.data.tail !== undefined) config.tail = parsed.data.tail
  }

  const env = EnvSchema.safeParse({
    EVENT_CAPTURE_CAPACITY: emptyToUndefined(opts.env.EVENT_CAPTURE_CAPACITY),
    EVENT_CAPTURE_TAIL: emptyToUndefined(opts.env.EVENT_CAPTURE_TAIL),
  })
  if (!env.success) {
    throw new Error(`environment validation failed: ${formatIssues(env.error)}`)
  }
  if (env.data.EVENT_CAPTURE_CAPACITY !== undefined) config.capacity = env.data.EVENT_CAPTURE_CAPACITY
  if (env.data.EVENT_CAPTURE_TAIL !== undefined) config.tail = env.data.EVENT_CAPTURE_TAIL

  return config
}
