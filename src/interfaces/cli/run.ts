import yargs from 'yargs'
import type { IO } from './io.js'
import { registerCaptureCommand } from './commands/capture.js'

/**
 * CLI adapter: parse commands → drive an event buffer
 *
 * Commands:
 * - capture [--capacity N] [--tail K] [--field NAME] [--pop N] [--config PATH]
 */
export async function runCli(opts: {
  argv: string[]
  baseDir: string
  env: NodeJS.ProcessEnv
  io: IO
}): Promise<number> {
  const { argv, baseDir, env, io } = opts

  const parser = registerCaptureCommand(yargs(argv).scriptName('event-capture'), { baseDir, env, io })
    .demandCommand(1, 'Specify a command, e.g. "capture"')
    .strict()
    .exitProcess(false)
    .fail(false)
    .help()

  try {
    await parser.parseAsync()
    return 0
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}
