import { createInterface } from 'node:readline'

export type IO = {
  /** Stdin split into lines, yielded as they arrive. */
  lines: () => AsyncIterable<string>
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export function defaultIO(): IO {
  return {
    lines: () => createInterface({ input: process.stdin, crlfDelay: Infinity }),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text)
  }
}
