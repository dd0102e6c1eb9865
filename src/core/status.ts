import type { EventBufferStatus } from './eventBuffer.js'

const STATE_LABELS: Record<EventBufferStatus['state'], string> = {
  active: 'running',
  paused: 'stopped',
  closed: 'closed'
}

/**
 * Human-readable status block, one field per line.
 */
export function describeStatus(status: EventBufferStatus): string {
  const lines = [
    `Listening to: ${status.channel}${status.label ? ` of ${status.label}` : ''}`
  ]
  if (status.hasTransform) {
    lines.push(`Transformed by: ${status.transformName ?? 'anonymous function'}`)
  }
  lines.push(`Status: ${STATE_LABELS[status.state]}`)
  lines.push(`Events: ${status.count}/${status.capacity}`)
  return lines.join('\n')
}
