import { describe, expect, test } from 'vitest'
import type { EventBufferStatus } from '../../src/core/eventBuffer.js'
import { describeStatus } from '../../src/core/status.js'

function statusFixture(overrides: Partial<EventBufferStatus> = {}): EventBufferStatus {
  return {
    id: 'buf_1',
    label: null,
    channel: 'line',
    state: 'active',
    running: true,
    hasTransform: false,
    transformName: null,
    count: 0,
    capacity: 10,
    ...overrides
  }
}

describe('describeStatus', () => {
  test('formats a running buffer without transform', () => {
    expect(describeStatus(statusFixture({ count: 3 }))).toBe(
      'Listening to: line\nStatus: running\nEvents: 3/10'
    )
  })

  test('includes the label and transform name when present', () => {
    const text = describeStatus(statusFixture({
      label: 'stdin',
      hasTransform: true,
      transformName: 'extractField',
      state: 'paused',
      running: false
    }))
    expect(text.split('\n')).toEqual([
      'Listening to: line of stdin',
      'Transformed by: extractField',
      'Status: stopped',
      'Events: 0/10'
    ])
  })

  test('falls back for anonymous transforms and shows closed buffers', () => {
    const text = describeStatus(statusFixture({ hasTransform: true, state: 'closed', running: false }))
    expect(text.split('\n')).toEqual([
      'Listening to: line',
      'Transformed by: anonymous function',
      'Status: closed',
      'Events: 0/10'
    ])
  })
})
