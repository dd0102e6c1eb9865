/**
 * Core Layer Index
 *
 * Re-exports the buffer, its supporting types, and the port interfaces.
 */

export * from './eventBuffer.js'
export * from './errors.js'
export * from './options.js'
export * from './ringStore.js'
export * from './status.js'

// Ports
export * from './ports/index.js'
