/**
 * Core Layer - Ports Index
 */

export * from './channelSource.js'
