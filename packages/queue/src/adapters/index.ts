/**
 * Adapter exports for the queue module
 */

export * from './clock.adapter.ts'
export * from './message-store.adapter.ts'
