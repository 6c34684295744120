/**
 * Queue Module Ports
 *
 * - ClockPort: current time (lease deadlines)
 * - MessageStorePort: ready queue + in-flight set storage
 */

export * from './clock.port.ts'
export * from './message-store.port.ts'
