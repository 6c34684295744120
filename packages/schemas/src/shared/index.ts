/**
 * Shared foundational schemas
 *
 * Branded identifier types used across packages.
 */

export * from './message-id.schema.ts'
export * from './uuid7.schema.ts'
