/**
 * Platform Adapters: Infrastructure implementations for platform ports
 *
 * Available adapters:
 *
 * - {@link UUID}: UUID v7 generation (`uuid` library, sequential test values)
 */

export * from './uuid.adapter.ts'
