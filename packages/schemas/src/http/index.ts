/**
 * HTTP schemas: request bodies and the response envelope.
 */

export * from './api-response.schema.ts'
export * from './message-requests.schema.ts'
