export * as Adapters from './adapters/index.ts'
export * from './config/queue.config.ts'
export * from './domain/message.domain.ts'
export * from './domain/queue.errors.ts'
export * as Ports from './ports/index.ts'
export * from './services/message-queue.service.ts'
