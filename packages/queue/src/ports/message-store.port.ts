/**
 * MessageStorePort - Queue storage abstraction
 *
 * Owns the two partitions every message lives in:
 *
 * - the **ready queue**: FIFO sequence of Ready messages
 * - the **in-flight set**: Processing messages keyed by id
 *
 * A message is in exactly one partition at any time. Every operation is atomic with respect to every other operation
 * on the same store (one mutual-exclusion domain covers both partitions), so concurrent callers observe some
 * sequential interleaving of calls.
 *
 * Used by: `MessageQueue` service
 */

import type * as Chunk from 'effect/Chunk'
import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'

import type { MessageId } from '@fifomq/schemas/shared'

import type { QueueMessage } from '../domain/message.domain.ts'

/**
 * StoreError - Storage operation failure
 *
 * The single failure kind of the store. The in-memory adapter never produces it; a persistent backend would surface
 * I/O failures here.
 */
export class StoreError extends Schema.TaggedError<StoreError>()('StoreError', {
	/** Raw error from the storage backend */
	cause: Schema.optional(Schema.Defect),
	/** Human-readable description of what failed */
	message: Schema.optional(Schema.String),
	/** Which store operation failed */
	operation: Schema.Literal('add', 'lease', 'delete', 'purge', 'retry', 'peek', 'stats'),
}) {
	/** Format error for logs/debugging */
	get formattedMessage(): string {
		return `StoreError.${this.operation}${this.message ? `: ${this.message}` : ''}`
	}
}

/** Partition sizes at one point in time */
export interface QueueStats {
	readonly ready: number
	readonly inFlight: number
}

export interface MessageStorePort {
	/**
	 * Append a message to the tail of the ready queue.
	 */
	readonly add: (message: QueueMessage) => Effect.Effect<void, StoreError>

	/**
	 * Lease up to `count` messages from the head of the ready queue
	 *
	 * Each leased message is marked Processing, stamped with its lease deadline and moved into the in-flight set. The
	 * batch comes back in queue order. Fewer available messages than requested is not an error: all available messages
	 * are returned, possibly none.
	 *
	 * No message is ever handed to two callers: once leased it stays out of the ready queue until it is retried or its
	 * lease expires.
	 */
	readonly lease: (count: number) => Effect.Effect<Chunk.Chunk<QueueMessage>, StoreError>

	/**
	 * Acknowledge: permanently remove each id found in the in-flight set
	 *
	 * Ids that are not in flight (never issued, still Ready, already deleted) are ignored.
	 */
	readonly delete: (ids: ReadonlyArray<MessageId.Type>) => Effect.Effect<void, StoreError>

	/**
	 * Empty both partitions unconditionally.
	 */
	readonly purge: () => Effect.Effect<void, StoreError>

	/**
	 * Release each in-flight id back to the **tail** of the ready queue
	 *
	 * The released message becomes Ready with `retryCount + 1` and no lease deadline. Messages are appended in the order
	 * the ids are given; ids not in flight are skipped.
	 */
	readonly retry: (ids: ReadonlyArray<MessageId.Type>) => Effect.Effect<void, StoreError>

	/**
	 * Read up to `count` messages from the head of the ready queue without removing them or changing their state.
	 */
	readonly peek: (count: number) => Effect.Effect<Chunk.Chunk<QueueMessage>, StoreError>

	/**
	 * Current partition sizes.
	 */
	readonly stats: () => Effect.Effect<QueueStats, StoreError>
}

/**
 * MessageStorePort service tag
 */
export const MessageStorePort = Context.GenericTag<MessageStorePort>('@fifomq/queue/MessageStorePort')
