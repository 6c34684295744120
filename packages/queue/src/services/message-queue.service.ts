/**
 * MessageQueue - Validating facade over the message store
 *
 * Every operation a transport exposes goes through here. Validation happens first and nothing reaches the store when
 * it fails:
 *
 * - `add`: body size (UTF-8 bytes) against the configured maximum → `BodyTooLarge`
 * - `delete` / `retry`: non-empty id list → `NoIds`, then each id well-formed → `InvalidId` (first offender wins)
 *
 * Store failures surface as `StorageFailure`. No retries happen at this layer.
 *
 * @see packages/queue/src/ports/message-store.port.ts: Storage semantics
 */

import type * as Chunk from 'effect/Chunk'
import type * as ConfigError from 'effect/ConfigError'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { UUID7 } from '@fifomq/platform/uuid7'
import { MessageId } from '@fifomq/schemas/shared'

import { Clock } from '../adapters/clock.adapter.ts'
import { MessageStore } from '../adapters/message-store.adapter.ts'
import { QueueConfig, type QueueSettings } from '../config/queue.config.ts'
import { QueueMessage } from '../domain/message.domain.ts'
import { BodyTooLarge, InvalidId, NoIds, StorageFailure } from '../domain/queue.errors.ts'
import * as Ports from '../ports/index.ts'

const toStorageFailure = <A, R>(self: Effect.Effect<A, Ports.StoreError, R>): Effect.Effect<A, StorageFailure, R> =>
	Effect.mapError(self, (error) => new StorageFailure({ cause: error, message: error.formattedMessage }))

/**
 * Reject an empty list, then decode each id in order, stopping at the first malformed one.
 */
const validateIds = (ids: ReadonlyArray<string>): Effect.Effect<ReadonlyArray<MessageId.Type>, NoIds | InvalidId> =>
	ids.length === 0
		? Effect.fail(new NoIds())
		: Effect.forEach(ids, (id) => MessageId.decode(id).pipe(Effect.mapError(() => new InvalidId({ id }))))

export class MessageQueue extends Effect.Service<MessageQueue>()('@fifomq/queue/MessageQueue', {
	accessors: true,

	effect: Effect.gen(function* () {
		const store = yield* Ports.MessageStorePort
		const uuid = yield* UUID7
		const { maxMessageSize } = yield* QueueConfig

		/**
		 * Enqueue a new message at the tail of the ready queue
		 *
		 * @returns The stored message, Ready with a fresh UUID v7 id
		 */
		const add = Effect.fn('MessageQueue.add')(function* (body: string) {
			const size = Buffer.byteLength(body, 'utf8')
			if (size > maxMessageSize) {
				return yield* new BodyTooLarge({ maxSize: maxMessageSize, size })
			}

			const id = MessageId.fromUUID7(yield* uuid.randomUUIDv7())
			const message = QueueMessage.create(id, body)

			yield* toStorageFailure(store.add(message))
			yield* Effect.annotateCurrentSpan({ id, size })
			yield* Effect.logDebug('Message added', { id, size })

			return message
		})

		const get = Effect.fn('MessageQueue.get')(function* (count: number) {
			const leased: Chunk.Chunk<QueueMessage> = yield* toStorageFailure(store.lease(count))
			yield* Effect.logDebug('Messages leased', { leased: leased.length, requested: count })
			return leased
		})

		const peek = Effect.fn('MessageQueue.peek')(function* (count: number) {
			return yield* toStorageFailure(store.peek(count))
		})

		const delete_ = Effect.fn('MessageQueue.delete')(function* (ids: ReadonlyArray<string>) {
			const valid = yield* validateIds(ids)
			yield* toStorageFailure(store.delete(valid))
			yield* Effect.logDebug('Messages acknowledged', { ids: valid.length })
		})

		const retry = Effect.fn('MessageQueue.retry')(function* (ids: ReadonlyArray<string>) {
			const valid = yield* validateIds(ids)
			yield* toStorageFailure(store.retry(valid))
			yield* Effect.logDebug('Messages released for retry', { ids: valid.length })
		})

		const purge = Effect.fn('MessageQueue.purge')(function* () {
			yield* toStorageFailure(store.purge())
			yield* Effect.logInfo('Queue purged')
		})

		const stats = Effect.fn('MessageQueue.stats')(function* () {
			return yield* toStorageFailure(store.stats())
		})

		return {
			add,
			delete: delete_,
			get,
			peek,
			purge,
			retry,
			stats,
		}
	}),
}) {
	/**
	 * Production wiring: in-memory store, system clock, environment configuration, random UUID v7 ids
	 */
	static readonly Live: Layer.Layer<MessageQueue, ConfigError.ConfigError> = MessageQueue.Default.pipe(
		Layer.provide(MessageStore.InMemory),
		Layer.provide(Layer.mergeAll(Clock.Live, QueueConfig.Default, UUID7.Default)),
	)

	/**
	 * Test wiring: TestClock, fixed configuration and sequential ids (`00000000-0000-7000-8000-000000000000`, ...)
	 */
	static readonly Test = (settings: Partial<QueueSettings> = {}): Layer.Layer<MessageQueue> =>
		MessageQueue.Default.pipe(
			Layer.provide(MessageStore.InMemory),
			Layer.provide(Layer.mergeAll(Clock.Test, QueueConfig.Test(settings), UUID7.Sequence())),
		)
}
