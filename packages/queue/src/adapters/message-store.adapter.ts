/** biome-ignore-all lint/style/useNamingConvention: Capitalized identifiers follow Effect service conventions */

import * as Chunk from 'effect/Chunk'
import * as DateTime from 'effect/DateTime'
import * as Effect from 'effect/Effect'
import { pipe } from 'effect/Function'
import * as HashMap from 'effect/HashMap'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Order from 'effect/Order'
import * as Ref from 'effect/Ref'

import type { MessageId } from '@fifomq/schemas/shared'

import { QueueConfig } from '../config/queue.config.ts'
import { QueueMessage } from '../domain/message.domain.ts'
import * as Ports from '../ports/index.ts'

/**
 * Both partitions, always read and replaced together.
 */
interface StoreState {
	readonly ready: Chunk.Chunk<QueueMessage>
	readonly inFlight: HashMap.HashMap<MessageId.Type, QueueMessage>
}

const emptyState: StoreState = {
	inFlight: HashMap.empty(),
	ready: Chunk.empty(),
}

/**
 * Transition: Ready → Processing
 */
const markProcessing = (message: QueueMessage, lockUntil: DateTime.Utc): QueueMessage =>
	new QueueMessage({
		body: message.body,
		id: message.id,
		lockUntil: Option.some(lockUntil),
		retryCount: message.retryCount,
		state: 'Processing',
	})

/**
 * Transition: Processing → Ready, counting one more retry
 */
const release = (message: QueueMessage): QueueMessage =>
	new QueueMessage({
		body: message.body,
		id: message.id,
		lockUntil: Option.none(),
		retryCount: message.retryCount + 1,
		state: 'Ready',
	})

/**
 * Expired leases go back in deadline order; messages leased in the same batch share a deadline, and their UUID7 ids
 * restore queue order among them.
 */
const byLeaseDeadline: Order.Order<QueueMessage> = Order.combine(
	Order.mapInput(Order.number, (message: QueueMessage) =>
		Option.match(message.lockUntil, { onNone: () => 0, onSome: (deadline) => deadline.epochMillis }),
	),
	Order.mapInput(Order.string, (message: QueueMessage) => message.id),
)

/**
 * Move every in-flight message whose lease deadline has passed back to the tail of the ready queue.
 *
 * Returns `state` itself when nothing has expired.
 */
const reclaimExpired = (state: StoreState, now: DateTime.Utc): StoreState => {
	const expired = pipe(
		HashMap.values(state.inFlight),
		Chunk.fromIterable,
		Chunk.filter((message) => QueueMessage.isLeaseExpired(message, now)),
		Chunk.sort(byLeaseDeadline),
	)

	if (Chunk.isEmpty(expired)) {
		return state
	}

	return {
		inFlight: Chunk.reduce(expired, state.inFlight, (inFlight, message) => HashMap.remove(inFlight, message.id)),
		ready: Chunk.appendAll(state.ready, Chunk.map(expired, release)),
	}
}

const make: Effect.Effect<Ports.MessageStorePort, never, Ports.ClockPort | QueueConfig> = Effect.gen(function* () {
	const clock = yield* Ports.ClockPort
	const { leaseTimeout } = yield* QueueConfig

	const state = yield* Ref.make(emptyState)
	const mutex = yield* Effect.makeSemaphore(1)

	/**
	 * One critical section over both partitions, entered and run to completion.
	 *
	 * Expired leases are returned to the ready queue before `f` sees the state, so every operation acts on the same
	 * state that `stats` reports. The state `f` returns is stored.
	 */
	const transact = <A>(
		f: (current: StoreState, now: DateTime.Utc) => readonly [result: A, next: StoreState],
	): Effect.Effect<A> =>
		mutex.withPermits(1)(
			Effect.uninterruptible(
				Effect.gen(function* () {
					const now = yield* clock.now()
					const current = reclaimExpired(yield* Ref.get(state), now)
					const [result, next] = f(current, now)
					yield* Ref.set(state, next)
					return result
				}),
			),
		)

	const add = Effect.fn('MessageStore.InMemory.add')(function* (message: QueueMessage) {
		yield* transact(({ inFlight, ready }) => [undefined, { inFlight, ready: Chunk.append(ready, message) }])
		yield* Effect.annotateCurrentSpan({ id: message.id })
	})

	const lease = Effect.fn('MessageStore.InMemory.lease')(function* (count: number) {
		const leased = yield* transact(({ inFlight, ready }, now) => {
			const lockUntil = DateTime.addDuration(now, leaseTimeout)
			const [head, rest] = Chunk.splitAt(ready, Math.max(0, count))
			const batch = Chunk.map(head, (message) => markProcessing(message, lockUntil))

			return [
				batch,
				{
					inFlight: Chunk.reduce(batch, inFlight, (leasedSet, message) => HashMap.set(leasedSet, message.id, message)),
					ready: rest,
				},
			]
		})

		yield* Effect.annotateCurrentSpan({ leased: leased.length, requested: count })
		return leased
	})

	const delete_ = Effect.fn('MessageStore.InMemory.delete')(function* (ids: ReadonlyArray<MessageId.Type>) {
		yield* transact(({ inFlight, ready }) => [
			undefined,
			{ inFlight: ids.reduce((remaining, id) => HashMap.remove(remaining, id), inFlight), ready },
		])
		yield* Effect.annotateCurrentSpan({ ids: ids.length })
	})

	const purge = Effect.fn('MessageStore.InMemory.purge')(function* () {
		yield* transact(() => [undefined, emptyState])
	})

	const retry = Effect.fn('MessageStore.InMemory.retry')(function* (ids: ReadonlyArray<MessageId.Type>) {
		yield* transact((current) => [
			undefined,
			ids.reduce<StoreState>(
				(next, id) =>
					Option.match(HashMap.get(next.inFlight, id), {
						onNone: () => next,
						onSome: (message) => ({
							inFlight: HashMap.remove(next.inFlight, id),
							ready: Chunk.append(next.ready, release(message)),
						}),
					}),
				current,
			),
		])
		yield* Effect.annotateCurrentSpan({ ids: ids.length })
	})

	const peek = Effect.fn('MessageStore.InMemory.peek')(function* (count: number) {
		return yield* transact((current) => [Chunk.take(current.ready, Math.max(0, count)), current])
	})

	const stats = Effect.fn('MessageStore.InMemory.stats')(function* () {
		return yield* transact(
			(current): readonly [Ports.QueueStats, StoreState] => [
				{ inFlight: HashMap.size(current.inFlight), ready: current.ready.length },
				current,
			],
		)
	})

	return Ports.MessageStorePort.of({
		add,
		delete: delete_,
		lease,
		peek,
		purge,
		retry,
		stats,
	})
})

/**
 * MessageStore - Adapter implementations for MessageStorePort
 *
 * - {@link InMemory} - Ready queue and in-flight set held in a `Ref`, every operation serialized by a single-permit
 *   semaphore. Nothing survives a restart.
 *
 * Lease expiry is lazy: every operation first returns expired leases to the ready queue, inside the same critical
 * section. No background fiber is involved.
 *
 * @example
 * ```typescript ignore
 * Effect.gen(function* () {
 *   const store = yield* MessageStorePort
 *   yield* store.add(message)
 *   const batch = yield* store.lease(10)
 * }).pipe(
 *   Effect.provide(MessageStore.InMemory),
 *   Effect.provide(Layer.mergeAll(Clock.Live, QueueConfig.Default)),
 * )
 * ```
 */
export class MessageStore {
	static readonly InMemory: Layer.Layer<Ports.MessageStorePort, never, Ports.ClockPort | QueueConfig> = Layer.effect(
		Ports.MessageStorePort,
		make,
	)
}
