/** biome-ignore-all lint/style/useNamingConvention: UUID7 follows Effect's convention for acronyms (UUID, ULID) */

import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import * as Schema from '@fifomq/schemas/shared'

import * as Adapters from './adapters/index.ts'
import * as Ports from './ports/index.ts'

/**
 * UUID7 - validated UUID v7 values for new message ids
 *
 * Whatever the UUIDPort adapter hands out is checked against the `UUID7` schema before it becomes an id. A value that
 * fails the check means the generator is broken, so it is a defect rather than a typed error.
 *
 * @example
 *
 * ```typescript ignore
 * const id = MessageId.fromUUID7(yield* UUID7.randomUUIDv7())
 * ```
 */
export class UUID7 extends Effect.Service<UUID7>()('@fifomq/platform/UUID7', {
	accessors: true,

	dependencies: [Adapters.UUID.Default],

	effect: Effect.map(Ports.UUIDPort, (uuid) => ({
		randomUUIDv7: (): Effect.Effect<Schema.UUID7.Type> =>
			Effect.suspend(() => Schema.UUID7.decode(uuid.randomUUIDv7())).pipe(Effect.orDie),
	})),
}) {
	/**
	 * Sequential ids `{prefix}-0000-7000-8000-{counter}` for tests
	 *
	 * @param prefix - 8 hex digits (default: "00000000")
	 */
	static readonly Sequence = (prefix = '00000000'): Layer.Layer<UUID7> =>
		UUID7.DefaultWithoutDependencies.pipe(Layer.provide(Adapters.UUID.Sequence(prefix)))
}
