import type * as Context from 'effect/Context'
import * as Layer from 'effect/Layer'
import { v7 as uuidv7 } from 'uuid'

import { UUIDPort } from '../ports/uuid.port.ts'

/**
 * UUID - UUIDPort adapters
 *
 * - {@link Default}: the `uuid` package's v7 generator
 * - {@link Sequence}: predictable ids for tests
 */
export class UUID {
	static readonly Default: Layer.Layer<UUIDPort> = Layer.succeed(UUIDPort, UUIDPort.of({ randomUUIDv7: () => uuidv7() }))

	/**
	 * Sequential ids: `{prefix}-0000-7000-8000-{counter}`, the 12-digit hex counter starting at zero for every build
	 * of the layer.
	 *
	 * @example
	 *
	 * ```typescript
	 * const ids = Effect.gen(function* () {
	 * 	const uuid = yield* UUIDPort
	 * 	return [uuid.randomUUIDv7(), uuid.randomUUIDv7()]
	 * }).pipe(Effect.provide(UUID.Sequence('12345678')))
	 * // ["12345678-0000-7000-8000-000000000000", "12345678-0000-7000-8000-000000000001"]
	 * ```
	 */
	static readonly Sequence = (prefix = '00000000'): Layer.Layer<UUIDPort> =>
		Layer.sync(UUIDPort, () => {
			let counter = 0
			return UUIDPort.of({
				randomUUIDv7: () => `${prefix}-0000-7000-8000-${(counter++).toString(16).padStart(12, '0')}`,
			} satisfies Context.Tag.Service<UUIDPort>)
		})
}
