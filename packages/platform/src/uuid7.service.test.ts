/** biome-ignore-all lint/style/useNamingConvention: UUID7 follows Effect's convention for acronyms */

import { describe, expect, it } from '@effect/vitest'
import * as Cause from 'effect/Cause'
import * as Effect from 'effect/Effect'
import * as Exit from 'effect/Exit'

import { UUID7 } from './uuid7.service.ts'

describe('UUID7', () => {
	it.effect('generates a UUID v7 with the default layer', () =>
		Effect.gen(function* () {
			const id = yield* UUID7.randomUUIDv7()

			expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
		}).pipe(Effect.provide(UUID7.Default)),
	)

	it.effect('yields sequential ids with the Sequence layer', () =>
		Effect.gen(function* () {
			const first = yield* UUID7.randomUUIDv7()
			const second = yield* UUID7.randomUUIDv7()

			expect(first).toBe('abcdef01-0000-7000-8000-000000000000')
			expect(second).toBe('abcdef01-0000-7000-8000-000000000001')
		}).pipe(Effect.provide(UUID7.Sequence('abcdef01'))),
	)

	it.effect('dies when the generator produces something that is not a UUID v7', () =>
		Effect.gen(function* () {
			const exit = yield* Effect.exit(UUID7.randomUUIDv7())

			expect(Exit.isFailure(exit) && Cause.isDie(exit.cause)).toBe(true)
		}).pipe(Effect.provide(UUID7.Sequence('not-hex!'))),
	)
})
