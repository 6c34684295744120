import { describe, expect, it } from '@effect/vitest'
import * as DateTime from 'effect/DateTime'
import * as Effect from 'effect/Effect'
import * as TestClock from 'effect/TestClock'

import { ClockPort } from '../ports/clock.port.ts'
import { Clock } from './clock.adapter.ts'

describe('Clock adapters', () => {
	describe('Clock.Live', () => {
		it.live('returns a UTC DateTime close to the system time', () =>
			Effect.gen(function* () {
				const clock = yield* ClockPort
				const before = Date.now()

				const now = yield* clock.now()

				expect(DateTime.isUtc(now)).toBe(true)
				expect(now.epochMillis).toBeGreaterThanOrEqual(before)
				expect(now.epochMillis - before).toBeLessThan(1_000)
			}).pipe(Effect.provide(Clock.Live)),
		)
	})

	describe('Clock.Test', () => {
		it.effect('starts at the epoch', () =>
			Effect.gen(function* () {
				const clock = yield* ClockPort

				const now = yield* clock.now()

				expect(now.epochMillis).toBe(0)
			}).pipe(Effect.provide(Clock.Test)),
		)

		it.effect('advances only with TestClock.adjust', () =>
			Effect.gen(function* () {
				const clock = yield* ClockPort

				yield* TestClock.adjust('90 seconds')
				const now = yield* clock.now()

				expect(now.epochMillis).toBe(90_000)
			}).pipe(Effect.provide(Clock.Test)),
		)
	})
})
