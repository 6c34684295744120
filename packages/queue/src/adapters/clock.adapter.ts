/**
 * ClockPort adapters
 *
 * Lease deadlines are stamped and checked against this clock. `Live` follows Effect's Clock service; `Test` reads
 * TestClock, so a test moves lease expiry forward with `TestClock.adjust` instead of waiting.
 */

import * as DateTime from 'effect/DateTime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as TestClock from 'effect/TestClock'

import { ClockPort } from '../ports/clock.port.ts'

export class Clock {
	static readonly Live: Layer.Layer<ClockPort> = Layer.succeed(ClockPort, ClockPort.of({ now: () => DateTime.now }))

	/** Requires the TestContext that `it.effect` provides */
	static readonly Test: Layer.Layer<ClockPort> = Layer.succeed(
		ClockPort,
		ClockPort.of({ now: () => Effect.map(TestClock.currentTimeMillis, DateTime.unsafeMake) }),
	)
}
