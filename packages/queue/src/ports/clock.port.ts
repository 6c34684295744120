/**
 * ClockPort - current time for lease deadlines
 *
 * The message store reads the clock once per operation: to stamp `lockUntil = now + leaseTimeout` on lease, and to
 * decide which in-flight leases have expired.
 *
 * @see packages/queue/src/adapters/clock.adapter.ts
 */

import * as Context from 'effect/Context'
import type * as DateTime from 'effect/DateTime'
import type * as Effect from 'effect/Effect'

export interface ClockPort {
	readonly now: () => Effect.Effect<DateTime.Utc>
}

export const ClockPort = Context.GenericTag<ClockPort>('@fifomq/queue/ClockPort')
