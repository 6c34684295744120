/**
 * Queue configuration with environment variable overrides.
 *
 * Environment variables:
 *
 * - `FIFOMQ_MAX_MESSAGE_SIZE`: Maximum body size in bytes, or `<n>K` for kibibytes (default: 65536)
 * - `FIFOMQ_LEASE_TIMEOUT`: Lease visibility timeout as a duration string, e.g. `45 seconds` (default: 30 seconds)
 *
 * Missing or unparsable values fall back to the default.
 */

import * as Config from 'effect/Config'
import * as ConfigError from 'effect/ConfigError'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

export const DEFAULT_MAX_MESSAGE_SIZE = 65_536

export const DEFAULT_LEASE_TIMEOUT: Duration.Duration = Duration.seconds(30)

const SizePattern = /^(?<amount>\d+)(?<unit>[Kk]?)$/

/**
 * Parse a message size setting
 *
 * Accepts a plain byte count (`"4096"`) or a kibibyte count with a `K`/`k` suffix (`"64K"` = 65536). Zero, negative,
 * fractional and otherwise malformed values yield `None`.
 */
export const parseMessageSize = (value: string): Option.Option<number> => {
	const groups = SizePattern.exec(value)?.groups
	if (groups === undefined) {
		return Option.none()
	}
	const amount = Number.parseInt(groups['amount'] ?? '', 10)
	const bytes = groups['unit'] === '' ? amount : amount * 1024
	return Number.isSafeInteger(bytes) && bytes > 0 ? Option.some(bytes) : Option.none()
}

const maxMessageSize: Config.Config<number> = Config.string('FIFOMQ_MAX_MESSAGE_SIZE').pipe(
	Config.mapOrFail((value) =>
		Option.match(parseMessageSize(value), {
			onNone: () =>
				Either.left(ConfigError.InvalidData([], `Expected a positive byte count or <n>K, received "${value}"`)),
			onSome: Either.right,
		}),
	),
	Config.orElse(() => Config.succeed(DEFAULT_MAX_MESSAGE_SIZE)),
)

const leaseTimeout: Config.Config<Duration.Duration> = Config.duration('FIFOMQ_LEASE_TIMEOUT').pipe(
	Config.orElse(() => Config.succeed(DEFAULT_LEASE_TIMEOUT)),
)

export interface QueueSettings {
	/** Maximum accepted body size in UTF-8 bytes */
	readonly maxMessageSize: number
	/** How long a lease holds before the message returns to the ready queue */
	readonly leaseTimeout: Duration.Duration
}

/**
 * QueueConfig: explicit configuration value for the queue service and its store
 *
 * Built once at startup and injected; core logic never reads the environment itself.
 */
export class QueueConfig extends Effect.Service<QueueConfig>()('@fifomq/queue/QueueConfig', {
	effect: Effect.gen(function* () {
		const settings: QueueSettings = yield* Config.all({ leaseTimeout, maxMessageSize })

		yield* Effect.logInfo('Queue configuration loaded', {
			leaseTimeout: Duration.format(settings.leaseTimeout),
			maxMessageSize: settings.maxMessageSize,
		})

		return settings
	}),
}) {
	/**
	 * Fixed configuration for tests, defaults unless overridden
	 */
	static readonly Test = (overrides: Partial<QueueSettings> = {}): Layer.Layer<QueueConfig> =>
		Layer.succeed(
			QueueConfig,
			new QueueConfig({
				leaseTimeout: overrides.leaseTimeout ?? DEFAULT_LEASE_TIMEOUT,
				maxMessageSize: overrides.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE,
			}),
		)
}
