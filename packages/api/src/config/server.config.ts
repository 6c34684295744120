/**
 * HTTP server configuration with environment variable overrides.
 *
 * Environment variables:
 *
 * - `FIFOMQ_PORT`: Listen port (default: 1337)
 * - `FIFOMQ_LOG_LEVEL`: `trace`, `debug`, `info`, `warn` (or `warning`), `error`, case-insensitive (default: info)
 *
 * Missing or unparsable values fall back to the default.
 */

import * as Config from 'effect/Config'
import * as Effect from 'effect/Effect'
import * as LogLevel from 'effect/LogLevel'
import * as Option from 'effect/Option'

export const DEFAULT_PORT = 1337

export const DEFAULT_LOG_LEVEL: LogLevel.LogLevel = LogLevel.Info

export const parseLogLevel = (value: string): Option.Option<LogLevel.LogLevel> => {
	switch (value.trim().toLowerCase()) {
		case 'trace':
			return Option.some(LogLevel.Trace)
		case 'debug':
			return Option.some(LogLevel.Debug)
		case 'info':
			return Option.some(LogLevel.Info)
		case 'warn':
		case 'warning':
			return Option.some(LogLevel.Warning)
		case 'error':
			return Option.some(LogLevel.Error)
		default:
			return Option.none()
	}
}

const port: Config.Config<number> = Config.integer('FIFOMQ_PORT').pipe(
	Config.validate({
		message: 'Expected a TCP port between 1 and 65535',
		validation: (value) => value >= 1 && value <= 65_535,
	}),
	Config.orElse(() => Config.succeed(DEFAULT_PORT)),
)

const logLevel: Config.Config<LogLevel.LogLevel> = Config.string('FIFOMQ_LOG_LEVEL').pipe(
	Config.map((value) => Option.getOrElse(parseLogLevel(value), () => DEFAULT_LOG_LEVEL)),
	Config.orElse(() => Config.succeed(DEFAULT_LOG_LEVEL)),
)

export interface ServerSettings {
	readonly port: number
	readonly logLevel: LogLevel.LogLevel
}

export class ServerConfig extends Effect.Service<ServerConfig>()('@fifomq/api/ServerConfig', {
	effect: Effect.gen(function* () {
		const settings: ServerSettings = yield* Config.all({ logLevel, port })

		yield* Effect.logInfo('Server configuration loaded', {
			logLevel: settings.logLevel.label,
			port: settings.port,
		})

		return settings
	}),
}) {}
