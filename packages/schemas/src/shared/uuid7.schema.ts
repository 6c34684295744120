/** biome-ignore-all lint/style/useNamingConvention: UUID7 follows Effect's convention for acronyms (UUID, ULID) */

/**
 * UUID7 - Time-ordered UUID (RFC 9562)
 *
 * @module uuid7
 * @see {@link https://www.rfc-editor.org/rfc/rfc9562.html#name-uuid-version-7 RFC 9562: UUID version 7}
 */

import type { LazyArbitrary } from 'effect/Arbitrary'
import type * as Effect from 'effect/Effect'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

const identifier = 'UUID7' as const
const UUID7SchemaId: unique symbol = Symbol.for(`@fifomq/schemas/SchemaId/${identifier}`)
const UUID7Brand: unique symbol = Symbol.for(`@fifomq/schemas/shared/${identifier}`)

/**
 * UUID v7 regex pattern (RFC 9562 compliant)
 *
 * Format breakdown:
 * - `[0-9a-f]{8}`: Timestamp high (32 bits)
 * - `-[0-9a-f]{4}`: Timestamp mid (16 bits)
 * - `-7[0-9a-f]{3}`: Version (4 bits = 7) + Timestamp low (12 bits)
 * - `-[89ab][0-9a-f]{3}`: Variant (2 bits = RFC4122) + Clock sequence (14 bits)
 * - `-[0-9a-f]{12}`: Node (48 bits random)
 *
 * @internal
 */
export const UUID7Regex =
	/^(?<timestampHigh>[0-9a-f]{8})-(?<timestampMid>[0-9a-f]{4})-(?<timestampLowVersion>7[0-9a-f]{3})-(?<variant>[89ab][0-9a-f]{3})-(?<node>[0-9a-f]{12})$/i

/**
 * UUID7 - Time-ordered UUID schema with validation and branding
 *
 * Extends `Schema.UUID` with the version 7 / RFC4122 variant check.
 *
 * **Format:** `xxxxxxxx-xxxx-7xxx-[89ab]xxx-xxxxxxxxxxxx`
 */
export class UUID7 extends Schema.UUID.pipe(
	Schema.pattern(UUID7Regex, {
		arbitrary: (): LazyArbitrary<string> => (fc) => fc.uuid({ version: 7 }),
		description: 'a UUID version 7 (time-ordered, RFC 9562)',
		identifier: identifier,
		jsonSchema: {
			description: 'UUID version 7 (time-ordered, RFC 9562)',
			format: 'uuid',
			pattern: UUID7Regex.source,
		},
		message: () => 'Must be a valid UUID version 7 (format: xxxxxxxx-xxxx-7xxx-[89ab]xxx-xxxxxxxxxxxx)',
		schemaId: UUID7SchemaId,
	}),
	Schema.brand(UUID7Brand),
) {
	static readonly decode: (value: string) => Effect.Effect<UUID7.Type, ParseResult.ParseError> = (value) =>
		Schema.decode(UUID7)(value)
}

export declare namespace UUID7 {
	/**
	 * Branded string representing a time-ordered UUID v7.
	 *
	 * To create values, use the UUID7 platform service or `UUID7.decode`.
	 */
	type Type = typeof UUID7.Type
}
