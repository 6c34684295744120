/**
 * MessageId Schema
 *
 * Branded identifier of a queued message. Ids are generated as UUID v7 (time-ordered), but any well-formed UUID is
 * accepted when a caller hands an id back for acknowledgement or retry: an id that was never issued simply matches
 * nothing in the in-flight set.
 *
 * Type Structure: `string & Brand<MessageIdBrand>`
 */

import type * as Effect from 'effect/Effect'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import type { UUID7 } from './uuid7.schema.ts'

const MessageIdBrand: unique symbol = Symbol.for('@fifomq/schemas/shared/MessageId')

export class MessageId extends Schema.UUID.pipe(Schema.brand(MessageIdBrand)) {
	/**
	 * Brand a freshly generated UUID7 as a MessageId.
	 *
	 * Uses make() instead of decode() because the UUID7 service already validated the value.
	 */
	static readonly fromUUID7: (uuid7: UUID7.Type) => MessageId.Type = (uuid7) => MessageId.make(uuid7)

	static readonly decode: (value: string) => Effect.Effect<MessageId.Type, ParseResult.ParseError> = (value) =>
		Schema.decode(MessageId)(value)
}

export declare namespace MessageId {
	type Type = typeof MessageId.Type
}
