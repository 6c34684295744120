/**
 * Request bodies accepted by the queue HTTP surface.
 *
 * Ids arrive as plain strings: checking their shape belongs to the queue service, which reports `NoIds` / `InvalidId`.
 */

import * as Schema from 'effect/Schema'

/** `POST /add` */
export class AddMessageRequest extends Schema.Class<AddMessageRequest>('AddMessageRequest')({
	body: Schema.String,
}) {}

/**
 * `POST /get` and `POST /peek`
 *
 * A missing or `null` count means one message.
 */
export class CountRequest extends Schema.Class<CountRequest>('CountRequest')({
	count: Schema.optionalWith(Schema.NonNegativeInt, { default: () => 1, nullable: true }),
}) {}

/** `POST /delete` and `POST /retry` */
export class IdsRequest extends Schema.Class<IdsRequest>('IdsRequest')({
	ids: Schema.Array(Schema.String),
}) {}
