/**
 * Response envelope shared by every HTTP route
 *
 * - success: `{ "success": true, "data": <payload> }`
 * - failure: `{ "success": false, "message": <human readable> }`
 */

import * as Schema from 'effect/Schema'

export const ApiFailure = Schema.Struct({
	message: Schema.String,
	success: Schema.Literal(false),
})

export declare namespace ApiFailure {
	type Type = typeof ApiFailure.Type
	type Encoded = typeof ApiFailure.Encoded
}

/**
 * Success envelope around a payload schema.
 *
 * @example
 * ```typescript
 * const MessagesResponse = ApiSuccess(Schema.Array(QueueMessage))
 * ```
 */
export const ApiSuccess = <A, I, R>(
	data: Schema.Schema<A, I, R>,
): Schema.Struct<{ data: Schema.Schema<A, I, R>; success: Schema.Literal<[true]> }> =>
	Schema.Struct({
		data,
		success: Schema.Literal(true),
	})
