/**
 * Queue service error taxonomy
 *
 * Validation errors (`BodyTooLarge`, `NoIds`, `InvalidId`) are raised before any state is touched. `StorageFailure`
 * wraps whatever the message store reported.
 */

import * as Schema from 'effect/Schema'

/** Message body exceeds the configured maximum size (in UTF-8 bytes). */
export class BodyTooLarge extends Schema.TaggedError<BodyTooLarge>()('BodyTooLarge', {
	maxSize: Schema.Number,
	size: Schema.Number,
}) {}

/** Delete or retry called with an empty id list. */
export class NoIds extends Schema.TaggedError<NoIds>()('NoIds', {}) {}

/** An id in a delete or retry request is not a well-formed message id. */
export class InvalidId extends Schema.TaggedError<InvalidId>()('InvalidId', {
	id: Schema.String,
}) {}

/** The message store failed. */
export class StorageFailure extends Schema.TaggedError<StorageFailure>()('StorageFailure', {
	cause: Schema.optional(Schema.Defect),
	message: Schema.String,
}) {}

export type QueueError = BodyTooLarge | NoIds | InvalidId | StorageFailure
