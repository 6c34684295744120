/**
 * QueueMessage Domain Model
 *
 * A queued text message and its lifecycle state:
 * - **Ready**: waiting in the ready queue
 * - **Processing**: leased to a consumer, held in the in-flight set until acknowledged, retried or expired
 * - **Done**: terminal; an acknowledged message is removed from storage, so this value never appears in a stored record
 *
 * The entity is a passive record. Every state transition is enacted by the message store as part of its own
 * invariant enforcement (see `MessageStorePort`).
 */

import type * as DateTime from 'effect/DateTime'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { MessageId } from '@fifomq/schemas/shared'

export const MessageState = Schema.Literal('Ready', 'Processing', 'Done')

export declare namespace MessageState {
	type Type = typeof MessageState.Type
}

/**
 * QueueMessage: wire and domain representation
 *
 * JSON form: `{ id, body, state, lock_until, retry_count }` where `lock_until` is the lease deadline in epoch
 * milliseconds, or `null` when the message is not leased.
 */
export class QueueMessage extends Schema.Class<QueueMessage>('QueueMessage')({
	body: Schema.String,
	id: MessageId,

	/** Lease deadline; `Some` exactly while the message is Processing */
	lockUntil: Schema.propertySignature(Schema.OptionFromNullOr(Schema.DateTimeUtcFromNumber)).pipe(
		Schema.fromKey('lock_until'),
	),

	/** Number of times the message went back from Processing to Ready */
	retryCount: Schema.propertySignature(Schema.NonNegativeInt).pipe(Schema.fromKey('retry_count')),

	state: MessageState,
}) {
	/**
	 * New message in its initial state: Ready, never retried, no lease.
	 */
	static readonly create = (id: MessageId.Type, body: string): QueueMessage =>
		new QueueMessage({
			body,
			id,
			lockUntil: Option.none(),
			retryCount: 0,
			state: 'Ready',
		})

	/** Query: waiting in the ready queue */
	static readonly isReady = (message: QueueMessage): boolean => message.state === 'Ready'

	/** Query: leased */
	static readonly isProcessing = (message: QueueMessage): boolean => message.state === 'Processing'

	/**
	 * Query: lease deadline reached
	 *
	 * Inclusive: a lease whose deadline equals `now` is expired.
	 */
	static readonly isLeaseExpired = (message: QueueMessage, now: DateTime.Utc): boolean =>
		Option.exists(message.lockUntil, (deadline) => deadline.epochMillis <= now.epochMillis)
}
