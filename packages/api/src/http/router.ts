/**
 * Queue HTTP surface
 *
 * | Route     | Method | Body                 | Data on success        |
 * |-----------|--------|----------------------|------------------------|
 * | `/hello`  | GET    |                      | `"Hello World"`        |
 * | `/add`    | POST   | `{ body }`           | created message        |
 * | `/get`    | POST   | `{ count? }`         | leased messages        |
 * | `/delete` | POST   | `{ ids }`            | `"Success"`            |
 * | `/purge`  | POST   |                      | `"Success"`            |
 * | `/retry`  | POST   | `{ ids }`            | `"Success"`            |
 * | `/peek`   | POST   | `{ count? }`         | previewed messages     |
 *
 * Every response uses the `ApiSuccess` / `ApiFailure` envelope. Queue errors and malformed requests answer 400, unknown routes 404,
 * and any defect 500 with a generic message.
 */

import * as HttpMiddleware from '@effect/platform/HttpMiddleware'
import * as HttpRouter from '@effect/platform/HttpRouter'
import type * as HttpServerError from '@effect/platform/HttpServerError'
import * as HttpServerRequest from '@effect/platform/HttpServerRequest'
import * as HttpServerResponse from '@effect/platform/HttpServerResponse'
import * as Cause from 'effect/Cause'
import * as Chunk from 'effect/Chunk'
import * as Effect from 'effect/Effect'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { MessageQueue, QueueMessage, type QueueError } from '@fifomq/queue'
import { AddMessageRequest, type ApiFailure, ApiSuccess, CountRequest, IdsRequest } from '@fifomq/schemas/http'

type RequestFailure = QueueError | ParseResult.ParseError | HttpServerError.RequestError

const Messages = Schema.Array(QueueMessage)

const reject = (status: number, message: string): HttpServerResponse.HttpServerResponse =>
	HttpServerResponse.unsafeJson({ message, success: false } satisfies ApiFailure.Type, { status })

const respond = <A, I>(payload: Schema.Schema<A, I>, data: A): Effect.Effect<HttpServerResponse.HttpServerResponse> =>
	Schema.encode(ApiSuccess(payload))({ data, success: true }).pipe(
		Effect.map((body) => HttpServerResponse.unsafeJson(body)),
		Effect.orDie,
	)

const done = respond(Schema.String, 'Success')

export const toFailureResponse = (error: RequestFailure): HttpServerResponse.HttpServerResponse => {
	switch (error._tag) {
		case 'BodyTooLarge':
			return reject(400, 'Message body size is too large')
		case 'NoIds':
			return reject(400, 'No message IDs provided')
		case 'InvalidId':
			return reject(400, `Invalid message ID: ${error.id}`)
		case 'StorageFailure':
			return reject(400, error.message)
		case 'ParseError':
		case 'RequestError':
			return reject(400, 'Invalid request body')
	}
}

const handle = <E extends RequestFailure, R>(
	self: Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>,
): Effect.Effect<HttpServerResponse.HttpServerResponse, never, R> =>
	Effect.catchAll(self, (error) =>
		Effect.logDebug('Request rejected', { reason: error._tag }).pipe(Effect.as(toFailureResponse(error))),
	)

export const QueueRouter = HttpRouter.empty.pipe(
	HttpRouter.get('/hello', respond(Schema.String, 'Hello World')),

	HttpRouter.post(
		'/add',
		HttpServerRequest.schemaBodyJson(AddMessageRequest).pipe(
			Effect.flatMap(({ body }) => MessageQueue.add(body)),
			Effect.flatMap((message) => respond(QueueMessage, message)),
			handle,
		),
	),

	HttpRouter.post(
		'/get',
		HttpServerRequest.schemaBodyJson(CountRequest).pipe(
			Effect.flatMap(({ count }) => MessageQueue.get(count)),
			Effect.flatMap((messages) => respond(Messages, Chunk.toReadonlyArray(messages))),
			handle,
		),
	),

	HttpRouter.post(
		'/delete',
		HttpServerRequest.schemaBodyJson(IdsRequest).pipe(
			Effect.flatMap(({ ids }) => MessageQueue.delete(ids)),
			Effect.zipRight(done),
			handle,
		),
	),

	HttpRouter.post('/purge', MessageQueue.purge().pipe(Effect.zipRight(done), handle)),

	HttpRouter.post(
		'/retry',
		HttpServerRequest.schemaBodyJson(IdsRequest).pipe(
			Effect.flatMap(({ ids }) => MessageQueue.retry(ids)),
			Effect.zipRight(done),
			handle,
		),
	),

	HttpRouter.post(
		'/peek',
		HttpServerRequest.schemaBodyJson(CountRequest).pipe(
			Effect.flatMap(({ count }) => MessageQueue.peek(count)),
			Effect.flatMap((messages) => respond(Messages, Chunk.toReadonlyArray(messages))),
			handle,
		),
	),
)

/**
 * The router with its fallbacks and open CORS, ready to serve.
 */
export const QueueApp = QueueRouter.pipe(
	Effect.catchTag('RouteNotFound', () => Effect.succeed(reject(404, 'Not found'))),
	Effect.catchAllDefect((defect) =>
		Effect.logError('Unhandled request failure', Cause.die(defect)).pipe(
			Effect.as(reject(500, 'Internal server error')),
		),
	),
	HttpMiddleware.cors(),
)
