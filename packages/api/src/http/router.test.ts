import * as HttpApp from '@effect/platform/HttpApp'
import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { UUID7 } from '@fifomq/platform/uuid7'
import { MessageQueue, Ports, QueueConfig } from '@fifomq/queue'

import { QueueApp } from './router.ts'

const A_ID = '00000000-0000-7000-8000-000000000000'
const B_ID = '00000000-0000-7000-8000-000000000001'

/**
 * Serve one request through the full web handler chain (middleware pre-response handlers included), on the test
 * fiber's runtime so TestClock and the provided MessageQueue apply.
 */
const call = (method: 'GET' | 'OPTIONS' | 'POST', path: string, body?: unknown, headers: Record<string, string> = {}) =>
	Effect.gen(function* () {
		const runtime = yield* Effect.runtime<MessageQueue>()
		const handler = HttpApp.toWebHandlerRuntime(runtime)(QueueApp)

		const response = yield* Effect.promise(() =>
			handler(
				new Request(`http://localhost${path}`, {
					body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
					headers: { 'content-type': 'application/json', ...headers },
					method,
				}),
			),
		)

		const text = yield* Effect.promise(() => response.text())
		const json: unknown = text === '' ? null : JSON.parse(text)
		return { body: json, headers: response.headers, status: response.status }
	})

const ready = (id: string, body: string, retryCount = 0) => ({
	body,
	id,
	lock_until: null,
	retry_count: retryCount,
	state: 'Ready',
})

const leased = (id: string, body: string, lockUntil: number, retryCount = 0) => ({
	body,
	id,
	lock_until: lockUntil,
	retry_count: retryCount,
	state: 'Processing',
})

describe('QueueApp', () => {
	describe('GET /hello', () => {
		it.effect('greets inside the success envelope', () =>
			Effect.gen(function* () {
				const response = yield* call('GET', '/hello')

				expect(response.status).toBe(200)
				expect(response.body).toEqual({ data: 'Hello World', success: true })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)

		it.effect('allows any origin', () =>
			Effect.gen(function* () {
				const response = yield* call('GET', '/hello', undefined, { origin: 'http://example.test' })

				expect(response.headers.get('access-control-allow-origin')).toBe('*')
			}).pipe(Effect.provide(MessageQueue.Test())),
		)
	})

	describe('CORS preflight', () => {
		it.effect('answers OPTIONS without reaching a route', () =>
			Effect.gen(function* () {
				const response = yield* call('OPTIONS', '/add', undefined, {
					'access-control-request-method': 'POST',
					origin: 'http://example.test',
				})

				expect(response.status).toBe(204)
				expect(response.body).toBeNull()
				expect(response.headers.get('access-control-allow-origin')).toBe('*')
				expect(response.headers.get('access-control-allow-methods')).toContain('POST')
				expect(yield* MessageQueue.stats()).toEqual({ inFlight: 0, ready: 0 })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)
	})

	describe('POST /add', () => {
		it.effect('returns the created message in wire form', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/add', { body: 'hello' })

				expect(response.status).toBe(200)
				expect(response.body).toEqual({ data: ready(A_ID, 'hello'), success: true })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)

		it.effect('rejects an oversized body with 400', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/add', { body: 'x'.repeat(5) })

				expect(response.status).toBe(400)
				expect(response.body).toEqual({ message: 'Message body size is too large', success: false })
			}).pipe(Effect.provide(MessageQueue.Test({ maxMessageSize: 4 }))),
		)

		it.effect('rejects malformed JSON with 400', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/add', '{"body":')

				expect(response.status).toBe(400)
				expect(response.body).toEqual({ message: 'Invalid request body', success: false })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)

		it.effect('rejects a request without a body field with 400', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/add', { text: 'hello' })

				expect(response.status).toBe(400)
				expect(response.body).toEqual({ message: 'Invalid request body', success: false })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)
	})

	describe('POST /get and /peek', () => {
		it.effect('default to a single message', () =>
			Effect.gen(function* () {
				yield* call('POST', '/add', { body: 'A' })
				yield* call('POST', '/add', { body: 'B' })

				const peeked = yield* call('POST', '/peek', {})
				const got = yield* call('POST', '/get', {})

				expect(peeked.body).toEqual({ data: [ready(A_ID, 'A')], success: true })
				expect(got.body).toEqual({ data: [leased(A_ID, 'A', 30_000)], success: true })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)

		it.effect('return an empty list when nothing is ready', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/get', { count: 3 })

				expect(response.body).toEqual({ data: [], success: true })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)

		it.effect('reject a negative count with 400', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/peek', { count: -1 })

				expect(response.status).toBe(400)
				expect(response.body).toEqual({ message: 'Invalid request body', success: false })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)
	})

	describe('POST /delete and /retry', () => {
		it.effect('report an empty id list', () =>
			Effect.gen(function* () {
				const deleted = yield* call('POST', '/delete', { ids: [] })
				const retried = yield* call('POST', '/retry', { ids: [] })

				expect(deleted.status).toBe(400)
				expect(deleted.body).toEqual({ message: 'No message IDs provided', success: false })
				expect(retried.body).toEqual({ message: 'No message IDs provided', success: false })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)

		it.effect('report the first malformed id', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/delete', { ids: [A_ID, 'nope', 'worse'] })

				expect(response.status).toBe(400)
				expect(response.body).toEqual({ message: 'Invalid message ID: nope', success: false })
			}).pipe(Effect.provide(MessageQueue.Test())),
		)
	})

	it.effect('answers unknown routes with 404', () =>
		Effect.gen(function* () {
			const response = yield* call('POST', '/missing', {})

			expect(response.status).toBe(404)
			expect(response.body).toEqual({ message: 'Not found', success: false })
		}).pipe(Effect.provide(MessageQueue.Test())),
	)

	describe('storage failures', () => {
		const withStore = (store: Layer.Layer<Ports.MessageStorePort>) =>
			MessageQueue.Default.pipe(Layer.provide(Layer.mergeAll(store, QueueConfig.Test(), UUID7.Sequence())))

		it.effect('answer 400 with the store message', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/purge')

				expect(response.status).toBe(400)
				expect(response.body).toEqual({ message: 'StoreError.purge: locked', success: false })
			}).pipe(
				Effect.provide(
					withStore(
						Layer.mock(Ports.MessageStorePort, {
							purge: () => Effect.fail(new Ports.StoreError({ message: 'locked', operation: 'purge' })),
						}),
					),
				),
			),
		)

		it.effect('answer 500 for a defect', () =>
			Effect.gen(function* () {
				const response = yield* call('POST', '/add', { body: 'A' })

				expect(response.status).toBe(500)
				expect(response.body).toEqual({ message: 'Internal server error', success: false })
			}).pipe(
				Effect.provide(
					withStore(
						Layer.mock(Ports.MessageStorePort, {
							add: () => Effect.die(new Error('store crashed')),
						}),
					),
				),
			),
		)
	})

	it.effect('walks a message through retry, redelivery, acknowledgement and purge', () =>
		Effect.gen(function* () {
			yield* call('POST', '/add', { body: 'A' })
			yield* call('POST', '/add', { body: 'B' })

			const first = yield* call('POST', '/get', { count: 1 })
			expect(first.body).toEqual({ data: [leased(A_ID, 'A', 30_000)], success: true })

			const retried = yield* call('POST', '/retry', { ids: [A_ID] })
			expect(retried.body).toEqual({ data: 'Success', success: true })
			expect((yield* call('POST', '/peek', { count: 10 })).body).toEqual({
				data: [ready(B_ID, 'B'), ready(A_ID, 'A', 1)],
				success: true,
			})

			const second = yield* call('POST', '/get', { count: 2 })
			expect(second.body).toEqual({
				data: [leased(B_ID, 'B', 30_000), leased(A_ID, 'A', 30_000, 1)],
				success: true,
			})

			yield* call('POST', '/delete', { ids: [B_ID] })
			expect(yield* MessageQueue.stats()).toEqual({ inFlight: 1, ready: 0 })

			const purged = yield* call('POST', '/purge')
			expect(purged.body).toEqual({ data: 'Success', success: true })
			expect(yield* MessageQueue.stats()).toEqual({ inFlight: 0, ready: 0 })
		}).pipe(Effect.provide(MessageQueue.Test())),
	)
})
