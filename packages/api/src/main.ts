/**
 * fifomq HTTP server entrypoint
 *
 * Usage: `npm start` from the workspace root
 *
 * Environment variables: see `ServerConfig` (port, log level) and `QueueConfig` (message size, lease timeout).
 */

import { createServer } from 'node:http'

import * as HttpMiddleware from '@effect/platform/HttpMiddleware'
import * as HttpServer from '@effect/platform/HttpServer'
import * as NodeHttpServer from '@effect/platform-node/NodeHttpServer'
import * as NodeRuntime from '@effect/platform-node/NodeRuntime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Logger from 'effect/Logger'

import { MessageQueue } from '@fifomq/queue'

import { ServerConfig } from './config/server.config.ts'
import { QueueApp } from './http/router.ts'

const HttpLive = (port: number) =>
	QueueApp.pipe(
		HttpServer.serve(HttpMiddleware.logger),
		HttpServer.withLogAddress,
		Layer.provide(NodeHttpServer.layer(createServer, { port })),
		Layer.provide(MessageQueue.Live),
	)

const program = Effect.gen(function* () {
	const { logLevel, port } = yield* ServerConfig

	yield* Layer.launch(HttpLive(port)).pipe(Logger.withMinimumLogLevel(logLevel))
})

NodeRuntime.runMain(program.pipe(Effect.provide(ServerConfig.Default), Effect.provide(Logger.pretty)))
