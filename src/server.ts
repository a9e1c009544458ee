#!/usr/bin/env node
/**
 * Tiny Blog server
 *
 * Opens the post store, serves the HTTP API and shuts down gracefully:
 * on SIGINT/SIGTERM it stops accepting connections, gives in-flight
 * requests up to SHUTDOWN_TIMEOUT_MS to finish, then closes the store.
 */

import { serve } from '@hono/node-server'
import { loadConfig } from './config'
import { isStorageError } from './errors'
import { createApp } from './http/app'
import { PostStore } from './posts/PostStore'
import { createConsoleLogger, logger, setLogger } from './utils/logger'

function main(): void {
  const config = loadConfig()
  setLogger(createConsoleLogger(config.logLevel))

  let store: PostStore
  try {
    store = PostStore.open({ path: config.dbPath })
  } catch (error) {
    logger.error('Cannot start: storage is unavailable', error)
    process.exitCode = 1
    return
  }

  const app = createApp({
    store,
    site: config.site,
    bodyLimitBytes: config.bodyLimitBytes,
  })

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    logger.info(`Listening on http://${info.address}:${info.port}`)
  })

  let shuttingDown = false
  const shutdown = (signal: string): void => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`Received ${signal}, shutting down`)

    const timer = setTimeout(() => {
      logger.warn(`Requests still running after ${config.shutdownTimeoutMs}ms; closing anyway`)
      finish()
    }, config.shutdownTimeoutMs)
    timer.unref()

    let finished = false
    function finish(): void {
      if (finished) return
      finished = true
      clearTimeout(timer)
      store.close().then(
        () => {
          logger.info('Shutdown complete')
          process.exit(process.exitCode ?? 0)
        },
        (error: unknown) => {
          logger.error('Error while closing store', error)
          process.exit(1)
        }
      )
    }

    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', error)
        process.exitCode = 1
      }
      finish()
    })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('uncaughtException', (error) => {
    logger.error(isStorageError(error) ? 'Storage failure' : 'Uncaught exception', error)
    process.exitCode = 1
    shutdown('uncaughtException')
  })
}

main()
