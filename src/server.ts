#!/usr/bin/env node
import { createLogger, validLogLevels } from '@utils/logger.js'
import { createShutdownHandler } from '@utils/shutdown.js'
import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import serviceApp from './app.js'

/**
 * Builds the service container, checks the backends' quality profiles and
 * performs one watchlist sync. Exits non-zero when the watchlist could not
 * be fetched or the run failed unexpectedly.
 */
async function init() {
  const app = Fastify({
    loggerInstance: createLogger(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  const configLogLevel = app.config.logLevel
  if (validLogLevels.includes(configLogLevel)) {
    app.log.level = configLogLevel
  }

  const graceful = closeWithGrace(
    {
      delay: app.config.requestTimeoutMs,
    },
    createShutdownHandler({ log: app.log, close: () => app.close() }),
  )

  try {
    await app.radarr.validateQualityProfile()
    await app.sonarr.validateQualityProfile()

    const summary = await app.watchlistSync.run()
    process.exitCode = summary === null ? 1 : 0
  } catch (err) {
    app.log.error({ error: err }, 'Sync run failed')
    process.exitCode = 1
  } finally {
    graceful.uninstall()
    await app.close()
  }
}

init().catch((err) => {
  console.error('Failed to start sync:', err)
  process.exitCode = 1
})
