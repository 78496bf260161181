import { PlexWatchlistService } from '@services/plex-watchlist.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    plexWatchlist: PlexWatchlistService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new PlexWatchlistService(fastify.log, {
      token: fastify.config.plexToken,
      url: fastify.config.plexWatchlistUrl,
      timeoutMs: fastify.config.requestTimeoutMs,
    })

    fastify.decorate('plexWatchlist', service)
  },
  {
    name: 'plex-watchlist',
    dependencies: ['config'],
  },
)
