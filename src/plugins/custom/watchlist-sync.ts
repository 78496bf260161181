import { WatchlistSyncService } from '@services/watchlist-sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    watchlistSync: WatchlistSyncService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new WatchlistSyncService(fastify.log, fastify.config, {
      cache: fastify.syncCache,
      watchlist: fastify.plexWatchlist,
      resolver: fastify.tmdb,
      radarr: fastify.radarr,
      sonarr: fastify.sonarr,
    })
    fastify.decorate('watchlistSync', service)
  },
  {
    name: 'watchlist-sync',
    dependencies: [
      'config',
      'sync-cache',
      'plex-watchlist',
      'tmdb',
      'radarr',
      'sonarr',
    ],
  },
)
