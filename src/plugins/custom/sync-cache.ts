import { SyncCacheService } from '@services/sync-cache.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    syncCache: SyncCacheService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new SyncCacheService(fastify.log, {
      cacheFile: fastify.config.cacheFile,
      refreshHours: fastify.config.cacheRefreshHours,
    })
    fastify.decorate('syncCache', service)
  },
  {
    name: 'sync-cache',
    dependencies: ['config'],
  },
)
