import { RadarrService } from '@services/radarr.service.js'
import { normalizeBaseUrl } from '@utils/url.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    radarr: RadarrService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const radarr = new RadarrService(fastify.log, fastify.config)
    if (radarr.isConfigured()) {
      fastify.log.debug(
        `Radarr target: ${normalizeBaseUrl(fastify.config.radarrBaseUrl)}`,
      )
    }
    fastify.decorate('radarr', radarr)
  },
  {
    name: 'radarr',
    dependencies: ['config'],
  },
)
