import { SonarrService } from '@services/sonarr.service.js'
import { normalizeBaseUrl } from '@utils/url.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    sonarr: SonarrService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const sonarr = new SonarrService(fastify.log, fastify.config)
    if (sonarr.isConfigured()) {
      fastify.log.debug(
        `Sonarr target: ${normalizeBaseUrl(fastify.config.sonarrBaseUrl)}`,
      )
    }
    fastify.decorate('sonarr', sonarr)
  },
  {
    name: 'sonarr',
    dependencies: ['config'],
  },
)
