import env from '@fastify/env'
import type { Config, ConfigOverrides } from '@root/types/config.types.js'
import { resolveCacheFile, resolveEnvPath } from '@utils/data-dir.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: [],
  properties: {
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    enableConsoleOutput: {
      type: 'boolean',
      default: true,
    },
    requestTimeoutMs: {
      type: 'number',
      default: 30000,
    },
    plexToken: {
      type: 'string',
      default: '',
    },
    plexWatchlistUrl: {
      type: 'string',
      default:
        'https://metadata.provider.plex.tv/library/sections/watchlist/all',
    },
    tmdbApiKey: {
      type: 'string',
      default: '',
    },
    radarrBaseUrl: {
      type: 'string',
      default: 'http://localhost:7878',
    },
    radarrApiKey: {
      type: 'string',
      default: '',
    },
    radarrQualityProfile: {
      type: 'number',
      default: 4,
    },
    radarrRootFolder: {
      type: 'string',
      default: '/movies',
    },
    radarrMonitored: {
      type: 'boolean',
      default: true,
    },
    radarrSearchOnAdd: {
      type: 'boolean',
      default: true,
    },
    sonarrBaseUrl: {
      type: 'string',
      default: 'http://localhost:8989',
    },
    sonarrApiKey: {
      type: 'string',
      default: '',
    },
    sonarrQualityProfile: {
      type: 'number',
      default: 4,
    },
    sonarrLanguageProfile: {
      type: 'number',
      default: 1,
    },
    sonarrRootFolder: {
      type: 'string',
      default: '/tv',
    },
    sonarrMonitored: {
      type: 'boolean',
      default: true,
    },
    sonarrSearchOnAdd: {
      type: 'boolean',
      default: true,
    },
    sonarrSeasonMonitoring: {
      type: 'string',
      enum: [
        'all',
        'future',
        'missing',
        'existing',
        'firstSeason',
        'lastSeason',
        'pilot',
        'none',
      ],
      default: 'all',
    },
    // Empty means {dataDir}/sync_cache.json
    cacheFile: {
      type: 'string',
      default: '',
    },
    cacheRefreshHours: {
      type: 'number',
      default: 24,
    },
    dryRun: {
      type: 'boolean',
      default: false,
    },
    emitCommands: {
      type: 'boolean',
      default: false,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export interface ConfigPluginOptions {
  /** Values layered over `process.env`, mainly for tests */
  configOverrides?: ConfigOverrides
}

export default fp<ConfigPluginOptions>(
  async (fastify: FastifyInstance, opts) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: resolveEnvPath(),
        debug: process.env.NODE_ENV === 'development',
      },
      data: [process.env, opts.configOverrides ?? {}],
    })

    const config = fastify.config
    if (!config.cacheFile.trim()) {
      config.cacheFile = resolveCacheFile()
    }

    const missing: string[] = []
    if (!config.plexToken) missing.push('plexToken')
    if (!config.tmdbApiKey) missing.push('tmdbApiKey')
    if (!config.radarrApiKey) missing.push('radarrApiKey')
    if (!config.sonarrApiKey) missing.push('sonarrApiKey')
    if (missing.length > 0) {
      fastify.log.warn(
        `Missing credentials: ${missing.join(', ')}. Dependent calls will fail until they are set`,
      )
    }
  },
  {
    name: 'config',
  },
)
