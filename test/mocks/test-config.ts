import type { Config, ConfigOverrides } from '@root/types/config.types.js'

/**
 * Hosts the MSW handlers answer for. Nothing here resolves outside the
 * test process.
 */
export const TEST_URLS = {
  plexWatchlist: 'http://plex.test/library/sections/watchlist/all',
  radarr: 'http://radarr.test:7878',
  sonarr: 'http://sonarr.test:8989',
  tmdb: 'https://api.themoviedb.org/3',
} as const

export const TEST_CONFIG_OVERRIDES = {
  logLevel: 'silent',
  enableConsoleOutput: false,
  plexToken: 'test-plex-token',
  plexWatchlistUrl: TEST_URLS.plexWatchlist,
  tmdbApiKey: 'test-tmdb-key',
  radarrBaseUrl: TEST_URLS.radarr,
  radarrApiKey: 'test-radarr-key',
  radarrQualityProfile: 4,
  sonarrBaseUrl: TEST_URLS.sonarr,
  sonarrApiKey: 'test-sonarr-key',
  sonarrQualityProfile: 6,
  requestTimeoutMs: 2000,
  dryRun: false,
  emitCommands: false,
} satisfies ConfigOverrides

/**
 * A complete config for constructing services directly, without Fastify.
 */
export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    logLevel: 'silent',
    enableConsoleOutput: false,
    requestTimeoutMs: 2000,
    plexToken: 'test-plex-token',
    plexWatchlistUrl: TEST_URLS.plexWatchlist,
    tmdbApiKey: 'test-tmdb-key',
    radarrBaseUrl: TEST_URLS.radarr,
    radarrApiKey: 'test-radarr-key',
    radarrQualityProfile: 4,
    radarrRootFolder: '/movies',
    radarrMonitored: true,
    radarrSearchOnAdd: true,
    sonarrBaseUrl: TEST_URLS.sonarr,
    sonarrApiKey: 'test-sonarr-key',
    sonarrQualityProfile: 6,
    sonarrLanguageProfile: 1,
    sonarrRootFolder: '/tv',
    sonarrMonitored: true,
    sonarrSearchOnAdd: true,
    sonarrSeasonMonitoring: 'all',
    cacheFile: '/tmp/watchlist-arr-sync-test/sync_cache.json',
    cacheRefreshHours: 24,
    dryRun: false,
    emitCommands: false,
    ...overrides,
  }
}
