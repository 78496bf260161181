export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export type SonarrSeasonMonitoring =
  | 'all'
  | 'future'
  | 'missing'
  | 'existing'
  | 'firstSeason'
  | 'lastSeason'
  | 'pilot'
  | 'none'

export interface Config {
  // System Config
  logLevel: LogLevel
  enableConsoleOutput: boolean
  requestTimeoutMs: number
  // Plex Config
  plexToken: string
  plexWatchlistUrl: string
  // TMDB Config
  tmdbApiKey: string
  // Radarr Config
  radarrBaseUrl: string
  radarrApiKey: string
  radarrQualityProfile: number
  radarrRootFolder: string
  radarrMonitored: boolean
  radarrSearchOnAdd: boolean
  // Sonarr Config
  sonarrBaseUrl: string
  sonarrApiKey: string
  sonarrQualityProfile: number
  sonarrLanguageProfile: number
  sonarrRootFolder: string
  sonarrMonitored: boolean
  sonarrSearchOnAdd: boolean
  sonarrSeasonMonitoring: SonarrSeasonMonitoring
  // Sync Cache Config
  cacheFile: string
  cacheRefreshHours: number
  // Run Mode Config
  dryRun: boolean
  emitCommands: boolean
}

/**
 * Values accepted in place of environment variables, mainly by tests.
 * They go through the same schema coercion as `process.env`.
 */
export type ConfigOverrides = Partial<
  Record<keyof Config, string | number | boolean>
>
