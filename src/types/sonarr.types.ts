import type { SonarrSeasonMonitoring } from './config.types.js'

export interface SonarrAddOptions {
  monitor: SonarrSeasonMonitoring
  searchForMissingEpisodes: boolean
}

export interface SonarrPost {
  title: string
  qualityProfileId: number
  languageProfileId: number
  tvdbId: number
  rootFolderPath: string
  monitored: boolean
  addOptions: SonarrAddOptions
}

export type SeriesLookupResult =
  | { kind: 'found'; title: string; tvdbId: number }
  | { kind: 'none' }
  | { kind: 'error'; transient: boolean; reason: string }
