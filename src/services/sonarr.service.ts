import type { Config } from '@root/types/config.types.js'
import type {
  SeriesLookupResult,
  SonarrPost,
} from '@root/types/sonarr.types.js'
import type {
  ArrRequest,
  BackendSubmitter,
  PreparedSubmission,
  SubmitOutcome,
  WatchlistItem,
} from '@root/types/sync.types.js'
import type { QualityProfile } from '@schemas/arr/quality-profile.schema.js'
import {
  SonarrSeriesLookupItemSchema,
  SonarrSeriesLookupResponseSchema,
} from '@schemas/sonarr/series-lookup.schema.js'
import {
  type ArrConnection,
  fetchArrQualityProfiles,
  isArrConfigured,
  sendArrRequest,
  validateArrQualityProfile,
} from '@utils/arr-client.js'
import { describeFetchError, truncate } from '@utils/arr-error.js'
import { createServiceLogger } from '@utils/logger.js'
import { buildArrApiUrl } from '@utils/url.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Show backend. Sonarr indexes series by TVDB id, so every add starts with a
 * lookup against Sonarr's own search to get the TVDB id and canonical title.
 */
export class SonarrService implements BackendSubmitter {
  readonly target = 'sonarr' as const

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'SONARR')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: Config,
  ) {}

  private get connection(): ArrConnection {
    return {
      name: 'Sonarr',
      baseUrl: this.config.sonarrBaseUrl,
      apiKey: this.config.sonarrApiKey,
      timeoutMs: this.config.requestTimeoutMs,
    }
  }

  isConfigured(): boolean {
    return isArrConfigured(this.connection)
  }

  private get headers(): Record<string, string> {
    return {
      'X-Api-Key': this.config.sonarrApiKey,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    }
  }

  buildSeriesPayload(tvdbId: number, canonicalTitle: string): SonarrPost {
    return {
      title: canonicalTitle,
      qualityProfileId: this.config.sonarrQualityProfile,
      languageProfileId: this.config.sonarrLanguageProfile,
      tvdbId,
      rootFolderPath: this.config.sonarrRootFolder,
      monitored: this.config.sonarrMonitored,
      addOptions: {
        monitor: this.config.sonarrSeasonMonitoring,
        searchForMissingEpisodes: this.config.sonarrSearchOnAdd,
      },
    }
  }

  /**
   * Searches Sonarr by free-text term and takes the first candidate.
   */
  async lookupSeries(term: string): Promise<SeriesLookupResult> {
    const timeoutMs = this.config.requestTimeoutMs
    let response: Response
    let bodyText: string
    try {
      response = await fetch(
        buildArrApiUrl(this.config.sonarrBaseUrl, 'series/lookup', { term }),
        {
          method: 'GET',
          headers: {
            'X-Api-Key': this.config.sonarrApiKey,
            Accept: 'application/json',
          },
          signal: AbortSignal.timeout(timeoutMs),
        },
      )
      bodyText = await response.text()
    } catch (error) {
      return {
        kind: 'error',
        transient: true,
        reason: `Series lookup failed: ${describeFetchError(error, timeoutMs)}`,
      }
    }

    if (!response.ok) {
      return {
        kind: 'error',
        transient: response.status >= 500,
        reason: `Series lookup failed: HTTP ${response.status}: ${truncate(bodyText, 200)}`,
      }
    }

    let data: unknown
    try {
      data = JSON.parse(bodyText)
    } catch {
      return {
        kind: 'error',
        transient: false,
        reason: `Series lookup returned malformed body: ${truncate(bodyText, 100)}`,
      }
    }

    const parsed = SonarrSeriesLookupResponseSchema.safeParse(data)
    if (!parsed.success) {
      return {
        kind: 'error',
        transient: false,
        reason: `Series lookup returned unexpected body: ${truncate(bodyText, 100)}`,
      }
    }

    if (parsed.data.length === 0) {
      return { kind: 'none' }
    }
    const first = SonarrSeriesLookupItemSchema.safeParse(parsed.data[0])
    if (!first.success) {
      return {
        kind: 'error',
        transient: false,
        reason: `Series lookup returned an unusable first candidate: ${truncate(JSON.stringify(parsed.data[0]), 100)}`,
      }
    }
    return { kind: 'found', title: first.data.title, tvdbId: first.data.tvdbId }
  }

  async prepare(
    tmdbId: number,
    item: WatchlistItem,
  ): Promise<PreparedSubmission> {
    if (!this.isConfigured()) {
      return {
        ok: false,
        outcome: {
          kind: 'transient-failure',
          reason: 'Sonarr is not configured (sonarrBaseUrl/sonarrApiKey)',
        },
      }
    }

    this.log.debug(
      `Looking up "${item.title}" in Sonarr (TMDB: ${tmdbId} is not usable by Sonarr)`,
    )
    const lookup = await this.lookupSeries(item.title)
    if (lookup.kind === 'none') {
      return {
        ok: false,
        outcome: {
          kind: 'rejected',
          reason: `No series found in Sonarr for "${item.title}"`,
        },
      }
    }
    if (lookup.kind === 'error') {
      return {
        ok: false,
        outcome: lookup.transient
          ? { kind: 'transient-failure', reason: lookup.reason }
          : { kind: 'rejected', reason: lookup.reason },
      }
    }

    return {
      ok: true,
      canonicalTitle: lookup.title,
      request: {
        method: 'POST',
        url: buildArrApiUrl(this.config.sonarrBaseUrl, 'series'),
        headers: this.headers,
        body: this.buildSeriesPayload(lookup.tvdbId, lookup.title),
      },
    }
  }

  send(request: ArrRequest): Promise<SubmitOutcome> {
    return sendArrRequest(request, this.config.requestTimeoutMs)
  }

  async submit(tmdbId: number, item: WatchlistItem): Promise<SubmitOutcome> {
    const prepared = await this.prepare(tmdbId, item)
    if (!prepared.ok) {
      this.log.warn(
        `Series "${item.title}" not added: ${prepared.outcome.reason}`,
      )
      return prepared.outcome
    }

    const { canonicalTitle } = prepared
    this.log.info(`Adding series "${canonicalTitle}" to Sonarr...`)
    const outcome = await this.send(prepared.request)
    switch (outcome.kind) {
      case 'created':
        this.log.info(`Added series "${canonicalTitle}" to Sonarr successfully`)
        break
      case 'already-exists':
        this.log.info(`Series "${item.title}" already exists in Sonarr`)
        break
      case 'rejected':
        this.log.warn(
          `Failed to add series "${canonicalTitle}" to Sonarr: ${outcome.reason}`,
        )
        break
      case 'transient-failure':
        this.log.error(
          `Failed to add series "${canonicalTitle}" to Sonarr: ${outcome.reason}`,
        )
        break
    }
    return outcome
  }

  fetchQualityProfiles(): Promise<QualityProfile[]> {
    return fetchArrQualityProfiles(this.connection)
  }

  /**
   * Logs whether the configured quality profile exists in Sonarr.
   */
  validateQualityProfile(): Promise<QualityProfile | null> {
    return validateArrQualityProfile(
      this.log,
      this.connection,
      this.config.sonarrQualityProfile,
    )
  }
}
