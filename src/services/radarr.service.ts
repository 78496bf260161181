import type { Config } from '@root/types/config.types.js'
import type { RadarrPost } from '@root/types/radarr.types.js'
import type {
  ArrRequest,
  BackendSubmitter,
  PreparedSubmission,
  SubmitOutcome,
  WatchlistItem,
} from '@root/types/sync.types.js'
import type { QualityProfile } from '@schemas/arr/quality-profile.schema.js'
import {
  type ArrConnection,
  fetchArrQualityProfiles,
  isArrConfigured,
  sendArrRequest,
  validateArrQualityProfile,
} from '@utils/arr-client.js'
import { createServiceLogger } from '@utils/logger.js'
import { buildArrApiUrl } from '@utils/url.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Movie backend. Adds movies to Radarr by TMDB id.
 */
export class RadarrService implements BackendSubmitter {
  readonly target = 'radarr' as const

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'RADARR')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: Config,
  ) {}

  private get connection(): ArrConnection {
    return {
      name: 'Radarr',
      baseUrl: this.config.radarrBaseUrl,
      apiKey: this.config.radarrApiKey,
      timeoutMs: this.config.requestTimeoutMs,
    }
  }

  isConfigured(): boolean {
    return isArrConfigured(this.connection)
  }

  private get headers(): Record<string, string> {
    return {
      'X-Api-Key': this.config.radarrApiKey,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    }
  }

  buildMoviePayload(tmdbId: number, item: WatchlistItem): RadarrPost {
    return {
      title: item.title,
      qualityProfileId: this.config.radarrQualityProfile,
      tmdbId,
      rootFolderPath: this.config.radarrRootFolder,
      monitored: this.config.radarrMonitored,
      addOptions: {
        searchForMovie: this.config.radarrSearchOnAdd,
      },
    }
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
          reason: 'Radarr is not configured (radarrBaseUrl/radarrApiKey)',
        },
      }
    }

    return {
      ok: true,
      canonicalTitle: item.title,
      request: {
        method: 'POST',
        url: buildArrApiUrl(this.config.radarrBaseUrl, 'movie'),
        headers: this.headers,
        body: this.buildMoviePayload(tmdbId, item),
      },
    }
  }

  send(request: ArrRequest): Promise<SubmitOutcome> {
    return sendArrRequest(request, this.config.requestTimeoutMs)
  }

  async submit(tmdbId: number, item: WatchlistItem): Promise<SubmitOutcome> {
    this.log.info(`Adding movie "${item.title}" to Radarr...`)
    const prepared = await this.prepare(tmdbId, item)
    if (!prepared.ok) {
      return prepared.outcome
    }

    const outcome = await this.send(prepared.request)
    switch (outcome.kind) {
      case 'created':
        this.log.info(`Added movie "${item.title}" to Radarr successfully`)
        break
      case 'already-exists':
        this.log.info(`Movie "${item.title}" already exists in Radarr`)
        break
      case 'rejected':
        this.log.warn(`Movie "${item.title}" not added: ${outcome.reason}`)
        break
      case 'transient-failure':
        this.log.error(
          `Failed to add movie "${item.title}" to Radarr: ${outcome.reason}`,
        )
        break
    }
    return outcome
  }

  fetchQualityProfiles(): Promise<QualityProfile[]> {
    return fetchArrQualityProfiles(this.connection)
  }

  /**
   * Logs whether the configured quality profile exists in Radarr.
   */
  validateQualityProfile(): Promise<QualityProfile | null> {
    return validateArrQualityProfile(
      this.log,
      this.connection,
      this.config.radarrQualityProfile,
    )
  }
}
