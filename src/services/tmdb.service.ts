/**
 * TMDB Service
 *
 * Resolves watchlist titles to TMDB ids through the v3 search endpoints.
 * Accepts either a v4 API Read Access Token (sent as a Bearer token) or a
 * classic v3 API key (sent as the `api_key` query parameter).
 */

import type {
  MetadataResolver,
  SyncableMediaKind,
} from '@root/types/sync.types.js'
import { TmdbSearchResponseSchema } from '@schemas/tmdb/tmdb-search.schema.js'
import { describeFetchError } from '@utils/arr-error.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export class TmdbService implements MetadataResolver {
  private static readonly BASE_URL = 'https://api.themoviedb.org/3'
  private static readonly USER_AGENT = 'watchlist-arr-sync/1.0'

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'TMDB')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly apiKey: string,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Check if the service is properly configured
   */
  isConfigured(): boolean {
    return this.apiKey.trim() !== ''
  }

  /** Read access tokens are JWTs; v3 keys are 32 hex characters */
  private get usesBearerToken(): boolean {
    return this.apiKey.startsWith('eyJ')
  }

  buildSearchUrl(title: string, mediaKind: SyncableMediaKind): string {
    const endpoint = mediaKind === 'show' ? 'tv' : 'movie'
    const url = new URL(`${TmdbService.BASE_URL}/search/${endpoint}`)
    url.searchParams.append('query', title)
    if (!this.usesBearerToken) {
      url.searchParams.append('api_key', this.apiKey)
    }
    return url.toString()
  }

  /**
   * Returns the id of the first search result. Ranking is TMDB's; no attempt
   * is made to re-rank by year or title similarity.
   */
  async resolve(
    title: string,
    mediaKind: SyncableMediaKind,
  ): Promise<number | null> {
    if (!this.isConfigured()) {
      this.log.warn(`TMDB API key not configured, cannot resolve "${title}"`)
      return null
    }

    const headers: Record<string, string> = {
      'User-Agent': TmdbService.USER_AGENT,
      Accept: 'application/json',
    }
    if (this.usesBearerToken) {
      headers.Authorization = `Bearer ${this.apiKey}`
    }

    try {
      const response = await fetch(this.buildSearchUrl(title, mediaKind), {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      })

      if (!response.ok) {
        this.log.warn(
          `Failed to retrieve TMDB ID for ${mediaKind} "${title}": HTTP ${response.status} ${response.statusText}`,
        )
        return null
      }

      const parsed = TmdbSearchResponseSchema.safeParse(await response.json())
      if (!parsed.success) {
        this.log.warn(
          `TMDB returned an unexpected search response for ${mediaKind} "${title}"`,
        )
        return null
      }

      const [first] = parsed.data.results
      if (!first) {
        this.log.info(`No TMDB ID found for ${mediaKind} "${title}"`)
        return null
      }

      this.log.debug(`Resolved ${mediaKind} "${title}" to TMDB ID ${first.id}`)
      return first.id
    } catch (error) {
      this.log.error(
        `Error searching TMDB for ${mediaKind} "${title}": ${describeFetchError(error, this.timeoutMs)}`,
      )
      return null
    }
  }
}
