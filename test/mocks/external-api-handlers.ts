import { HttpResponse, http } from 'msw'
import { TEST_URLS } from './test-config.js'

/**
 * Default MSW handlers for TMDB, Radarr and Sonarr.
 *
 * TMDB finds nothing, both backends report their quality profiles and Sonarr
 * lookups come back empty. Tests override these with server.use().
 */

export const tmdbMovieSearchHandler = http.get(
  `${TEST_URLS.tmdb}/search/movie`,
  () => HttpResponse.json({ page: 1, results: [] }),
)

export const tmdbTvSearchHandler = http.get(
  `${TEST_URLS.tmdb}/search/tv`,
  () => HttpResponse.json({ page: 1, results: [] }),
)

export const radarrQualityProfileHandler = http.get(
  `${TEST_URLS.radarr}/api/v3/qualityprofile`,
  () =>
    HttpResponse.json([
      { id: 1, name: 'Any' },
      { id: 4, name: 'HD-1080p' },
    ]),
)

export const sonarrQualityProfileHandler = http.get(
  `${TEST_URLS.sonarr}/api/v3/qualityprofile`,
  () =>
    HttpResponse.json([
      { id: 1, name: 'Any' },
      { id: 6, name: 'HD-720p/1080p' },
    ]),
)

export const sonarrSeriesLookupHandler = http.get(
  `${TEST_URLS.sonarr}/api/v3/series/lookup`,
  () => HttpResponse.json([]),
)

export const externalApiHandlers = [
  tmdbMovieSearchHandler,
  tmdbTvSearchHandler,
  radarrQualityProfileHandler,
  sonarrQualityProfileHandler,
  sonarrSeriesLookupHandler,
]

/** TMDB search resolving the listed titles; anything else finds nothing */
export function tmdbSearchHandler(
  kind: 'movie' | 'tv',
  ids: Record<string, number>,
) {
  return http.get(`${TEST_URLS.tmdb}/search/${kind}`, ({ request }) => {
    const query = new URL(request.url).searchParams.get('query') ?? ''
    const id: number | undefined = ids[query]
    return HttpResponse.json({
      page: 1,
      results: id === undefined ? [] : [{ id, title: query, name: query }],
    })
  })
}
