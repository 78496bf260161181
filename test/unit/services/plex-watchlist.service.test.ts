import {
  PlexWatchlistService,
  toMediaKind,
  WatchlistFetchError,
} from '@services/plex-watchlist.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import { plexWatchlistHandler } from '../../mocks/plex-api-handlers.js'
import { TEST_URLS } from '../../mocks/test-config.js'
import { server } from '../../setup/msw-setup.js'

describe('PlexWatchlistService', () => {
  let log: FastifyBaseLogger

  const createService = (token = 'test-plex-token') =>
    new PlexWatchlistService(log, {
      token,
      url: TEST_URLS.plexWatchlist,
      timeoutMs: 2000,
    })

  beforeEach(() => {
    log = createMockLogger()
  })

  describe('toMediaKind', () => {
    it('should map movie and show and nothing else', () => {
      expect(toMediaKind('movie')).toBe('movie')
      expect(toMediaKind('show')).toBe('show')
      expect(toMediaKind('episode')).toBe('unknown')
      expect(toMediaKind('Movie')).toBe('unknown')
      expect(toMediaKind(undefined)).toBe('unknown')
    })
  })

  describe('fetch', () => {
    it('should send the token and map entries in order', async () => {
      let token: string | null = null
      let accept: string | null = null
      server.use(
        http.get(TEST_URLS.plexWatchlist, ({ request }) => {
          token = request.headers.get('X-Plex-Token')
          accept = request.headers.get('Accept')
          return HttpResponse.json({
            MediaContainer: {
              size: 3,
              Metadata: [
                { title: 'Arrival', type: 'movie', year: 2016, ratingKey: 'a1' },
                { title: 'Severance', type: 'show', year: 2022 },
                { title: 'Some Clip', type: 'clip' },
              ],
            },
          })
        }),
      )

      const items = await createService().fetch()

      expect(token).toBe('test-plex-token')
      expect(accept).toBe('application/json')
      expect(items).toEqual([
        { title: 'Arrival', mediaKind: 'movie', rawType: 'movie', year: 2016 },
        { title: 'Severance', mediaKind: 'show', rawType: 'show', year: 2022 },
        { title: 'Some Clip', mediaKind: 'unknown', rawType: 'clip' },
      ])
    })

    it('should leave the year out when Plex reports none', async () => {
      server.use(
        plexWatchlistHandler([{ title: 'Untitled Project', type: 'movie', year: null }]),
      )

      const [item] = await createService().fetch()

      expect(item).toEqual({
        title: 'Untitled Project',
        mediaKind: 'movie',
        rawType: 'movie',
      })
    })

    it('should drop entries without a title', async () => {
      server.use(
        plexWatchlistHandler([
          { type: 'movie', ratingKey: 'x1' },
          { title: '', type: 'show' },
          { title: 'Dune', type: 'movie', year: 2021 },
        ]),
      )

      const items = await createService().fetch()

      expect(items.map((item) => item.title)).toEqual(['Dune'])
      expect(log.debug).toHaveBeenCalledTimes(2)
    })

    it('should keep valid entries when another entry is malformed', async () => {
      server.use(
        http.get(TEST_URLS.plexWatchlist, () =>
          HttpResponse.json({
            MediaContainer: {
              size: 3,
              Metadata: [
                { title: 'Arrival', type: 'movie', year: 2016 },
                { title: 42, type: 'movie' },
                { title: 'Dune', type: 'movie', year: 2021 },
              ],
            },
          }),
        ),
      )

      const items = await createService().fetch()

      expect(items).toEqual([
        { title: 'Arrival', mediaKind: 'movie', rawType: 'movie', year: 2016 },
        { title: 'Dune', mediaKind: 'movie', rawType: 'movie', year: 2021 },
      ])
      expect(log.debug).toHaveBeenCalledTimes(1)
    })

    it('should read a year sent as a string', async () => {
      server.use(
        plexWatchlistHandler([
          { title: 'Arrival', type: 'movie', year: 2016 },
          { title: 'Odd', type: 'movie', year: '2020' },
          { title: 'Someday', type: 'show', year: 'soon' },
        ]),
      )

      const items = await createService().fetch()

      expect(items).toEqual([
        { title: 'Arrival', mediaKind: 'movie', rawType: 'movie', year: 2016 },
        { title: 'Odd', mediaKind: 'movie', rawType: 'movie', year: 2020 },
        { title: 'Someday', mediaKind: 'show', rawType: 'show' },
      ])
    })

    it('should return an empty list when the container has no metadata', async () => {
      server.use(
        http.get(TEST_URLS.plexWatchlist, () =>
          HttpResponse.json({ MediaContainer: { size: 0 } }),
        ),
      )

      await expect(createService().fetch()).resolves.toEqual([])
    })

    it('should throw without a token', async () => {
      await expect(createService('').fetch()).rejects.toThrow(
        new WatchlistFetchError('No Plex token provided'),
      )
    })

    it('should throw on a non-2xx response', async () => {
      server.use(
        http.get(TEST_URLS.plexWatchlist, () =>
          HttpResponse.text('Unauthorized', { status: 401 }),
        ),
      )

      const error = await createService()
        .fetch()
        .catch((err: unknown) => err)

      expect(error).toBeInstanceOf(WatchlistFetchError)
      expect(error).toMatchObject({
        message: 'Plex API error: HTTP 401 - Unauthorized',
        status: 401,
      })
    })

    it('should throw on a non-JSON body', async () => {
      server.use(
        http.get(TEST_URLS.plexWatchlist, () =>
          HttpResponse.text('<MediaContainer/>'),
        ),
      )

      await expect(createService().fetch()).rejects.toThrow(
        'Plex returned a non-JSON watchlist body: <MediaContainer/>',
      )
    })

    it('should throw on an unexpected structure', async () => {
      server.use(
        http.get(TEST_URLS.plexWatchlist, () => HttpResponse.json({ items: [] })),
      )

      await expect(createService().fetch()).rejects.toThrow(
        'Plex returned an unexpected watchlist structure',
      )
    })

    it('should throw on a network failure', async () => {
      server.use(http.get(TEST_URLS.plexWatchlist, () => HttpResponse.error()))

      await expect(createService().fetch()).rejects.toBeInstanceOf(
        WatchlistFetchError,
      )
    })
  })
})
