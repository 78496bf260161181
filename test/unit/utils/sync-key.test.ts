import { createHash } from 'node:crypto'
import { deriveSyncKey, UNKNOWN_YEAR_SENTINEL } from '@utils/sync-key.js'
import { describe, expect, it } from 'vitest'

const md5 = (value: string) => createHash('md5').update(value).digest('hex')

describe('sync-key', () => {
  describe('deriveSyncKey', () => {
    it('should hash title, kind and year joined by pipes', () => {
      expect(deriveSyncKey('Arrival', 'movie', 2016)).toBe(
        md5('Arrival|movie|2016'),
      )
    })

    it('should return 32 lowercase hex characters', () => {
      expect(deriveSyncKey('Severance', 'show', 2022)).toMatch(/^[0-9a-f]{32}$/)
    })

    it('should be deterministic', () => {
      expect(deriveSyncKey('Dune', 'movie', 2021)).toBe(
        deriveSyncKey('Dune', 'movie', 2021),
      )
    })

    it('should use the sentinel for a missing year', () => {
      expect(UNKNOWN_YEAR_SENTINEL).toBe('unknown')
      expect(deriveSyncKey('Arrival', 'movie')).toBe(
        md5('Arrival|movie|unknown'),
      )
      expect(deriveSyncKey('Arrival', 'movie', null)).toBe(
        deriveSyncKey('Arrival', 'movie', undefined),
      )
    })

    it('should distinguish media kinds and years', () => {
      const movie = deriveSyncKey('Fargo', 'movie', 1996)
      expect(deriveSyncKey('Fargo', 'show', 1996)).not.toBe(movie)
      expect(deriveSyncKey('Fargo', 'movie', 2014)).not.toBe(movie)
    })

    it('should not normalize case or whitespace', () => {
      const key = deriveSyncKey('Arrival', 'movie', 2016)
      expect(deriveSyncKey('arrival', 'movie', 2016)).not.toBe(key)
      expect(deriveSyncKey('Arrival ', 'movie', 2016)).not.toBe(key)
    })
  })
})
