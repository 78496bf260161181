import { z } from 'zod'

// Some Plex responses carry the year as a string
const PlexYearSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return null
    const year = typeof value === 'number' ? value : Number(value)
    return Number.isInteger(year) ? year : null
  })

export const PlexWatchlistMetadataSchema = z.object({
  title: z.string().optional(),
  type: z.string().optional(),
  year: PlexYearSchema,
  ratingKey: z.string().optional(),
  guid: z.string().optional(),
})

// Entries are validated one by one so a single odd entry cannot fail the list
export const PlexWatchlistResponseSchema = z.object({
  MediaContainer: z.object({
    Metadata: z.array(z.unknown()).optional(),
    totalSize: z.number().optional(),
    size: z.number().optional(),
  }),
})

export type PlexWatchlistMetadata = z.input<typeof PlexWatchlistMetadataSchema>
export type PlexWatchlistEntry = z.infer<typeof PlexWatchlistMetadataSchema>
export type PlexWatchlistResponse = z.infer<typeof PlexWatchlistResponseSchema>
