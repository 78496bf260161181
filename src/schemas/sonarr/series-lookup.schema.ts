import { z } from 'zod'

export const SonarrSeriesLookupItemSchema = z.object({
  title: z.string(),
  tvdbId: z.number().int(),
  year: z.number().int().optional(),
  id: z.number().int().optional(),
})

// Only the first candidate is used, so only it is validated
export const SonarrSeriesLookupResponseSchema = z.array(z.unknown())

export type SonarrSeriesLookupItem = z.infer<typeof SonarrSeriesLookupItemSchema>
