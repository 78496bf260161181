import { z } from 'zod'

export const TmdbSearchResultSchema = z.object({
  id: z.number().int(),
  title: z.string().optional(),
  name: z.string().optional(),
})

export const TmdbSearchResponseSchema = z.object({
  page: z.number().optional(),
  results: z.array(TmdbSearchResultSchema),
  total_results: z.number().optional(),
})

export type TmdbSearchResult = z.infer<typeof TmdbSearchResultSchema>
export type TmdbSearchResponse = z.infer<typeof TmdbSearchResponseSchema>
