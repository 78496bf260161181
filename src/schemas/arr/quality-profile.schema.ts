import { z } from 'zod'

export const QualityProfileSchema = z.object({
  id: z.number().int(),
  name: z.string(),
})

export const QualityProfilesSchema = z.array(QualityProfileSchema)

export type QualityProfile = z.infer<typeof QualityProfileSchema>
