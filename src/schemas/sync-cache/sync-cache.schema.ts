import { z } from 'zod'

// Older cache files stored the year as a string
const YearSchema = z
  .union([z.number().int(), z.string()])
  .nullable()
  .optional()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return null
    const year = typeof value === 'number' ? value : Number(value)
    return Number.isInteger(year) ? year : null
  })

export const SyncRecordFileSchema = z.object({
  title: z.string(),
  media_type: z.string(),
  year: YearSchema,
  target_service: z.string().nullable().optional(),
  synced_at: z.string(),
})

export const SyncCacheFileSchema = z.object({
  synced_items: z.record(z.string(), SyncRecordFileSchema).default({}),
  last_refresh: z.string().optional(),
})

export type SyncRecordFile = z.input<typeof SyncRecordFileSchema>
export type SyncCacheFile = z.input<typeof SyncCacheFileSchema>
