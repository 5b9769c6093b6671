import { z } from 'zod'

export const ANALYSIS_STATUS_COMPLETED = 'completed'

export const videoAnalysisDocSchema = z
  .object({
    id: z.string().optional(),
    user_id: z.string().optional(),
    status: z.string(),
    frame_descriptions: z.record(z.string()).default({}),
    summary: z.string().default(''),
    processed_at: z.string().optional(),
  })
  .passthrough()

export type VideoAnalysisDoc = z.infer<typeof videoAnalysisDocSchema>

export type VideoAnalysisDto = {
  id: string
  userId: string
  status: string
  frameDescriptions: Record<string, string>
  summary: string
  processedAt: string | null
}
