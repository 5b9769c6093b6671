import { z } from 'zod'
import type { Segment } from '../cuts/types'
import type { RenderMode } from '../../services/ffmpeg/renderPipeline'
import type { TimelineEntry } from '../timeline/types'

export const timelineEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('annotation'), seconds: z.number().nonnegative(), text: z.string() }),
  z.object({ kind: z.literal('cut'), seconds: z.number().nonnegative(), reason: z.string(), text: z.string().optional() }),
])

export const projectDocSchema = z
  .object({
    video_ids: z.array(z.string()).default([]),
    fullDescription: z.string().default(''),
    // Typed timeline; projects written before it existed only carry fullDescription.
    timeline: z.array(timelineEntrySchema).optional(),
    createdAt: z.string().optional(),
    output_filename: z.string().nullable().optional(),
    preview_filename: z.string().nullable().optional(),
    renderedAt: z.string().optional(),
  })
  .passthrough()

export type ProjectDoc = z.infer<typeof projectDocSchema>

export type CreateProjectInput = { userId: string; projectId: string; videoIds: string[] }

export type CreateProjectResult = {
  projectId: string
  userId: string
  status: 'completed'
  message: string
  outputFilename: string
  totalDurationSeconds: number
  entries: TimelineEntry[]
  warnings: string[]
}

export type RenderProjectInput = {
  userId: string
  projectId: string
  // Omitted or null: derive from the timeline's cut markers.
  segmentsToKeep?: Segment[] | null
  audioFileName?: string | null
}

export type RenderProjectResult = {
  projectId: string
  userId: string
  status: 'completed'
  message: string
  outputFilename: string
  mode: RenderMode
  source: 'explicit' | 'derived'
  segments: Segment[]
  warnings: string[]
}

export type CutMarkerInput = { time: number; reason: string }

export type ProjectSummary = {
  userId: string
  projectId: string
  videoIdsCount: number
  fullDescriptionSize: number
  cutMarkerCount: number
  outputFilename: string | null
  previewFilename: string | null
  storageFilesPresence: Record<string, boolean>
}
