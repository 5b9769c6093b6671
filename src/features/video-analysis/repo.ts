import type { MetadataStore } from '../../services/storage/metadataStore'
import { videoAnalysisPath } from '../../utils/naming'
import { videoAnalysisDocSchema, type VideoAnalysisDoc } from './types'

export class VideoAnalysisRepo {
  constructor(private readonly store: MetadataStore) {}

  // null when the record is absent or not shaped like an analysis record
  async get(userId: string, clipId: string): Promise<VideoAnalysisDoc | null> {
    const raw = await this.store.get(videoAnalysisPath(userId, clipId))
    if (raw == null) return null
    const parsed = videoAnalysisDocSchema.safeParse(raw)
    if (!parsed.success) {
      console.warn('video_analysis_malformed', { userId, clipId, issues: parsed.error.issues.length })
      return null
    }
    return parsed.data
  }

  async save(userId: string, clipId: string, doc: VideoAnalysisDoc): Promise<void> {
    await this.store.set(videoAnalysisPath(userId, clipId), doc)
  }

  async markStatus(userId: string, clipId: string, status: string): Promise<void> {
    await this.store.update(videoAnalysisPath(userId, clipId), { status })
  }
}
