import fs from 'fs'
import path from 'path'
import { FRAME_SAMPLE_INTERVAL_SECONDS } from '../../config'
import { errorMessage } from '../../core/http'
import { NotFoundError } from '../../core/errors'
import { sampleFramesJpeg } from '../../services/ffmpeg/framePipeline'
import type { FfmpegRunner } from '../../services/ffmpeg/runner'
import { CAPTION_PROMPT, type CaptionOracle } from '../../services/gemini'
import type { StagingAdapter } from '../../services/staging'
import { clipVideoKey, clipVideoPrefix, sanitizeKey } from '../../utils/naming'
import { encodeTimecode } from '../../utils/timecode'
import { VideoAnalysisRepo } from './repo'
import { ANALYSIS_STATUS_COMPLETED, type VideoAnalysisDoc, type VideoAnalysisDto } from './types'

const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv']

export type ListedVideo = { userId: string; videoFilename: string; path: string; size: number; updatedAt: string | null }

function mapDoc(doc: VideoAnalysisDoc, userId: string, videoFilename: string): VideoAnalysisDto {
  return {
    id: doc.id ?? sanitizeKey(videoFilename),
    userId: doc.user_id ?? userId,
    status: doc.status,
    frameDescriptions: doc.frame_descriptions,
    summary: doc.summary,
    processedAt: doc.processed_at ?? null,
  }
}

export class VideoAnalysisService {
  constructor(
    private readonly repo: VideoAnalysisRepo,
    private readonly staging: StagingAdapter,
    private readonly oracle: CaptionOracle,
    private readonly opts: { intervalSeconds?: number; runner?: FfmpegRunner } = {}
  ) {}

  /**
   * Samples frames from `videos/{user}/{file}`, captions each one and stores a
   * completed analysis record. A frame whose caption fails is left out.
   */
  async processVideo(userId: string, videoFilename: string): Promise<VideoAnalysisDto> {
    const ref = clipVideoKey(userId, videoFilename)
    if (!(await this.staging.exists(ref))) throw new NotFoundError(`Video not found in storage: ${ref}`)

    await this.repo.markStatus(userId, videoFilename, 'processing')
    try {
      const doc = await this.staging.withWorkDir('analyze', async (workDir) => {
        const localPath = await this.staging.stage(ref, workDir)
        const durationSeconds = await this.staging.probeDuration(localPath)
        const frames = await sampleFramesJpeg({
          inPath: localPath,
          outDir: path.join(workDir, 'frames'),
          durationSeconds,
          intervalSeconds: this.opts.intervalSeconds ?? FRAME_SAMPLE_INTERVAL_SECONDS,
          runner: this.opts.runner,
        })
        console.log(`Sampled ${frames.length} frames from ${ref}`)

        const frameDescriptions: Record<string, string> = {}
        const captions: string[] = []
        for (const frame of frames) {
          try {
            const caption = await this.oracle.captionImage(fs.readFileSync(frame.filePath), CAPTION_PROMPT)
            frameDescriptions[encodeTimecode(frame.seconds)] = caption
            captions.push(caption)
          } catch (err) {
            console.warn('frame_caption_skipped', { ref, seconds: frame.seconds, error: errorMessage(err) })
          }
        }

        const summary = captions.length ? await this.oracle.summarize(captions) : ''
        const result: VideoAnalysisDoc = {
          id: sanitizeKey(videoFilename),
          user_id: userId,
          status: ANALYSIS_STATUS_COMPLETED,
          frame_descriptions: frameDescriptions,
          summary,
          processed_at: new Date().toISOString(),
        }
        return result
      })
      await this.repo.save(userId, videoFilename, doc)
      return mapDoc(doc, userId, videoFilename)
    } catch (err) {
      await this.repo.markStatus(userId, videoFilename, 'failed')
      throw err
    }
  }

  async getVideoResult(userId: string, videoFilename: string): Promise<VideoAnalysisDto> {
    const doc = await this.repo.get(userId, videoFilename)
    if (!doc || doc.status !== ANALYSIS_STATUS_COMPLETED) throw new NotFoundError('Video analysis not found or not completed.')
    return mapDoc(doc, userId, videoFilename)
  }

  async listVideos(userId?: string | null): Promise<ListedVideo[]> {
    const blobs = await this.staging.list(clipVideoPrefix(userId))
    const out: ListedVideo[] = []
    for (const b of blobs) {
      const lower = b.key.toLowerCase()
      if (b.key.endsWith('/') || !VIDEO_EXTENSIONS.some((ext) => lower.endsWith(ext))) continue
      const parts = b.key.split('/')
      if (parts.length < 3) continue
      out.push({ userId: parts[1], videoFilename: parts.slice(2).join('/'), path: b.key, size: b.size, updatedAt: b.updatedAt })
    }
    return out
  }
}
