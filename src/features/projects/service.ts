import path from 'path'
import { STAGING_CONCURRENCY } from '../../config'
import { MissingSourceError, NotFoundError, NotReadyError, RenderFailedError, ValidationError } from '../../core/errors'
import { concatCopyMp4Local } from '../../services/ffmpeg/concatPipeline'
import type { MediaProbe } from '../../services/ffmpeg/probe'
import { renderKeepList } from '../../services/ffmpeg/renderPipeline'
import { FfmpegError, type FfmpegRunner } from '../../services/ffmpeg/runner'
import type { StagingAdapter } from '../../services/staging'
import { KeyedLock } from '../../utils/keyedLock'
import { clipVideoKey, musicFileKey, projectFullKey, projectPath, projectPreviewKey, sanitizeFilename } from '../../utils/naming'
import { writeRequestLog } from '../../utils/requestLog'
import { resolveKeepList, type TimelineSource } from '../cuts/resolver'
import { buildTimeline, clipFromFrameDescriptions, insertCutMarkers } from '../timeline/builder'
import { parseTimeline, serializeTimeline } from '../timeline/format'
import type { Clip, TimelineEntry } from '../timeline/types'
import { ANALYSIS_STATUS_COMPLETED, type VideoAnalysisDoc } from '../video-analysis/types'
import type { VideoAnalysisRepo } from '../video-analysis/repo'
import type { ProjectsRepo } from './repo'
import type {
  CreateProjectInput,
  CreateProjectResult,
  CutMarkerInput,
  ProjectDoc,
  ProjectSummary,
  RenderProjectInput,
  RenderProjectResult,
} from './types'

export type ProjectServiceOptions = {
  stagingConcurrency?: number
  runner?: FfmpegRunner
  probe?: MediaProbe
  // Set to false to skip writing request log files (tests).
  requestLogs?: boolean
}

/**
 * The typed timeline when it still matches the stored text. Text edited by
 * another writer of the metadata store (or a project that predates typed
 * timelines) is parsed instead, so cut lines added there are honoured.
 */
function timelineSourceOf(doc: ProjectDoc): TimelineSource {
  if (doc.timeline && serializeTimeline(doc.timeline) === doc.fullDescription) return { entries: doc.timeline }
  return { text: doc.fullDescription }
}

function timelineOf(doc: ProjectDoc): TimelineEntry[] {
  const source = timelineSourceOf(doc)
  return 'entries' in source ? source.entries : parseTimeline(source.text).entries
}

export class ProjectService {
  private readonly renderLocks = new KeyedLock()

  constructor(
    private readonly projects: ProjectsRepo,
    private readonly analyses: VideoAnalysisRepo,
    private readonly staging: StagingAdapter,
    private readonly opts: ProjectServiceOptions = {}
  ) {}

  private log(name: string, payload: unknown) {
    if (this.opts.requestLogs === false) return
    writeRequestLog(name, payload)
  }

  /**
   * Concatenates the clips into `projects/{user}/{project}/full.mp4` and stores
   * the merged timeline. Nothing is uploaded or persisted unless every clip is
   * analyzed and present in storage.
   */
  async createProject(input: CreateProjectInput): Promise<CreateProjectResult> {
    const { userId, projectId, videoIds } = input
    if (!videoIds.length) throw new ValidationError('No video_ids provided for the project.')

    const analyses: VideoAnalysisDoc[] = []
    for (const videoId of videoIds) {
      const doc = await this.analyses.get(userId, videoId)
      if (!doc || doc.status !== ANALYSIS_STATUS_COMPLETED) throw new NotReadyError(videoId)
      analyses.push(doc)
    }

    const refs = videoIds.map((videoId, i) => ({
      videoId,
      ref: clipVideoKey(userId, videoId),
      fileName: `${String(i).padStart(3, '0')}_${videoId}`,
    }))
    for (const r of refs) {
      if (!(await this.staging.exists(r.ref))) throw new MissingSourceError(r.videoId)
    }

    return this.staging.withWorkDir('project', async (workDir): Promise<CreateProjectResult> => {
      const localPaths = await this.staging.stageAll(refs, workDir, this.opts.stagingConcurrency ?? STAGING_CONCURRENCY)

      // Sequential: each clip's offset depends on the durations before it.
      const clips: Clip[] = []
      const warnings: string[] = []
      for (let i = 0; i < videoIds.length; i++) {
        const durationSeconds = await this.staging.probeDuration(localPaths[i])
        const built = clipFromFrameDescriptions(videoIds[i], analyses[i].frame_descriptions, durationSeconds)
        for (const w of built.warnings) console.warn('frame_description_skipped', w)
        warnings.push(...built.warnings)
        clips.push(built.clip)
      }
      const timeline = buildTimeline(clips)

      const outPath = path.join(workDir, `${sanitizeFilename(projectId)}_full.mp4`)
      try {
        await concatCopyMp4Local({ inputPaths: localPaths, outPath, workDir, runner: this.opts.runner })
      } catch (err) {
        if (err instanceof FfmpegError) throw new RenderFailedError('Concatenating project clips failed.', err.stderr)
        throw err
      }
      console.log(`Concatenated ${localPaths.length} clips for project ${projectId}`)

      const outputFilename = projectFullKey(userId, projectId)
      await this.staging.upload(outPath, outputFilename)

      const doc: ProjectDoc = {
        video_ids: videoIds,
        fullDescription: serializeTimeline(timeline.entries),
        timeline: timeline.entries,
        createdAt: new Date().toISOString(),
        output_filename: outputFilename,
      }
      await this.projects.save(userId, projectId, doc)
      this.log(`project:${userId}:${projectId}`, { videoIds, placements: timeline.placements, entries: timeline.entries.length })

      return {
        projectId,
        userId,
        status: 'completed',
        message: 'Project created and videos concatenated successfully.',
        outputFilename,
        totalDurationSeconds: timeline.totalDurationSeconds,
        entries: timeline.entries,
        warnings,
      }
    })
  }

  /**
   * Renders `projects/{user}/{project}/preview.mp4`. Renders of one project run
   * one at a time; the last to finish owns the preview pointer.
   */
  async renderProject(input: RenderProjectInput): Promise<RenderProjectResult> {
    const { userId, projectId } = input
    return this.renderLocks.run(projectPath(userId, projectId), async (): Promise<RenderProjectResult> => {
      const project = await this.projects.get(userId, projectId)
      if (!project) throw new NotFoundError(`Project ${projectId} not found.`)
      const fullRef = project.output_filename
      if (!fullRef) throw new NotFoundError(`Full video for project ${projectId} not found in storage metadata.`)
      if (!(await this.staging.exists(fullRef))) throw new NotFoundError(`Full video file ${fullRef} not found in storage.`)

      return this.staging.withWorkDir('render', async (workDir): Promise<RenderProjectResult> => {
        let localFull: string | null = null
        const stageFull = async (): Promise<string> => {
          if (localFull == null) localFull = await this.staging.stage(fullRef, workDir, 'full.mp4')
          return localFull
        }

        const resolved = await resolveKeepList({
          explicit: input.segmentsToKeep ?? null,
          timeline: timelineSourceOf(project),
          probeTotalDuration: async () => this.staging.probeDuration(await stageFull()),
        })
        console.log(`Rendering ${projectId} with ${resolved.source} segments`, resolved.segments)

        const inputPath = await stageFull()
        const totalDurationSeconds = resolved.totalDurationSeconds ?? (await this.staging.probeDuration(inputPath))
        const warnings = [...resolved.warnings]

        let audioPath: string | null = null
        if (input.audioFileName) {
          const audioRef = musicFileKey(userId, projectId, input.audioFileName)
          audioPath = await this.staging.stageOptional(audioRef, workDir, `music_${input.audioFileName}`)
          if (!audioPath) {
            const w = `Audio file ${audioRef} not found, using original audio`
            console.warn('replacement_audio_missing', { audioRef })
            warnings.push(w)
          }
        }

        const outPath = path.join(workDir, `${sanitizeFilename(projectId)}_preview.mp4`)
        const plan = await renderKeepList(
          { inputPath, outputPath: outPath, segments: resolved.segments, totalDurationSeconds, audioPath },
          { runner: this.opts.runner, probe: this.opts.probe }
        )

        const outputFilename = projectPreviewKey(userId, projectId)
        await this.staging.upload(outPath, outputFilename)
        await this.projects.update(userId, projectId, { preview_filename: outputFilename, renderedAt: new Date().toISOString() })
        this.log(`render:${userId}:${projectId}`, { mode: plan.mode, source: resolved.source, segments: resolved.segments, warnings })

        return {
          projectId,
          userId,
          status: 'completed',
          message: 'Video rendered successfully.',
          outputFilename,
          mode: plan.mode,
          source: resolved.source,
          segments: resolved.segments,
          warnings,
        }
      })
    })
  }

  async addCutMarkers(userId: string, projectId: string, cuts: CutMarkerInput[]): Promise<TimelineEntry[]> {
    const project = await this.projects.get(userId, projectId)
    if (!project) throw new NotFoundError(`Project ${projectId} not found.`)
    for (const c of cuts) {
      if (!Number.isFinite(c.time) || c.time < 0) throw new ValidationError(`invalid_cut_time:${c.time}`)
    }
    const entries = insertCutMarkers(
      timelineOf(project),
      cuts.map((c) => ({ seconds: c.time, reason: c.reason }))
    )
    await this.projects.update(userId, projectId, { timeline: entries, fullDescription: serializeTimeline(entries) })
    return entries
  }

  async getProjectSummary(userId: string, projectId: string): Promise<ProjectSummary> {
    const project = await this.projects.get(userId, projectId)
    if (!project) throw new NotFoundError('Project not found.')
    const outputFilename = project.output_filename ?? null
    const storageFilesPresence: Record<string, boolean> = {}
    if (outputFilename) {
      storageFilesPresence['full.mp4'] = await this.staging.exists(projectFullKey(userId, projectId))
      storageFilesPresence['preview.mp4'] = await this.staging.exists(projectPreviewKey(userId, projectId))
    }
    return {
      userId,
      projectId,
      videoIdsCount: project.video_ids.length,
      fullDescriptionSize: project.fullDescription.length,
      cutMarkerCount: timelineOf(project).filter((e) => e.kind === 'cut').length,
      outputFilename,
      previewFilename: project.preview_filename ?? null,
      storageFilesPresence,
    }
  }
}
