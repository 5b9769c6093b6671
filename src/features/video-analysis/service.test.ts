import { describe, it, expect } from 'vitest'
import { NotFoundError } from '../../core/errors'
import type { FfmpegRunner } from '../../services/ffmpeg/runner'
import { StagingAdapter } from '../../services/staging'
import { createFakeProbe, createRecordingRunner, FakeCaptionOracle, InMemoryBlobStore, InMemoryMetadataStore } from '../../testing/fakes'
import { VideoAnalysisRepo } from './repo'
import { VideoAnalysisService } from './service'

function setup(opts: { failCaptionCalls?: number[]; runner?: FfmpegRunner } = {}) {
  const blobs = new InMemoryBlobStore()
  const metadata = new InMemoryMetadataStore()
  const { probe } = createFakeProbe({ 'clip.mp4': 20 })
  const oracle = new FakeCaptionOracle(opts.failCaptionCalls)
  const runner = opts.runner ?? createRecordingRunner().runner
  const service = new VideoAnalysisService(new VideoAnalysisRepo(metadata), new StagingAdapter(blobs, probe), oracle, {
    intervalSeconds: 6,
    runner,
  })
  return { blobs, metadata, oracle, service }
}

describe('VideoAnalysisService.processVideo', () => {
  it('captions sampled frames and stores a completed record', async () => {
    const ctx = setup({ failCaptionCalls: [2] })
    ctx.blobs.put('videos/u1/clip.mp4')
    const result = await ctx.service.processVideo('u1', 'clip.mp4')

    expect(result).toMatchObject({
      id: 'clip_mp4',
      userId: 'u1',
      status: 'completed',
      frameDescriptions: { '00:00:03': 'caption 1', '00:00:15': 'caption 3' },
      summary: 'summary of 2',
    })
    expect(ctx.oracle.summarized).toEqual([['caption 1', 'caption 3']])
    expect(await ctx.metadata.get('video_analysis/u1/clip_mp4')).toMatchObject({ status: 'completed', user_id: 'u1' })
  })

  it('stores an empty summary when no frame could be captioned', async () => {
    const ctx = setup({ failCaptionCalls: [1, 2, 3] })
    ctx.blobs.put('videos/u1/clip.mp4')
    const result = await ctx.service.processVideo('u1', 'clip.mp4')
    expect(result.frameDescriptions).toEqual({})
    expect(result.summary).toBe('')
    expect(ctx.oracle.summarized).toEqual([])
  })

  it('rejects a video that is not in storage', async () => {
    const ctx = setup()
    await expect(ctx.service.processVideo('u1', 'clip.mp4')).rejects.toThrow('Video not found in storage: videos/u1/clip.mp4')
    expect(await ctx.metadata.get('video_analysis/u1/clip_mp4')).toBeNull()
  })

  it('marks the record failed when frame sampling fails', async () => {
    const ctx = setup({ runner: createRecordingRunner(() => new Error('spawn ffmpeg ENOENT')).runner })
    ctx.blobs.put('videos/u1/clip.mp4')
    await expect(ctx.service.processVideo('u1', 'clip.mp4')).rejects.toThrow('spawn ffmpeg ENOENT')
    expect(await ctx.metadata.get('video_analysis/u1/clip_mp4')).toEqual({ status: 'failed' })
  })
})

describe('VideoAnalysisService.getVideoResult', () => {
  it('returns completed records only', async () => {
    const ctx = setup()
    ctx.blobs.put('videos/u1/clip.mp4')
    await ctx.service.processVideo('u1', 'clip.mp4')
    expect((await ctx.service.getVideoResult('u1', 'clip.mp4')).status).toBe('completed')

    await ctx.metadata.update('video_analysis/u1/clip_mp4', { status: 'processing' })
    await expect(ctx.service.getVideoResult('u1', 'clip.mp4')).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('VideoAnalysisService.listVideos', () => {
  it('lists video files, optionally for one user', async () => {
    const ctx = setup()
    ctx.blobs.put('videos/u1/a.mp4')
    ctx.blobs.put('videos/u1/notes.txt')
    ctx.blobs.put('videos/u2/b.MOV')

    expect(await ctx.service.listVideos('u1')).toEqual([
      { userId: 'u1', videoFilename: 'a.mp4', path: 'videos/u1/a.mp4', size: 4, updatedAt: null },
    ])
    expect((await ctx.service.listVideos()).map((v) => v.path)).toEqual(['videos/u1/a.mp4', 'videos/u2/b.MOV'])
  })
})
