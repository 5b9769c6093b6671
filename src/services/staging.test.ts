import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { NotFoundError } from '../core/errors'
import { createFakeProbe, InMemoryBlobStore } from '../testing/fakes'
import { StagingAdapter } from './staging'

describe('StagingAdapter', () => {
  let root: string
  let blobs: InMemoryBlobStore
  let staging: StagingAdapter

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'cutline-test-'))
    blobs = new InMemoryBlobStore()
    staging = new StagingAdapter(blobs, createFakeProbe({ 'a.mp4': 12.5 }).probe, root)
  })

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true })
  })

  it('removes the work directory after the work finishes', async () => {
    let seen = ''
    const result = await staging.withWorkDir('render', async (workDir) => {
      seen = workDir
      fs.writeFileSync(path.join(workDir, 'out.mp4'), 'x')
      return 'done'
    })
    expect(result).toBe('done')
    expect(path.dirname(seen)).toBe(root)
    expect(path.basename(seen).startsWith('cutline-render-')).toBe(true)
    expect(fs.existsSync(seen)).toBe(false)
  })

  it('removes the work directory when the work throws', async () => {
    let seen = ''
    await expect(
      staging.withWorkDir('render', async (workDir) => {
        seen = workDir
        fs.writeFileSync(path.join(workDir, 'partial.mp4'), 'x')
        throw new Error('encoder crashed')
      })
    ).rejects.toThrow('encoder crashed')
    expect(seen).not.toBe('')
    expect(fs.existsSync(seen)).toBe(false)
  })

  it('stages a blob under a sanitized local name and probes it', async () => {
    blobs.put('videos/u1/a.mp4', 'clip-bytes')
    await staging.withWorkDir('stage', async (workDir) => {
      const local = await staging.stage('videos/u1/a.mp4', workDir)
      expect(local).toBe(path.join(workDir, 'a.mp4'))
      expect(fs.readFileSync(local, 'utf8')).toBe('clip-bytes')
      expect(await staging.probeDuration(local)).toBe(12.5)
      expect(staging.localPathFor('x/my clip.mp4', workDir)).toBe(path.join(workDir, 'my_clip.mp4'))
    })
  })

  it('rejects a missing blob but stages optional ones as null', async () => {
    await staging.withWorkDir('stage', async (workDir) => {
      await expect(staging.stage('videos/u1/none.mp4', workDir)).rejects.toBeInstanceOf(NotFoundError)
      expect(await staging.stageOptional('MusicFiles/u1/p1/song.mp3', workDir)).toBeNull()
    })
  })

  it('stages several blobs and returns paths in input order', async () => {
    blobs.put('videos/u1/a.mp4')
    blobs.put('videos/u1/b.mp4')
    await staging.withWorkDir('stage', async (workDir) => {
      const paths = await staging.stageAll(
        [
          { ref: 'videos/u1/b.mp4', fileName: '000_b.mp4' },
          { ref: 'videos/u1/a.mp4', fileName: '001_a.mp4' },
        ],
        workDir,
        2
      )
      expect(paths).toEqual([path.join(workDir, '000_b.mp4'), path.join(workDir, '001_a.mp4')])
    })
  })

  it('uploads a local file as video by default', async () => {
    await staging.withWorkDir('upload', async (workDir) => {
      const local = path.join(workDir, 'preview.mp4')
      fs.writeFileSync(local, 'rendered')
      await staging.upload(local, 'projects/u1/p1/preview.mp4')
    })
    expect(blobs.blobs.get('projects/u1/p1/preview.mp4')?.contentType).toBe('video/mp4')
    expect(blobs.blobs.get('projects/u1/p1/preview.mp4')?.body.toString()).toBe('rendered')
  })
})
