import fs from 'fs'
import os from 'os'
import path from 'path'
import { TMP_PREFIX } from '../config'
import { NotFoundError } from '../core/errors'
import { sanitizeFilename } from '../utils/naming'
import { mapWithConcurrencyLimit } from '../utils/concurrency'
import { ffprobeMediaProbe, type MediaProbe } from './ffmpeg/probe'
import type { BlobInfo, BlobStore } from './storage/blobStore'

/**
 * Moves blobs between the blob store and per-request working directories.
 * Working directories are never shared between requests.
 */
export class StagingAdapter {
  constructor(
    private readonly blobs: BlobStore,
    private readonly probe: MediaProbe = ffprobeMediaProbe,
    private readonly tmpRoot: string = os.tmpdir()
  ) {}

  localPathFor(ref: string, workDir: string, fileName?: string): string {
    const leaf = fileName || path.posix.basename(ref) || 'blob'
    return path.join(workDir, sanitizeFilename(leaf))
  }

  async exists(ref: string): Promise<boolean> {
    return this.blobs.exists(ref)
  }

  async list(prefix: string): Promise<BlobInfo[]> {
    return this.blobs.list(prefix)
  }

  async stage(ref: string, workDir: string, fileName?: string): Promise<string> {
    if (!(await this.blobs.exists(ref))) throw new NotFoundError(`File not found in storage: ${ref}`)
    const localPath = this.localPathFor(ref, workDir, fileName)
    await this.blobs.download(ref, localPath)
    return localPath
  }

  // Like stage(), but an absent blob yields null instead of an error.
  async stageOptional(ref: string, workDir: string, fileName?: string): Promise<string | null> {
    if (!(await this.blobs.exists(ref))) return null
    const localPath = this.localPathFor(ref, workDir, fileName)
    await this.blobs.download(ref, localPath)
    return localPath
  }

  async stageAll(
    items: ReadonlyArray<{ ref: string; fileName?: string }>,
    workDir: string,
    concurrency: number
  ): Promise<string[]> {
    return mapWithConcurrencyLimit(items, concurrency, (item) => this.stage(item.ref, workDir, item.fileName))
  }

  async probeDuration(localPath: string): Promise<number> {
    return this.probe.durationSeconds(localPath)
  }

  async upload(localPath: string, ref: string, contentType = 'video/mp4'): Promise<void> {
    await this.blobs.upload(ref, localPath, contentType)
  }

  /**
   * Runs `fn` with a fresh temporary directory that is removed however `fn`
   * settles.
   */
  async withWorkDir<T>(label: string, fn: (workDir: string) => Promise<T>): Promise<T> {
    const safeLabel = label.replace(/[^a-zA-Z0-9_-]+/g, '-').slice(0, 40)
    const workDir = fs.mkdtempSync(path.join(this.tmpRoot, `${TMP_PREFIX}${safeLabel}-`))
    try {
      return await fn(workDir)
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true })
    }
  }
}
