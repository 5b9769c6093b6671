import fs from 'fs'
import path from 'path'
import { NotFoundError } from '../core/errors'
import type { MediaProbe } from '../services/ffmpeg/probe'
import type { FfmpegRunner } from '../services/ffmpeg/runner'
import type { CaptionOracle } from '../services/gemini'
import type { BlobInfo, BlobStore } from '../services/storage/blobStore'
import type { MetadataDoc, MetadataStore } from '../services/storage/metadataStore'

export class InMemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, { body: Buffer; contentType: string }>()
  readonly uploads: string[] = []

  put(key: string, body: string | Buffer = 'blob', contentType = 'video/mp4') {
    this.blobs.set(key, { body: Buffer.from(body), contentType })
  }

  async exists(key: string): Promise<boolean> {
    return this.blobs.has(key)
  }

  async download(key: string, filePath: string): Promise<void> {
    const blob = this.blobs.get(key)
    if (!blob) throw new NotFoundError(`File not found in storage: ${key}`)
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, blob.body)
  }

  async upload(key: string, filePath: string, contentType: string): Promise<void> {
    this.blobs.set(key, { body: fs.readFileSync(filePath), contentType })
    this.uploads.push(key)
  }

  async list(prefix: string): Promise<BlobInfo[]> {
    return [...this.blobs.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, blob]) => ({ key, size: blob.body.length, updatedAt: null }))
  }
}

export class InMemoryMetadataStore implements MetadataStore {
  readonly docs = new Map<string, MetadataDoc>()

  async get(p: string): Promise<unknown> {
    const doc = this.docs.get(p)
    return doc === undefined ? null : structuredClone(doc)
  }

  async set(p: string, doc: MetadataDoc): Promise<void> {
    this.docs.set(p, structuredClone(doc))
  }

  async update(p: string, patch: MetadataDoc): Promise<void> {
    this.docs.set(p, { ...(this.docs.get(p) ?? {}), ...structuredClone(patch) })
  }
}

/**
 * Records every argument list and writes a placeholder to the output path
 * (always the last argument). `fail` lets a test make a call reject.
 */
export function createRecordingRunner(fail?: (args: string[]) => Error | null) {
  const calls: string[][] = []
  const runner: FfmpegRunner = async (args) => {
    calls.push([...args])
    const err = fail ? fail(args) : null
    if (err) throw err
    const out = args[args.length - 1]
    fs.mkdirSync(path.dirname(out), { recursive: true })
    fs.writeFileSync(out, 'rendered')
  }
  return { calls, runner }
}

// Durations are looked up by file basename; unknown files report `fallback`.
export function createFakeProbe(durations: Record<string, number> = {}, opts: { hasAudio?: boolean; fallback?: number } = {}) {
  const probed: string[] = []
  const probe: MediaProbe = {
    async durationSeconds(filePath) {
      probed.push(filePath)
      return durations[path.basename(filePath)] ?? opts.fallback ?? 10
    },
    async hasAudioStream() {
      return opts.hasAudio ?? true
    },
  }
  return { probe, probed }
}

export class FakeCaptionOracle implements CaptionOracle {
  calls = 0
  summarized: string[][] = []

  constructor(private readonly failOnCalls: number[] = []) {}

  async captionImage(_image: Buffer, _prompt: string): Promise<string> {
    this.calls += 1
    if (this.failOnCalls.includes(this.calls)) throw new Error('caption_unavailable')
    return `caption ${this.calls}`
  }

  async summarize(captions: string[]): Promise<string> {
    this.summarized.push(captions)
    return `summary of ${captions.length}`
  }
}
