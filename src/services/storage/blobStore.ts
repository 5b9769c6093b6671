import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type ListObjectsV2CommandOutput,
  type S3Client,
} from '@aws-sdk/client-s3'
import fs from 'fs'
import { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import { NotFoundError } from '../../core/errors'

export type BlobInfo = { key: string; size: number; updatedAt: string | null }

export interface BlobStore {
  exists(key: string): Promise<boolean>
  // Rejects with NotFoundError when the key is absent.
  download(key: string, filePath: string): Promise<void>
  upload(key: string, filePath: string, contentType: string): Promise<void>
  list(prefix: string): Promise<BlobInfo[]>
}

function isMissingObjectError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false
  const name = 'name' in err ? String(err.name) : ''
  if (name === 'NotFound' || name === 'NoSuchKey') return true
  const meta = '$metadata' in err ? err.$metadata : null
  if (meta && typeof meta === 'object' && 'httpStatusCode' in meta) return meta.httpStatusCode === 404
  return false
}

export class S3BlobStore implements BlobStore {
  constructor(private readonly s3: S3Client, private readonly bucket: string) {}

  async exists(key: string): Promise<boolean> {
    try {
      await this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }))
      return true
    } catch (err) {
      if (isMissingObjectError(err)) return false
      throw err
    }
  }

  async download(key: string, filePath: string): Promise<void> {
    let body: unknown
    try {
      const resp = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }))
      body = resp.Body
    } catch (err) {
      if (isMissingObjectError(err)) throw new NotFoundError(`File not found in storage: ${key}`)
      throw err
    }
    if (!(body instanceof Readable)) throw new Error('missing_s3_body')
    await pipeline(body, fs.createWriteStream(filePath))
  }

  async upload(key: string, filePath: string, contentType: string): Promise<void> {
    const body = fs.createReadStream(filePath)
    await this.s3.send(
      new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: body, ContentType: contentType, CacheControl: 'no-store' })
    )
  }

  async list(prefix: string): Promise<BlobInfo[]> {
    const out: BlobInfo[] = []
    let token: string | undefined = undefined
    do {
      const page: ListObjectsV2CommandOutput = await this.s3.send(
        new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, ContinuationToken: token })
      )
      for (const o of page.Contents ?? []) {
        if (!o.Key) continue
        out.push({ key: o.Key, size: Number(o.Size ?? 0), updatedAt: o.LastModified ? o.LastModified.toISOString() : null })
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined
    } while (token)
    return out
  }
}
