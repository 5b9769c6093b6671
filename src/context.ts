import { MEDIA_BUCKET } from './config'
import { getPool, type DB } from './db'
import { ProjectsRepo } from './features/projects/repo'
import { ProjectService } from './features/projects/service'
import { VideoAnalysisRepo } from './features/video-analysis/repo'
import { VideoAnalysisService } from './features/video-analysis/service'
import { GeminiCaptionOracle, type CaptionOracle } from './services/gemini'
import { createS3Client } from './services/s3'
import { StagingAdapter } from './services/staging'
import { S3BlobStore, type BlobStore } from './services/storage/blobStore'
import { MysqlMetadataStore, type MetadataStore } from './services/storage/metadataStore'

export type AppContext = {
  blobs: BlobStore
  metadata: MetadataStore
  staging: StagingAdapter
  projects: ProjectService
  videoAnalysis: VideoAnalysisService
}

export function createContext(deps: { blobs: BlobStore; metadata: MetadataStore; oracle: CaptionOracle; staging?: StagingAdapter }): AppContext {
  const staging = deps.staging ?? new StagingAdapter(deps.blobs)
  const analysisRepo = new VideoAnalysisRepo(deps.metadata)
  return {
    blobs: deps.blobs,
    metadata: deps.metadata,
    staging,
    projects: new ProjectService(new ProjectsRepo(deps.metadata), analysisRepo, staging),
    videoAnalysis: new VideoAnalysisService(analysisRepo, staging, deps.oracle),
  }
}

// Process-lifetime handles wired from the environment.
export function createDefaultContext(db: DB = getPool()): AppContext {
  return createContext({
    blobs: new S3BlobStore(createS3Client(), MEDIA_BUCKET),
    metadata: new MysqlMetadataStore(db),
    oracle: new GeminiCaptionOracle(),
  })
}
