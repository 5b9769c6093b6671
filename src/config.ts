import 'dotenv/config';
import path from 'path';

function readPositiveIntEnv(name: string, fallback: number): number {
  const raw = Number(process.env[name] || '');
  if (!Number.isFinite(raw) || raw <= 0) return fallback;
  return Math.floor(raw);
}

export const PORT = Number(process.env.PORT || 3300);
export const AWS_REGION = process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || 'us-west-1';

// Single bucket holding clips, project artifacts and music files
export const MEDIA_BUCKET = process.env.MEDIA_BUCKET || 'cutline-media';

// Captioning oracle
export const GEMINI_API_KEY = process.env.GEMINI_API_KEY || '';
export const GEMINI_MODEL = process.env.GEMINI_MODEL || 'gemini-2.5-flash-lite';

// Staging / analysis
export const STAGING_CONCURRENCY = readPositiveIntEnv('STAGING_CONCURRENCY', 3);
export const FRAME_SAMPLE_INTERVAL_SECONDS = readPositiveIntEnv('FRAME_SAMPLE_INTERVAL_SECONDS', 6);
export const TMP_PREFIX = process.env.TMP_PREFIX || 'cutline-';

// Request logs
export const REQUEST_LOGS_DIR = process.env.REQUEST_LOGS_DIR || path.join(process.cwd(), 'logs', 'request');
