import { execSync } from 'child_process';
import fs from 'fs';
import path from 'path';

function safe(cmd: string): string | undefined {
  try {
    return execSync(cmd, { stdio: ['ignore', 'pipe', 'ignore'] }).toString().trim();
  } catch {
    // not a git checkout
    return undefined;
  }
}

function readPackageVersion(): string | null {
  try {
    const raw = fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8');
    const parsed: { version?: unknown } = JSON.parse(raw);
    return typeof parsed.version === 'string' ? parsed.version : null;
  } catch {
    return null;
  }
}

const commit = safe('git rev-parse --short=7 HEAD');
const commitDate = safe('git show -s --format=%cI HEAD');
const iso = new Date().toISOString().replace(/[-:]/g, '').replace(/\..+$/, 'Z');
export const BUILD_TAG = `${commit || 'nocmt'}-${(commitDate || iso).replace(/[:]/g, '').replace(/\..+$/, 'Z')}`;
export const PACKAGE_VERSION = readPackageVersion();

export function getVersionInfo() {
  return { version: PACKAGE_VERSION, buildTag: BUILD_TAG, commit: commit || null, commitDate: commitDate || null, now: new Date().toISOString() };
}
