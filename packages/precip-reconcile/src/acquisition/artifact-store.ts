/**
 * Local artifact store for GRIB2 downloads
 *
 * Downloads are idempotent: a file already at the destination is reused
 * without a network call. New payloads are written atomically so a crash
 * never leaves a truncated file that later runs would trust.
 */

import { access } from 'node:fs/promises';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import { fetchArtifact, type FetcherContext } from './artifact-fetcher.js';

const log = createLogger({ module: 'artifact-store' });

export type StoredArtifactStatus = 'downloaded' | 'present' | 'failed';

export interface StoredArtifact {
  readonly key: string;
  readonly url: string;
  readonly path: string;
  readonly status: StoredArtifactStatus;
  /** Network attempts made; 0 when the file was already present */
  readonly attempts: number;
  readonly reason: string;
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Download an artifact to `path` unless it is already there
 */
export async function downloadToFile(
  request: { readonly url: string; readonly key: string },
  path: string,
  context: FetcherContext
): Promise<StoredArtifact> {
  const base = { key: request.key, url: request.url, path };

  if (await fileExists(path)) {
    log.debug('Artifact already present', { path });
    return { ...base, status: 'present', attempts: 0, reason: 'already_present' };
  }

  const outcome = await fetchArtifact(request, context);
  if (outcome.status !== 'success') {
    return { ...base, status: 'failed', attempts: outcome.attempts, reason: outcome.reason };
  }

  try {
    await atomicWriteFile(path, outcome.payload);
  } catch (error) {
    log.error('Failed to store artifact', { path, error: errorMessage(error) });
    return { ...base, status: 'failed', attempts: outcome.attempts, reason: 'write_failed' };
  }

  return { ...base, status: 'downloaded', attempts: outcome.attempts, reason: outcome.reason };
}
