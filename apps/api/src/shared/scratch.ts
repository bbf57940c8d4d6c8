import { randomUUID } from 'crypto';
import { rm } from 'fs/promises';
import { join } from 'path';
import { SOURCE_EXTENSION, TARGET_EXTENSION } from '@mdocx/shared';
import { logger } from './logger';

/**
 * Paths for one request's scratch artifacts. Both share the same token, so
 * they never collide with another request's artifacts in the same directory.
 */
export interface ScratchArtifacts {
  token: string;
  inputPath: string;
  outputPath: string;
}

export function createScratchArtifacts(
  scratchDir: string,
  generateToken: () => string = randomUUID,
): ScratchArtifacts {
  const token = generateToken();
  return {
    token,
    inputPath: join(scratchDir, `${token}${SOURCE_EXTENSION}`),
    outputPath: join(scratchDir, `${token}${TARGET_EXTENSION}`),
  };
}

/**
 * Deletes every artifact path that exists. Failures are logged and dropped so
 * they cannot replace the outcome the caller already has.
 */
export async function releaseScratchArtifacts(artifacts: ScratchArtifacts): Promise<void> {
  for (const path of [artifacts.inputPath, artifacts.outputPath]) {
    try {
      await rm(path, { force: true });
    } catch (cleanupErr) {
      logger.warn({ token: artifacts.token, path, err: cleanupErr }, 'Failed to remove scratch artifact');
    }
  }
}

/**
 * Runs `work` with a fresh pair of scratch paths and removes both files when
 * `work` settles, whether it resolved or threw.
 */
export async function withScratchArtifacts<T>(
  scratchDir: string,
  work: (artifacts: ScratchArtifacts) => Promise<T>,
  generateToken?: () => string,
): Promise<T> {
  const artifacts = createScratchArtifacts(scratchDir, generateToken);
  try {
    return await work(artifacts);
  } finally {
    await releaseScratchArtifacts(artifacts);
  }
}
