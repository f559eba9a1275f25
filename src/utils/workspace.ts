/**
 * Run-scoped temp storage. Every run gets `<tempDir>/<runId>`; nothing in it
 * outlives the run, whichever way the run ends.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from './logger.js';

export interface RunWorkspace {
  readonly runId: string;
  readonly dir: string;
  /** Absolute path of a file directly inside the workspace. */
  file(name: string): string;
}

export async function withRunWorkspace<T>(
  tempDir: string,
  runId: string,
  fn: (ws: RunWorkspace) => Promise<T>,
): Promise<T> {
  const dir = path.resolve(tempDir, runId);
  await fs.mkdir(dir, { recursive: true });
  logger.debug('Workspace: created', { dir });

  const ws: RunWorkspace = {
    runId,
    dir,
    file: (name) => path.join(dir, name),
  };

  try {
    return await fn(ws);
  } finally {
    // Abandoned tasks may still be writing here; let rm retry on ENOTEMPTY.
    await fs.rm(dir, { recursive: true, force: true, maxRetries: 3, retryDelay: 50 }).then(
      () => logger.debug('Workspace: removed', { dir }),
      (err: unknown) => logger.error('Workspace: cleanup failed', { dir, err }),
    );
  }
}

/**
 * Move a finished file to its final location. The destination only ever
 * appears complete: across filesystems the bytes go to a `.partial` sibling
 * first and are renamed into place.
 */
export async function moveIntoPlace(sourcePath: string, destPath: string): Promise<void> {
  await fs.mkdir(path.dirname(destPath), { recursive: true });
  try {
    await fs.rename(sourcePath, destPath);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    const partial = `${destPath}.partial`;
    try {
      await fs.copyFile(sourcePath, partial);
      await fs.rename(partial, destPath);
    } finally {
      await fs.rm(partial, { force: true });
    }
  }
}
