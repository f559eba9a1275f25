/**
 * Timeline composer: hard-cut concatenation of clips in script order.
 * The timeline's duration is the sum of its clips' durations, computed rather
 * than probed, so it is exact and reproducible.
 */
import * as fs from 'fs/promises';
import { concatenateClips } from '../media/ffmpeg.js';
import { CompositionError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { SceneClip } from './renderer.js';

export interface Timeline {
  path: string;
  durationSeconds: number;
  width: number;
  height: number;
  fps: number;
  clipCount: number;
}

function checkConsistency(clips: readonly SceneClip[]): SceneClip {
  const first = clips[0];
  if (!first) throw new CompositionError('Cannot compose an empty timeline');

  clips.forEach((clip, i) => {
    if (!(clip.durationSeconds > 0)) {
      throw new CompositionError(`Clip ${i + 1} has non-positive duration ${clip.durationSeconds}`);
    }
    if (clip.width !== first.width || clip.height !== first.height || clip.fps !== first.fps) {
      throw new CompositionError(
        `Clip ${i + 1} is ${clip.width}x${clip.height}@${clip.fps}, expected ${first.width}x${first.height}@${first.fps}`,
      );
    }
  });
  return first;
}

export async function composeTimeline(
  clips: readonly SceneClip[],
  outputPath: string,
  listPath: string,
  signal?: AbortSignal,
): Promise<Timeline> {
  const first = checkConsistency(clips);
  const durationSeconds = clips.reduce((sum, c) => sum + c.durationSeconds, 0);

  try {
    if (clips.length === 1) {
      await fs.copyFile(first.path, outputPath);
    } else {
      await concatenateClips(clips.map(c => c.path), outputPath, listPath, signal);
    }
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new CompositionError(`Concatenation failed: ${errorMessage(err)}`, err);
  }

  logger.info('Composer: timeline ready', { clips: clips.length, durationSeconds });
  return {
    path: outputPath,
    durationSeconds,
    width: first.width,
    height: first.height,
    fps: first.fps,
    clipCount: clips.length,
  };
}
