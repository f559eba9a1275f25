/**
 * Audio mixer: lays optional background music under the narration.
 * Music problems never fail a run: anything wrong with it yields a
 * MusicWarning and the timeline passes through unchanged.
 */
import * as fs from 'fs/promises';
import { MIX, TIMING } from '../config.js';
import { mixMusicBed, probeMedia } from '../media/ffmpeg.js';
import { errorMessage, type MusicWarning } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Timeline } from './composer.js';

export interface MixResult {
  path: string;
  durationSeconds: number;
  hasMusic: boolean;
  warning?: MusicWarning;
}

export interface MixInput {
  timeline: Timeline;
  /** Music bytes as supplied by the caller, if any. */
  music?: Buffer;
  /** Where the music bytes are staged for ffmpeg. */
  musicPath: string;
  outputPath: string;
  signal?: AbortSignal;
}

export async function mixAudio(input: MixInput): Promise<MixResult> {
  const { timeline, music, musicPath, outputPath, signal } = input;

  const passThrough = async (reason?: string): Promise<MixResult> => {
    await fs.copyFile(timeline.path, outputPath);
    const result: MixResult = { path: outputPath, durationSeconds: timeline.durationSeconds, hasMusic: false };
    if (!reason) return result;
    logger.warn('Mixer: music skipped', { reason });
    return { ...result, warning: { kind: 'music', message: reason } };
  };

  if (!music) return passThrough();
  if (music.length === 0) return passThrough('Background music is empty');

  await fs.writeFile(musicPath, music);

  try {
    const info = await probeMedia(musicPath, signal);
    if (!info.hasAudio) return passThrough('Background music has no audio stream');
  } catch (err) {
    if (signal?.aborted) throw err;
    return passThrough(`Background music could not be read: ${errorMessage(err)}`);
  }

  try {
    await mixMusicBed(timeline.path, musicPath, {
      durationSeconds: timeline.durationSeconds,
      volume: MIX.musicVolume,
      fadeOutSeconds: TIMING.musicFadeOutSeconds,
    }, outputPath, signal);
  } catch (err) {
    if (signal?.aborted) throw err;
    await fs.rm(outputPath, { force: true });
    return passThrough(`Background music could not be mixed: ${errorMessage(err)}`);
  }

  logger.info('Mixer: music mixed', { durationSeconds: timeline.durationSeconds, volume: MIX.musicVolume });
  return { path: outputPath, durationSeconds: timeline.durationSeconds, hasMusic: true };
}
