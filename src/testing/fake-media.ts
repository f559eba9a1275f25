/**
 * In-process stand-in for src/media/ffmpeg.ts, for use with
 *
 *   vi.mock('../media/ffmpeg.js', () => import('../testing/fake-media.js'));
 *
 * "Media" files are small JSON documents recording duration and stream kinds,
 * so durations flow through the pipeline exactly as ffprobe would report them.
 * Anything else is treated as undecodable, the way ffprobe rejects garbage.
 */
import * as fs from 'fs/promises';
import { vi } from 'vitest';
import { z } from 'zod';
// Type-only: a value import here would resolve back to this mock.
import type { MediaInfo, MusicBedOptions, SlideSpec } from '../media/ffmpeg.js';

const FakeMediaSchema = z.object({
  fake: z.literal(true),
  duration: z.number(),
  audio: z.boolean(),
  video: z.boolean(),
  music: z.boolean().default(false),
});

export type FakeMedia = z.infer<typeof FakeMediaSchema>;

export function fakeMediaBytes(media: { duration: number; audio?: boolean; video?: boolean; music?: boolean }): Buffer {
  return Buffer.from(JSON.stringify({
    fake: true,
    duration: media.duration,
    audio: media.audio ?? true,
    video: media.video ?? false,
    music: media.music ?? false,
  }));
}

/** Narration-like audio of the given length. */
export const fakeAudio = (duration: number): Buffer => fakeMediaBytes({ duration, audio: true, video: false });

export async function readFakeMedia(filePath: string): Promise<FakeMedia> {
  const raw = await fs.readFile(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`FFprobe probeMedia failed: ${filePath}: Invalid data found when processing input`, { cause: err });
  }
  const parsed = FakeMediaSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`FFprobe probeMedia failed: ${filePath}: Invalid data found when processing input`);
  }
  return parsed.data;
}

export const probeMedia = vi.fn(async (filePath: string, _signal?: AbortSignal): Promise<MediaInfo> => {
  const media = await readFakeMedia(filePath);
  return { durationSeconds: media.duration, hasAudio: media.audio, hasVideo: media.video };
});

export const renderSlide = vi.fn(async (spec: SlideSpec, outputPath: string, _signal?: AbortSignal): Promise<void> => {
  if (spec.audioPath) await readFakeMedia(spec.audioPath);
  if (spec.image) await fs.access(spec.image.path);
  await fs.writeFile(outputPath, fakeMediaBytes({ duration: spec.durationSeconds, audio: true, video: true }));
});

export const concatenateClips = vi.fn(
  async (clipPaths: readonly string[], outputPath: string, _listPath: string, _signal?: AbortSignal): Promise<void> => {
    let duration = 0;
    for (const p of clipPaths) duration += (await readFakeMedia(p)).duration;
    await fs.writeFile(outputPath, fakeMediaBytes({ duration, audio: true, video: true }));
  },
);

export const mixMusicBed = vi.fn(
  async (videoPath: string, musicPath: string, opts: MusicBedOptions, outputPath: string, _signal?: AbortSignal): Promise<void> => {
    await readFakeMedia(videoPath);
    await readFakeMedia(musicPath);
    await fs.writeFile(outputPath, fakeMediaBytes({ duration: opts.durationSeconds, audio: true, video: true, music: true }));
  },
);
