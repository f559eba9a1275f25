/**
 * Core FFmpeg operations: still-slide rendering, clip concatenation,
 * music-bed mixing and stream probing.
 *
 * Every clip this module renders shares one codec profile (ENCODING), which is
 * what lets concatenateClips stream-copy instead of re-encoding.
 * All functions throw on non-zero FFmpeg/FFprobe exit.
 * Callers own the paths they pass in, including cleanup.
 */
import { execFile } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs/promises';
import { z } from 'zod';
import { ENCODING } from '../config.js';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

// ── Helpers ────────────────────────────────────────────────────────────────────

function stderrOf(err: unknown): string {
  if (err instanceof Error && 'stderr' in err) return String(err.stderr).trim();
  return '';
}

async function runFfmpeg(args: string[], label: string, signal?: AbortSignal): Promise<void> {
  logger.debug(`FFmpeg [${label}]`, { args: args.join(' ') });
  try {
    await execFileAsync('ffmpeg', ['-y', '-hide_banner', '-loglevel', 'error', ...args], {
      signal,
      maxBuffer: 16 * 1024 * 1024,
    });
  } catch (err) {
    const stderr = stderrOf(err);
    throw new Error(`FFmpeg ${label} failed: ${stderr || String(err)}`, { cause: err });
  }
}

async function runFfprobe(args: string[], label: string, signal?: AbortSignal): Promise<string> {
  logger.debug(`FFprobe [${label}]`, { args: args.join(' ') });
  try {
    const { stdout } = await execFileAsync('ffprobe', args, { signal, encoding: 'utf-8' });
    return stdout.trim();
  } catch (err) {
    const stderr = stderrOf(err);
    throw new Error(`FFprobe ${label} failed: ${stderr || String(err)}`, { cause: err });
  }
}

const fixed = (seconds: number) => seconds.toFixed(3);

// ── Probing ────────────────────────────────────────────────────────────────────

const ProbeSchema = z.object({
  streams: z.array(z.object({ codec_type: z.string().optional() })).default([]),
  format:  z.object({ duration: z.coerce.number().optional() }).default({}),
});

export interface MediaInfo {
  durationSeconds: number;
  hasAudio: boolean;
  hasVideo: boolean;
}

/**
 * Probe container duration and stream kinds.
 * Throws when ffprobe cannot read the file at all (corrupt or unknown format).
 */
export async function probeMedia(filePath: string, signal?: AbortSignal): Promise<MediaInfo> {
  const raw = await runFfprobe(
    ['-v', 'error', '-show_entries', 'format=duration:stream=codec_type', '-of', 'json', filePath],
    'probeMedia',
    signal,
  );

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`FFprobe probeMedia returned unparseable output for ${filePath}`, { cause: err });
  }
  const parsed = ProbeSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`FFprobe probeMedia returned unexpected JSON for ${filePath}`);
  }

  const duration = parsed.data.format.duration;
  const info: MediaInfo = {
    durationSeconds: duration !== undefined && Number.isFinite(duration) ? duration : 0,
    hasAudio: parsed.data.streams.some(s => s.codec_type === 'audio'),
    hasVideo: parsed.data.streams.some(s => s.codec_type === 'video'),
  };
  logger.debug('FFprobe: media probed', { filePath, ...info });
  return info;
}

// ── Slide rendering ────────────────────────────────────────────────────────────

export interface SlideSpec {
  width: number;
  height: number;
  durationSeconds: number;
  /** FFmpeg colour for the canvas, e.g. "0xf8f9fa" */
  background: string;
  /** Still image composited onto the canvas before `filters` run. */
  image?: { path: string; x: number; y: number };
  /** Narration track; a silent track is generated when absent. */
  audioPath?: string;
  /** drawbox/drawtext filters applied on top, in order (back to front). */
  filters: string[];
  fadeSeconds?: number;
}

/**
 * Build the ffmpeg argument list for a still slide with one audio track.
 * Output is exactly `durationSeconds` long; audio shorter than that is padded
 * with silence.
 */
export function buildSlideArgs(spec: SlideSpec, outputPath: string): string[] {
  const duration = fixed(spec.durationSeconds);
  const fps = String(ENCODING.fps);
  const args = [
    '-f', 'lavfi', '-i', `color=c=${spec.background}:s=${spec.width}x${spec.height}:r=${fps}:d=${duration}`,
  ];
  const graph: string[] = [];
  let videoIn = '[0:v]';

  if (spec.image) {
    args.push('-loop', '1', '-framerate', fps, '-i', spec.image.path);
    graph.push(`[0:v][1:v]overlay=${spec.image.x}:${spec.image.y}:shortest=1[base]`);
    videoIn = '[base]';
  }
  const audioIndex = spec.image ? 2 : 1;

  if (spec.audioPath) {
    args.push('-i', spec.audioPath);
  } else {
    args.push('-f', 'lavfi', '-i', `anullsrc=r=${ENCODING.sampleRate}:cl=${ENCODING.channelLayout}`);
  }

  const chain = [...spec.filters];
  const fade = spec.fadeSeconds ?? 0;
  if (fade > 0) {
    const d = fixed(Math.min(fade, spec.durationSeconds / 2));
    chain.push(`fade=t=in:st=0:d=${d}`);
    chain.push(`fade=t=out:st=${fixed(spec.durationSeconds - Number(d))}:d=${d}`);
  }
  chain.push(`format=${ENCODING.pixelFormat}`);
  graph.push(`${videoIn}${chain.join(',')}[v]`);
  graph.push(
    `[${audioIndex}:a]aformat=sample_rates=${ENCODING.sampleRate}:channel_layouts=${ENCODING.channelLayout},` +
    `apad=whole_dur=${duration}[a]`,
  );

  args.push(
    '-filter_complex', graph.join(';'),
    '-map', '[v]', '-map', '[a]',
    '-t', duration,
    '-r', fps,
    '-c:v', ENCODING.videoCodec, '-preset', ENCODING.preset, '-crf', String(ENCODING.crf),
    '-pix_fmt', ENCODING.pixelFormat,
    '-c:a', ENCODING.audioCodec, '-b:a', ENCODING.audioBitrate,
    '-ar', String(ENCODING.sampleRate), '-ac', '2',
    '-movflags', '+faststart',
    outputPath,
  );
  return args;
}

export async function renderSlide(spec: SlideSpec, outputPath: string, signal?: AbortSignal): Promise<void> {
  logger.info('FFmpeg: rendering slide', {
    outputPath,
    durationSeconds: spec.durationSeconds,
    size: `${spec.width}x${spec.height}`,
  });
  await runFfmpeg(buildSlideArgs(spec, outputPath), 'renderSlide', signal);
}

// ── Concatenation ──────────────────────────────────────────────────────────────

/**
 * Concatenate clips with the concat demuxer. All clips must share codec,
 * resolution and fps (guaranteed for clips from renderSlide).
 * `listPath` is the demuxer list file; it is removed afterwards.
 */
export async function concatenateClips(
  clipPaths: readonly string[],
  outputPath: string,
  listPath: string,
  signal?: AbortSignal,
): Promise<void> {
  logger.info('FFmpeg: concatenating clips', { count: clipPaths.length, outputPath });

  if (clipPaths.length === 0) throw new Error('concatenateClips: no clips provided');

  const listContent = clipPaths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join('\n');
  await fs.writeFile(listPath, listContent, 'utf-8');

  try {
    await runFfmpeg(
      ['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-movflags', '+faststart', outputPath],
      'concatenateClips',
      signal,
    );
  } finally {
    await fs.rm(listPath, { force: true });
  }

  logger.info('FFmpeg: concatenation complete', { outputPath });
}

// ── Music bed ─────────────────────────────────────────────────────────────────

export interface MusicBedOptions {
  durationSeconds: number;
  volume: number;
  fadeOutSeconds: number;
}

/**
 * Loop the bed indefinitely, cut it to exactly the video length, attenuate it
 * and fade it out, then mix it under the existing narration track.
 */
export function buildMusicBedArgs(
  videoPath: string,
  musicPath: string,
  opts: MusicBedOptions,
  outputPath: string,
): string[] {
  const duration = fixed(opts.durationSeconds);
  const fadeLength = Math.min(opts.fadeOutSeconds, opts.durationSeconds);
  const fadeStart = fixed(Math.max(0, opts.durationSeconds - fadeLength));

  const bed =
    `[1:a]atrim=0:${duration},asetpts=N/SR/TB,volume=${opts.volume},` +
    `afade=t=out:st=${fadeStart}:d=${fixed(fadeLength)},` +
    `aformat=sample_rates=${ENCODING.sampleRate}:channel_layouts=${ENCODING.channelLayout}[bed]`;
  const mix = '[0:a][bed]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[out]';

  return [
    '-i', videoPath,
    '-stream_loop', '-1', '-i', musicPath,
    '-filter_complex', `${bed};${mix}`,
    '-map', '0:v', '-map', '[out]',
    '-c:v', 'copy',
    '-c:a', ENCODING.audioCodec, '-b:a', ENCODING.audioBitrate,
    '-t', duration,
    '-movflags', '+faststart',
    outputPath,
  ];
}

export async function mixMusicBed(
  videoPath: string,
  musicPath: string,
  opts: MusicBedOptions,
  outputPath: string,
  signal?: AbortSignal,
): Promise<void> {
  logger.info('FFmpeg: mixing music bed', { musicPath, volume: opts.volume, outputPath });
  await runFfmpeg(buildMusicBedArgs(videoPath, musicPath, opts, outputPath), 'mixMusicBed', signal);
}
