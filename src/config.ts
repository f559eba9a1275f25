import { availableParallelism } from 'os';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './utils/errors.js';

dotenvConfig();

// ── Domain Types ─────────────────────────────────────────────────────────────

export const ASPECT_MODES = ['landscape', 'portrait'] as const;

export type AspectMode = typeof ASPECT_MODES[number];

export const TTS_MODELS = ['tts-1', 'tts-1-hd'] as const;

export const TTS_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

// ── Env Schema ────────────────────────────────────────────────────────────────

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const LOG_FORMATS = ['text', 'json'] as const;

// `KEY=` lines in .env come through as empty strings
const optionalSecret = z
  .string()
  .transform(v => v.trim() || undefined)
  .optional();

const EnvSchema = z.object({
  // Script generation
  ANTHROPIC_API_KEY:    optionalSecret,
  LLM_MODEL:            z.string().min(1).default('claude-sonnet-4-6'),
  LLM_MAX_TOKENS:       z.coerce.number().int().positive().default(2048),
  LLM_TEMPERATURE:      z.coerce.number().min(0).max(1).default(0.7),

  // Narration
  OPENAI_API_KEY:       optionalSecret,
  TTS_MODEL:            z.enum(TTS_MODELS).default('tts-1'),
  TTS_VOICE:            z.enum(TTS_VOICES).default('alloy'),

  // Paper source
  ARXIV_API_URL:        z.string().url().default('https://export.arxiv.org/api/query'),

  // Pipeline
  TARGET_SCENES:        z.coerce.number().int().min(1).max(12).default(5),
  MAX_CONCURRENCY:      z.coerce.number().int().min(1).default(3),
  SYNTHESIS_RETRIES:    z.coerce.number().int().min(0).max(5).default(2),
  RETRY_BASE_DELAY_MS:  z.coerce.number().int().min(0).default(1_000),
  DEFAULT_ASPECT:       z.enum(ASPECT_MODES).default('landscape'),

  // Local storage
  TEMP_DIR:             z.string().min(1).default('/tmp/paper2video'),
  OUTPUT_DIR:           z.string().min(1).default('./output'),
  FONT_FILE:            z.string().min(1).default('/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf'),

  // Logging
  LOG_LEVEL:            z.enum(LOG_LEVELS).default('info'),
  LOG_FORMAT:           z.enum(LOG_FORMATS).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new ConfigError(`Missing or invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export function requireSecret(
  env: Env,
  key: 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY',
): string {
  const value = env[key];
  if (!value) throw new ConfigError(`${key} is not set (see npm run check-env)`);
  return value;
}

// The logger is the only consumer of ambient env; a bad LOG_LEVEL must not
// stop the process from reporting why it is exiting.
const LogEnvSchema = z.object({
  LOG_LEVEL:  z.enum(LOG_LEVELS).catch('info'),
  LOG_FORMAT: z.enum(LOG_FORMATS).catch('text'),
});

export const logEnv = LogEnvSchema.parse({
  LOG_LEVEL:  process.env['LOG_LEVEL'] ?? 'info',
  LOG_FORMAT: process.env['LOG_FORMAT'] ?? 'text',
});

// ── Pipeline Settings ─────────────────────────────────────────────────────────

/** Everything one pipeline instance needs, resolved once and passed in explicitly. */
export interface PipelineSettings {
  tempDir:          string;
  outputDir:        string;
  fontFile:         string;
  defaultAspect:    AspectMode;
  targetScenes:     number;
  maxConcurrency:   number;
  synthesisRetries: number;
  retryBaseDelayMs: number;
}

export function toPipelineSettings(env: Env): PipelineSettings {
  return {
    tempDir:          env.TEMP_DIR,
    outputDir:        env.OUTPUT_DIR,
    fontFile:         env.FONT_FILE,
    defaultAspect:    env.DEFAULT_ASPECT,
    targetScenes:     env.TARGET_SCENES,
    maxConcurrency:   Math.max(1, Math.min(env.MAX_CONCURRENCY, availableParallelism())),
    synthesisRetries: env.SYNTHESIS_RETRIES,
    retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
  };
}

// ── Frame & Encoding ──────────────────────────────────────────────────────────

export const FRAME: Record<AspectMode, { width: number; height: number }> = {
  landscape: { width: 1280, height: 720 },
  portrait:  { width: 720,  height: 1280 },
};

export const ENCODING = {
  fps:           24,
  videoCodec:    'libx264',
  preset:        'fast',
  crf:           23,
  pixelFormat:   'yuv420p',
  audioCodec:    'aac',
  audioBitrate:  '128k',
  sampleRate:    44_100,
  channelLayout: 'stereo',
} as const;

// ── Timing & Mixing ───────────────────────────────────────────────────────────

export const TIMING = {
  trailingPadSeconds:   0.3,  // silence after each narration so speech is never cut
  titleCardSeconds:     3,
  musicFadeOutSeconds:  2,
} as const;

export const MIX = {
  musicVolume: 0.2,
} as const;

// ── Slide Palette ─────────────────────────────────────────────────────────────

export const PALETTE = {
  slide:        '#f8f9fa',
  titleBar:     '#1a1a1a',
  titleBarAlpha: 0.6,
  titleText:    '#ffffff',
  caption:      '#2c3e50',
  counter:      '#dddddd',
  accent:       '#3498db',
  placeholder:  '#2c3e50',
  introCard:    '#2c3e50',
  outroCard:    '#27ae60',
  cardText:     '#ffffff',
  cardSubtitle: '#ecf0f1',
} as const;
