#!/usr/bin/env node
/**
 * paper2video: command-line entry point.
 *
 *   paper2video run <arxiv-id> [--portrait] [--music <file>] [--title-cards] [--fade <seconds>]
 *
 * Prints the finished video's path on success and exits 1 with the failing
 * stage (and scene, where there is one) otherwise.
 */
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { z } from 'zod';
import { createClaudeClient } from './ai/claude.js';
import { createOpenAiSpeaker } from './ai/voice.js';
import { loadEnv, requireSecret, toPipelineSettings, type AspectMode } from './config.js';
import { createPipeline, type PipelineEvent, type RenderConfig } from './pipeline/index.js';
import { createClaudeScriptWriter } from './pipeline/scriptwriter.js';
import { createArxivSource } from './sources/arxiv.js';
import { ConfigError, PipelineError } from './utils/errors.js';
import { logger } from './utils/logger.js';

const USAGE = `Usage:
  paper2video run <arxiv-id> [options]

Options:
  --portrait           9:16 output (default comes from DEFAULT_ASPECT)
  --landscape          16:9 output
  --music <file>       background music laid under the narration
  --title-cards        add intro and outro cards
  --fade <seconds>     fade each scene in and out
  -h, --help           show this message`;

const FadeSchema = z.coerce.number().min(0).max(2);

// ── Progress ──────────────────────────────────────────────────────────────────

function reportProgress(event: PipelineEvent): void {
  switch (event.type) {
    case 'scene':
      process.stdout.write(`  scene ${event.sceneNumber}/${event.total} rendered (${event.durationSeconds.toFixed(1)}s, ${event.assetSource})\n`);
      break;
    case 'warning':
      process.stdout.write(`  warning: ${event.warning.message}\n`);
      break;
    case 'stage':
    case 'done':
    case 'failed':
      break;
  }
}

// ── Commands ──────────────────────────────────────────────────────────────────

async function runCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      portrait:      { type: 'boolean' },
      landscape:     { type: 'boolean' },
      music:         { type: 'string' },
      'title-cards': { type: 'boolean' },
      fade:          { type: 'string' },
    },
  });

  const paperId = positionals[0];
  if (!paperId) throw new ConfigError(`Missing paper id\n\n${USAGE}`);
  if (values.portrait && values.landscape) throw new ConfigError('--portrait and --landscape are mutually exclusive');

  const fade = FadeSchema.safeParse(values.fade ?? 0);
  if (!fade.success) throw new ConfigError(`--fade must be a number of seconds between 0 and 2 (got "${values.fade}")`);

  const env = loadEnv();
  const settings = toPipelineSettings(env);

  const pipeline = createPipeline(settings, {
    paperSource: createArxivSource({ apiUrl: env.ARXIV_API_URL }),
    scriptWriter: createClaudeScriptWriter(createClaudeClient({
      apiKey: requireSecret(env, 'ANTHROPIC_API_KEY'),
      model: env.LLM_MODEL,
      maxTokens: env.LLM_MAX_TOKENS,
      temperature: env.LLM_TEMPERATURE,
    })),
    speaker: createOpenAiSpeaker({
      apiKey: requireSecret(env, 'OPENAI_API_KEY'),
      model: env.TTS_MODEL,
      voice: env.TTS_VOICE,
    }),
  });

  let aspectMode: AspectMode | undefined;
  if (values.portrait) aspectMode = 'portrait';
  if (values.landscape) aspectMode = 'landscape';

  const config: RenderConfig = {
    aspectMode,
    backgroundMusic: values.music ? await readFile(values.music) : undefined,
    titleCards: values['title-cards'] ?? false,
    fadeSeconds: fade.data,
  };

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, cancelling run');
    controller.abort();
  });

  const result = await pipeline.run(paperId, config, { signal: controller.signal, onEvent: reportProgress });
  process.stdout.write(`${result.artifact.path}\n`);
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, ...rest] = process.argv;

async function main(): Promise<void> {
  switch (command) {
    case 'run':
      await runCommand(rest);
      break;

    case undefined:
    case 'help':
    case '-h':
    case '--help':
      process.stdout.write(`${USAGE}\n`);
      break;

    default:
      throw new ConfigError(`Unknown command "${command}"\n\n${USAGE}`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof PipelineError) {
    logger.error('Run failed', { stage: err.stage, sceneNumber: err.sceneNumber, err });
  } else {
    logger.error('Fatal error', { err });
  }
  process.exit(1);
});
