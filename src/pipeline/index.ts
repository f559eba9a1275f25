/**
 * Pipeline orchestrator.
 *
 * One run: fetch the paper, write the script, render every scene on a bounded
 * pool (resolve asset → synthesize narration → render clip), compose the
 * timeline, mix in music, and move the finished file into OUTPUT_DIR.
 *
 * All intermediate files live in a per-run workspace that is removed however
 * the run ends. A run either returns a RunResult (possibly with warnings) or
 * throws exactly one PipelineError; it never leaves a partial output file.
 */
import { randomUUID } from 'crypto';
import * as path from 'path';
import type { AspectMode, PipelineSettings } from '../config.js';
import type { Paper, PaperSource } from '../sources/paper.js';
import {
  CancelledError,
  CompositionError,
  FetchError,
  PipelineError,
  RenderError,
  ScriptGenError,
  errorMessage,
  type AssetWarning,
  type PipelineStage,
  type PipelineWarning,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/pool.js';
import { withRetry } from '../utils/retry.js';
import { safeFileStem } from '../utils/text.js';
import { moveIntoPlace, withRunWorkspace, type RunWorkspace } from '../utils/workspace.js';
import { resolveAsset, type AssetSource } from './assets.js';
import { composeTimeline } from './composer.js';
import { mixAudio } from './mixer.js';
import { synthesizeNarration, type Speaker } from './narration.js';
import { renderScene, renderTitleCard, type RenderContext, type SceneClip } from './renderer.js';
import type { Script } from './script.js';
import type { ScriptWriter } from './scriptwriter.js';

// ── Public types ──────────────────────────────────────────────────────────────

export interface RenderConfig {
  aspectMode?: AspectMode;
  backgroundMusic?: Buffer;
  /** Intro card before the first scene and outro card after the last. */
  titleCards?: boolean;
  /** Per-clip fade in/out; 0 means hard cuts. */
  fadeSeconds?: number;
}

export interface VideoArtifact {
  path: string;
  durationSeconds: number;
  aspectMode: AspectMode;
  hasMusic: boolean;
  sceneCount: number;
}

export interface RunResult {
  runId: string;
  artifact: VideoArtifact;
  warnings: PipelineWarning[];
}

export type PipelineEvent =
  | { type: 'stage'; runId: string; stage: PipelineStage }
  | { type: 'scene'; runId: string; sceneNumber: number; total: number; durationSeconds: number; assetSource: AssetSource }
  | { type: 'warning'; runId: string; warning: PipelineWarning }
  | { type: 'done'; runId: string; result: RunResult }
  | { type: 'failed'; runId: string; error: PipelineError };

export interface RunOptions {
  signal?: AbortSignal;
  onEvent?: (event: PipelineEvent) => void;
  /** Defaults to a random UUID. */
  runId?: string;
}

export interface PipelineCollaborators {
  paperSource: PaperSource;
  scriptWriter: ScriptWriter;
  speaker: Speaker;
}

export interface Pipeline {
  run(paperId: string, config?: RenderConfig, options?: RunOptions): Promise<RunResult>;
}

const OUTRO_HEADING = 'Thank You for Watching!';
const OUTRO_SUBTITLE = 'Generated by paper2video';

// ── Error mapping ─────────────────────────────────────────────────────────────

/** Map anything thrown during `stage` onto the PipelineError taxonomy. */
export function toPipelineError(err: unknown, stage: PipelineStage, signal?: AbortSignal): PipelineError {
  if (signal?.aborted) return err instanceof CancelledError ? err : new CancelledError(stage);
  if (err instanceof PipelineError) return err;

  const message = errorMessage(err);
  switch (stage) {
    case 'fetching':  return new FetchError(`Paper fetch failed: ${message}`, err);
    case 'scripting': return new ScriptGenError(`Script generation failed: ${message}`, err);
    case 'rendering': return new RenderError(`Rendering failed: ${message}`, undefined, err);
    case 'composing': return new CompositionError(`Composition failed: ${message}`, err);
    case 'mixing':    return new PipelineError(`Mixing failed: ${message}`, 'mixing', { cause: err });
  }
}

// ── Orchestrator ──────────────────────────────────────────────────────────────

interface RenderedScene {
  clip: SceneClip;
  warning?: AssetWarning;
}

export function createPipeline(settings: PipelineSettings, collaborators: PipelineCollaborators): Pipeline {
  const { paperSource, scriptWriter, speaker } = collaborators;

  async function renderAllScenes(
    paper: Paper,
    script: Script,
    ctx: RenderContext,
    emit: (e: PipelineEvent) => void,
    runId: string,
  ): Promise<RenderedScene[]> {
    const total = script.length;

    return mapWithConcurrency(script, settings.maxConcurrency, async (scene, index, signal) => {
      const sceneNumber = index + 1;
      const stem = `scene-${String(sceneNumber).padStart(2, '0')}`;
      try {
        const { asset, warning } = await resolveAsset(scene, sceneNumber, paper.figures, ctx.aspectMode);

        const narration = await withRetry(
          () => synthesizeNarration(scene.narration, ctx.workspace.file(`${stem}.mp3`), speaker, sceneNumber, signal),
          {
            maxAttempts: settings.synthesisRetries + 1,
            baseDelayMs: settings.retryBaseDelayMs,
            signal,
            label: `narration for scene ${sceneNumber}`,
          },
        );
        signal.throwIfAborted();

        const clip = await renderScene(scene, asset, narration, { sceneNumber, total }, { ...ctx, signal });
        // Abandoned by the pool: the run has already failed or been cancelled.
        if (!signal.aborted) {
          emit({ type: 'scene', runId, sceneNumber, total, durationSeconds: clip.durationSeconds, assetSource: asset.source });
        }
        return warning ? { clip, warning } : { clip };
      } catch (err) {
        if (signal.aborted || err instanceof PipelineError) throw err;
        throw new RenderError(`Scene ${sceneNumber} failed: ${errorMessage(err)}`, sceneNumber, err);
      }
    }, ctx.signal);
  }

  async function execute(
    paperId: string,
    config: RenderConfig,
    ws: RunWorkspace,
    signal: AbortSignal | undefined,
    emit: (e: PipelineEvent) => void,
    enter: (stage: PipelineStage) => void,
  ): Promise<RunResult> {
    const runId = ws.runId;
    const aspectMode = config.aspectMode ?? settings.defaultAspect;
    const warnings: PipelineWarning[] = [];
    const warn = (w: PipelineWarning) => {
      warnings.push(w);
      emit({ type: 'warning', runId, warning: w });
    };

    // ── Fetch ─────────────────────────────────────────────────────────────
    enter('fetching');
    const paper = await paperSource.fetch(paperId, ws.dir, signal);
    logger.info('Pipeline: paper fetched', { runId, paperId: paper.id, figures: paper.figures.length });

    // ── Script ────────────────────────────────────────────────────────────
    signal?.throwIfAborted();
    enter('scripting');
    const script = await scriptWriter.generateScript(paper, settings.targetScenes, signal);
    logger.info('Pipeline: script ready', { runId, scenes: script.length });

    // ── Scenes ────────────────────────────────────────────────────────────
    signal?.throwIfAborted();
    enter('rendering');
    const ctx: RenderContext = {
      aspectMode,
      fontFile: settings.fontFile,
      fadeSeconds: config.fadeSeconds ?? 0,
      workspace: ws,
      signal,
    };
    const rendered = await renderAllScenes(paper, script, ctx, emit, runId);
    for (const { warning } of rendered) {
      if (warning) warn(warning);
    }

    const clips = rendered.map(r => r.clip);
    if (config.titleCards) {
      clips.unshift(await renderTitleCard('intro', paper.title, `arXiv:${paper.id}`, ctx));
      clips.push(await renderTitleCard('outro', OUTRO_HEADING, OUTRO_SUBTITLE, ctx));
    }

    // ── Compose ───────────────────────────────────────────────────────────
    signal?.throwIfAborted();
    enter('composing');
    const timeline = await composeTimeline(clips, ws.file('timeline.mp4'), ws.file('concat.txt'), signal);

    // ── Mix ───────────────────────────────────────────────────────────────
    signal?.throwIfAborted();
    enter('mixing');
    const mixed = await mixAudio({
      timeline,
      music: config.backgroundMusic,
      musicPath: ws.file('music-input'),
      outputPath: ws.file('final.mp4'),
      signal,
    });
    if (mixed.warning) warn(mixed.warning);

    signal?.throwIfAborted();
    const finalPath = path.resolve(settings.outputDir, `${safeFileStem(paper.id)}-${aspectMode}.mp4`);
    await moveIntoPlace(mixed.path, finalPath);

    return {
      runId,
      artifact: {
        path: finalPath,
        durationSeconds: mixed.durationSeconds,
        aspectMode,
        hasMusic: mixed.hasMusic,
        sceneCount: script.length,
      },
      warnings,
    };
  }

  return {
    async run(paperId, config = {}, options = {}) {
      const { signal, onEvent } = options;
      const runId = options.runId ?? randomUUID();
      let stage: PipelineStage = 'fetching';

      const emit = (event: PipelineEvent): void => {
        if (!onEvent) return;
        try {
          onEvent(event);
        } catch (err) {
          logger.warn('Pipeline: event listener threw', { runId, event: event.type, err });
        }
      };
      const enter = (next: PipelineStage): void => {
        stage = next;
        logger.info(`Pipeline: ${next}`, { runId });
        emit({ type: 'stage', runId, stage: next });
      };

      logger.info('Pipeline: run started', { runId, paperId, aspectMode: config.aspectMode ?? settings.defaultAspect });
      try {
        signal?.throwIfAborted();
        const result = await withRunWorkspace(settings.tempDir, runId, ws =>
          execute(paperId, config, ws, signal, emit, enter),
        );
        logger.info('Pipeline: run complete', {
          runId,
          path: result.artifact.path,
          durationSeconds: result.artifact.durationSeconds,
          warnings: result.warnings.length,
        });
        emit({ type: 'done', runId, result });
        return result;
      } catch (err) {
        const error = toPipelineError(err, stage, signal);
        logger.error('Pipeline: run failed', { runId, stage: error.stage, sceneNumber: error.sceneNumber, err: error });
        emit({ type: 'failed', runId, error });
        throw error;
      }
    },
  };
}
