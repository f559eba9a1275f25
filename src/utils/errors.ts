/**
 * Error taxonomy for a pipeline run.
 *
 * Fatal failures are thrown as PipelineError subclasses and carry the stage
 * they happened in (and the 1-based scene number where one applies).
 * Recoverable problems are plain warning records collected on the run result.
 */

export type PipelineStage = 'fetching' | 'scripting' | 'rendering' | 'composing' | 'mixing';

interface PipelineErrorOptions {
  sceneNumber?: number;
  retryable?: boolean;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly sceneNumber: number | undefined;
  readonly retryable: boolean;

  constructor(message: string, public readonly stage: PipelineStage, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.sceneNumber = options.sceneNumber;
    this.retryable = options.retryable ?? false;
  }
}

export class FetchError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'fetching', { cause });
    this.name = 'FetchError';
  }
}

export class ScriptGenError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'scripting', { cause });
    this.name = 'ScriptGenError';
  }
}

export class SynthesisError extends PipelineError {
  constructor(message: string, sceneNumber: number, options: { retryable: boolean; cause?: unknown }) {
    super(message, 'rendering', { sceneNumber, ...options });
    this.name = 'SynthesisError';
  }
}

export class RenderError extends PipelineError {
  constructor(message: string, sceneNumber: number | undefined, cause?: unknown) {
    super(message, 'rendering', { sceneNumber, cause });
    this.name = 'RenderError';
  }
}

export class CompositionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'composing', { cause });
    this.name = 'CompositionError';
  }
}

export class CancelledError extends PipelineError {
  constructor(stage: PipelineStage) {
    super(`Run cancelled during ${stage}`, stage);
    this.name = 'CancelledError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Warnings ──────────────────────────────────────────────────────────────────

export interface AssetWarning {
  kind: 'asset';
  sceneNumber: number;
  message: string;
}

export interface MusicWarning {
  kind: 'music';
  message: string;
}

export type PipelineWarning = AssetWarning | MusicWarning;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
