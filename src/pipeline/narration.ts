/**
 * Narration synthesizer: one scene's text to one audio file with a measured
 * duration. No retries here; the orchestrator decides how often to try.
 */
import * as fs from 'fs/promises';
import { probeMedia } from '../media/ffmpeg.js';
import { SynthesisError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface Speaker {
  /** Encoded audio (e.g. MP3) for `text`. */
  speak(text: string, signal?: AbortSignal): Promise<Buffer>;
  /** Longest input the provider accepts, in characters. */
  readonly maxInputChars?: number;
}

export interface NarrationClip {
  audioPath: string;
  durationSeconds: number;
}

/** 4xx responses other than timeouts and rate limits will fail the same way again. */
function isClientError(err: unknown): boolean {
  const status = err instanceof Error && 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 && status !== 408 && status !== 429;
}

export async function synthesizeNarration(
  text: string,
  outputPath: string,
  speaker: Speaker,
  sceneNumber: number,
  signal?: AbortSignal,
): Promise<NarrationClip> {
  const input = text.trim();
  if (!input) {
    throw new SynthesisError(`Scene ${sceneNumber} has no narration text`, sceneNumber, { retryable: false });
  }

  if (speaker.maxInputChars !== undefined && input.length > speaker.maxInputChars) {
    throw new SynthesisError(
      `Scene ${sceneNumber} narration is ${input.length} characters; the voice provider accepts at most ${speaker.maxInputChars}`,
      sceneNumber,
      { retryable: false },
    );
  }

  let audio: Buffer;
  try {
    audio = await speaker.speak(input, signal);
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new SynthesisError(`TTS failed for scene ${sceneNumber}: ${errorMessage(err)}`, sceneNumber, {
      retryable: !isClientError(err),
      cause: err,
    });
  }
  if (audio.length === 0) {
    throw new SynthesisError(`TTS returned no audio for scene ${sceneNumber}`, sceneNumber, { retryable: true });
  }

  await fs.writeFile(outputPath, audio);

  let durationSeconds: number;
  try {
    ({ durationSeconds } = await probeMedia(outputPath, signal));
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new SynthesisError(`Narration audio for scene ${sceneNumber} is unreadable`, sceneNumber, { retryable: true, cause: err });
  }
  if (!(durationSeconds > 0)) {
    throw new SynthesisError(`Narration audio for scene ${sceneNumber} has no duration`, sceneNumber, { retryable: true });
  }

  logger.info('Narration: synthesized', { sceneNumber, durationSeconds, bytes: audio.length });
  return { audioPath: outputPath, durationSeconds };
}
