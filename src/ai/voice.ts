/**
 * Voice synthesis through OpenAI TTS. Returns raw MP3 bytes; writing and
 * probing them is the narration synthesizer's job.
 */
import OpenAI from 'openai';
import type { TTS_MODELS, TTS_VOICES } from '../config.js';
import { logger } from '../utils/logger.js';
import type { Speaker } from '../pipeline/narration.js';

export interface OpenAiSpeakerOptions {
  apiKey: string;
  model: typeof TTS_MODELS[number];
  voice: typeof TTS_VOICES[number];
}

/** OpenAI rejects longer speech input with a 400. */
const OPENAI_MAX_INPUT_CHARS = 4096;

export function createOpenAiSpeaker(opts: OpenAiSpeakerOptions): Speaker {
  const openai = new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 });

  return {
    maxInputChars: OPENAI_MAX_INPUT_CHARS,
    async speak(text, signal) {
      logger.debug('Voice: OpenAI TTS request', { model: opts.model, voice: opts.voice, chars: text.length });
      const res = await openai.audio.speech.create(
        { model: opts.model, voice: opts.voice, input: text, response_format: 'mp3' },
        { signal },
      );
      return Buffer.from(await res.arrayBuffer());
    },
  };
}
