/**
 * Scriptwriter: asks the LLM for a scene-by-scene explainer of a paper and
 * parses the answer into a Script.
 */
import type { ClaudeClient } from '../ai/claude.js';
import type { Paper } from '../sources/paper.js';
import { ScriptGenError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseScript, type Script } from './script.js';

export interface ScriptWriter {
  /** Throws ScriptGenError. */
  generateScript(paper: Paper, targetSceneCount: number, signal?: AbortSignal): Promise<Script>;
}

const SYSTEM_PROMPT =
  'You are a science explainer who turns research papers into short narrated slide videos. ' +
  'You answer only in the exact format requested, with no preamble and no markdown.';

/** Body text sent alongside the abstract is capped to keep the prompt small. */
const MAX_CONTEXT_CHARS = 12_000;

export function buildScriptPrompt(paper: Paper, targetSceneCount: number): string {
  const low = Math.max(1, targetSceneCount - 1);
  const high = targetSceneCount + 1;
  const figureNote = paper.figures.length > 0
    ? `The paper has ${paper.figures.length} figures, numbered 1 to ${paper.figures.length} in order of appearance.`
    : 'No figures could be extracted from the paper; use "none" or describe a visual.';
  const body = paper.fullText && paper.fullText !== paper.abstract
    ? `\nExcerpt:\n${paper.fullText.slice(0, MAX_CONTEXT_CHARS)}\n`
    : '';

  return `Break down the following paper into a ${low}-${high} scene video script.
Each scene should be a short paragraph suitable for a narrated slide.
Also provide a short caption for each scene to use as the slide title.
Try to match each scene with a figure from the paper (figure number or topic).
${figureNote}

Title: ${paper.title}

Abstract: ${paper.abstract}
${body}
Your output must be exactly in the following format:
Scene 1:
Title: ...
Text: ...
Figure Hint: ...
Scene 2:
Title: ...
Text: ...
Figure Hint: ...
...`;
}

export function createClaudeScriptWriter(client: ClaudeClient): ScriptWriter {
  return {
    async generateScript(paper, targetSceneCount, signal) {
      logger.info('Scriptwriter: writing script', { paperId: paper.id, targetSceneCount });

      let raw: string;
      try {
        const res = await client.generateCompletion(buildScriptPrompt(paper, targetSceneCount), SYSTEM_PROMPT, signal);
        raw = res.text;
      } catch (err) {
        if (signal?.aborted) throw err;
        throw new ScriptGenError(`Script generation failed: ${errorMessage(err)}`, err);
      }

      const script = parseScript(raw, paper.figures.length);
      logger.info('Scriptwriter: script ready', { paperId: paper.id, scenes: script.length });
      return script;
    },
  };
}
