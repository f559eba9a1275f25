/**
 * Script model and parser.
 *
 * The script writer answers with a line-oriented listing:
 *
 *   Scene 1:
 *   Title: ...
 *   Text: ...
 *   Figure Hint: ...
 *
 * parseScript turns that into validated Scenes. Free-text figure hints are
 * resolved to a VisualReference here, once, so nothing downstream has to
 * interpret prose.
 */
import { z } from 'zod';
import { ScriptGenError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type VisualReference =
  | { kind: 'figure'; index: number }
  | { kind: 'generated' }
  | { kind: 'none' };

export interface Scene {
  readonly title?: string;
  readonly narration: string;
  readonly visual: VisualReference;
  /** Hint as the writer phrased it; kept for logs only. */
  readonly figureHint?: string;
}

export type Script = readonly Scene[];

const VisualSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('figure'), index: z.number().int().min(0) }),
  z.object({ kind: z.literal('generated') }),
  z.object({ kind: z.literal('none') }),
]);

const SceneSchema = z.object({
  title:      z.string().trim().min(1).optional(),
  narration:  z.string().trim().min(1, 'narration must not be empty'),
  visual:     VisualSchema,
  figureHint: z.string().optional(),
});

const ScriptSchema = z.array(SceneSchema).min(1, 'script has no scenes');

/** Validate scenes from any producer. Throws ScriptGenError. */
export function validateScript(scenes: unknown): Script {
  const parsed = ScriptSchema.safeParse(scenes);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'script'}: ${i.message}`).join('; ');
    throw new ScriptGenError(`Invalid script: ${issues}`);
  }
  return parsed.data;
}

// ── Figure hints ──────────────────────────────────────────────────────────────

const FIGURE_NUMBER = /\bfig(?:ure)?\.?\s*(\d+)/i;
const VISUAL_KEYWORDS = ['graph', 'chart', 'plot', 'diagram', 'image', 'photo', 'table'];
const NO_VISUAL = /^(?:none|n\/?a|no figure|-)?\.?$/i;

/**
 * "Figure 3" → figure index 2 (kept even when out of range, so the asset
 * resolver can report it). A visual keyword → the first figure, or a
 * generated card when the paper has none. Empty / "none" → no visual.
 * Anything else → generated card.
 */
export function matchFigureHint(hint: string, figureCount: number): VisualReference {
  const text = hint.trim();
  if (NO_VISUAL.test(text)) return { kind: 'none' };

  const num = FIGURE_NUMBER.exec(text)?.[1];
  if (num !== undefined && Number(num) >= 1) {
    return { kind: 'figure', index: Number(num) - 1 };
  }

  const lower = text.toLowerCase();
  if (VISUAL_KEYWORDS.some(k => lower.includes(k))) {
    return figureCount > 0 ? { kind: 'figure', index: 0 } : { kind: 'generated' };
  }
  return { kind: 'generated' };
}

// ── Parsing ───────────────────────────────────────────────────────────────────

const SCENE_HEADER = /^[\s#*]*Scene\s+\d+\b/i;
const FIELD = /^[\s*-]*(Title|Text|Narration|Figure\s*Hint)\s*\**\s*:\s*\**\s*(.*)$/i;

type FieldName = 'title' | 'text' | 'hint';

function fieldName(label: string): FieldName {
  const l = label.toLowerCase().replace(/\s+/g, '');
  if (l === 'title') return 'title';
  if (l === 'figurehint') return 'hint';
  return 'text';
}

type Block = Partial<Record<FieldName, string>>;

function splitBlocks(raw: string): Block[] {
  const blocks: Block[] = [{}];
  let open: FieldName | undefined;

  for (const line of raw.split(/\r?\n/)) {
    const field = FIELD.exec(line);
    if (field?.[1] !== undefined) {
      const current = blocks[blocks.length - 1];
      open = fieldName(field[1]);
      if (current) current[open] = (field[2] ?? '').replace(/\*+$/, '').trim();
      continue;
    }
    if (SCENE_HEADER.test(line)) {
      blocks.push({});
      open = undefined;
      continue;
    }
    const current = blocks[blocks.length - 1];
    const extra = line.trim();
    if (open && current && extra) {
      current[open] = `${current[open] ?? ''} ${extra}`.trim();
    }
  }
  return blocks;
}

/**
 * Parse the writer's listing. Blocks without both a title and narration are
 * dropped. Throws ScriptGenError when nothing usable remains.
 */
export function parseScript(raw: string, figureCount: number): Script {
  const scenes: Scene[] = [];
  let dropped = 0;

  for (const block of splitBlocks(raw)) {
    if (Object.keys(block).length === 0) continue;
    if (!block.title || !block.text) {
      dropped++;
      continue;
    }
    const hint = block.hint ?? '';
    scenes.push({
      title: block.title,
      narration: block.text,
      visual: matchFigureHint(hint, figureCount),
      ...(hint ? { figureHint: hint } : {}),
    });
  }

  if (dropped > 0) logger.warn('Script: dropped incomplete scene blocks', { dropped });
  if (scenes.length === 0) {
    throw new ScriptGenError('Script writer returned no usable scenes');
  }
  return validateScript(scenes);
}
