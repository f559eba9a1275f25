/**
 * drawtext/drawbox filter builders for slide overlays.
 *
 * Text always goes through `textfile=` with expansion disabled, so narration
 * can contain any character (colons, quotes, percent signs) without escaping.
 * Only the file paths themselves are quoted into the filter graph.
 */
import type { Box } from './layout.js';

export interface TextSpec {
  textFile: string;
  fontFile: string;
  fontSize: number;
  /** "#rrggbb" */
  color: string;
  /** Pixel offsets or drawtext expressions such as "(w-text_w)/2". */
  x: number | string;
  y: number | string;
  lineSpacing?: number;
  shadow?: boolean;
}

/** "#3498db" → "0x3498db", optionally with an "@alpha" suffix. */
export function ffmpegColor(hex: string, alpha?: number): string {
  const m = /^#?([0-9a-fA-F]{6})$/.exec(hex);
  if (!m?.[1]) throw new Error(`Invalid colour: ${hex}`);
  const base = `0x${m[1].toLowerCase()}`;
  return alpha === undefined ? base : `${base}@${alpha}`;
}

/** Quote a value (usually a path) for use as a filter option. */
export function quoteFilterValue(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function drawText(spec: TextSpec): string {
  const parts = [
    `fontfile=${quoteFilterValue(spec.fontFile)}`,
    `textfile=${quoteFilterValue(spec.textFile)}`,
    'expansion=none',
    `fontsize=${spec.fontSize}`,
    `fontcolor=${ffmpegColor(spec.color)}`,
    `x=${spec.x}`,
    `y=${spec.y}`,
  ];
  if (spec.lineSpacing !== undefined) parts.push(`line_spacing=${spec.lineSpacing}`);
  if (spec.shadow) parts.push('shadowcolor=black@0.6:shadowx=2:shadowy=2');
  return `drawtext=${parts.join(':')}`;
}

export function drawBox(box: Box, color: string, alpha?: number): string {
  return `drawbox=x=${box.x}:y=${box.y}:w=${box.width}:h=${box.height}:color=${ffmpegColor(color, alpha)}:t=fill`;
}
