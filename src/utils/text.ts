/**
 * Text fitting for slide overlays. Glyph metrics are approximated: a glyph is
 * ~0.6 of the font size wide and a line takes 1.5× the font size.
 */

const CHAR_WIDTH_RATIO = 0.6;
const LINE_HEIGHT_RATIO = 1.5;

/** How many characters of `fontSize` fit on one line of `maxWidth` pixels. */
export function charsPerLine(fontSize: number, maxWidth: number): number {
  return Math.max(8, Math.floor(maxWidth / (fontSize * CHAR_WIDTH_RATIO)));
}

/**
 * Shrink `baseFontSize` until `text` fits in the box, never going below
 * `minFontSize`.
 */
export function fitFontSize(
  text: string,
  baseFontSize: number,
  maxWidth: number,
  maxHeight: number,
  minFontSize: number,
): number {
  const perLine = Math.floor(maxWidth / (baseFontSize * CHAR_WIDTH_RATIO));
  if (perLine <= 0) return minFontSize;

  const linesNeeded = text.length / perLine;
  const heightNeeded = linesNeeded * baseFontSize * LINE_HEIGHT_RATIO;
  if (heightNeeded <= maxHeight) return baseFontSize;

  const scaled = Math.floor(baseFontSize * (maxHeight / heightNeeded));
  return Math.max(scaled, minFontSize);
}

/**
 * Greedy word wrap. Words longer than `width` are hard-split.
 * Whitespace runs (including newlines) collapse to single spaces.
 */
export function wrapText(text: string, width: number): string[] {
  const words = text.trim().split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    let rest = word;
    while (rest.length > width) {
      if (current) {
        lines.push(current);
        current = '';
      }
      lines.push(rest.slice(0, width));
      rest = rest.slice(width);
    }
    if (!rest) continue;
    if (!current) {
      current = rest;
    } else if (current.length + 1 + rest.length <= width) {
      current += ` ${rest}`;
    } else {
      lines.push(current);
      current = rest;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/** Lines of `fontSize` with `lineSpacing` between them that fit in `maxHeight`. */
export function linesThatFit(maxHeight: number, fontSize: number, lineSpacing: number): number {
  return Math.max(1, Math.floor((maxHeight + lineSpacing) / (fontSize + lineSpacing)));
}

/**
 * Keep the first `maxLines` lines. When any are dropped the last kept line
 * ends in an ellipsis, still within `width` characters.
 */
export function clampLines(lines: string[], maxLines: number, width: number): string[] {
  if (lines.length <= maxLines) return lines;
  const kept = lines.slice(0, Math.max(1, maxLines));
  const last = kept.pop() ?? '';
  const room = Math.max(1, width - 1);
  kept.push(`${last.length > room ? last.slice(0, room).trimEnd() : last}…`);
  return kept;
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Filesystem-safe slug for output names, e.g. "hep-th/9901001v2" → "hep-th_9901001v2". */
export function safeFileStem(s: string): string {
  const stem = s.trim().replace(/[^A-Za-z0-9.-]+/g, '_').replace(/^[._]+|_+$/g, '');
  return stem || 'paper';
}
