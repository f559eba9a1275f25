/**
 * Still-image preparation with sharp: scale paper figures into the slide's
 * figure box and draw placeholder cards for scenes without one.
 */
import sharp from 'sharp';
import { PALETTE } from '../config.js';
import { logger } from '../utils/logger.js';
import { charsPerLine, escapeXml, fitFontSize, wrapText } from '../utils/text.js';

export interface PreparedImage {
  png: Buffer;
  width: number;
  height: number;
}

/**
 * Decode `bytes` and scale them to fit inside `maxWidth`×`maxHeight`,
 * preserving aspect ratio. Transparency is flattened onto the slide colour.
 * Throws when the bytes are not a decodable image.
 */
export async function fitFigure(bytes: Buffer, maxWidth: number, maxHeight: number): Promise<PreparedImage> {
  const meta = await sharp(bytes).metadata();
  if (!meta.width || !meta.height) {
    throw new Error(`Image has no dimensions (format: ${meta.format ?? 'unknown'})`);
  }

  const { data, info } = await sharp(bytes)
    .resize(maxWidth, maxHeight, { fit: 'inside' })
    .flatten({ background: PALETTE.slide })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { png: data, width: info.width, height: info.height };
}

function placeholderSvg(label: string, width: number, height: number): string {
  const base = Math.max(18, Math.round(height / 8));
  const fontSize = fitFontSize(label, base, width * 0.85, height * 0.8, 14);
  const lines = wrapText(label, charsPerLine(fontSize, width * 0.85));
  const lineHeight = Math.round(fontSize * 1.5);
  const firstY = Math.round(height / 2 - ((lines.length - 1) * lineHeight) / 2);

  const tspans = lines
    .map((line, i) => `<tspan x="50%" y="${firstY + i * lineHeight}">${escapeXml(line)}</tspan>`)
    .join('');

  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
    `<text font-family="DejaVu Sans, sans-serif" font-size="${fontSize}" fill="${PALETTE.cardText}" ` +
    `text-anchor="middle" dominant-baseline="middle">${tspans}</text></svg>`
  );
}

/**
 * Solid card in the placeholder colour with `label` centred on it.
 * If the text layer cannot be rendered the card is returned without it.
 */
export async function renderPlaceholder(label: string, width: number, height: number): Promise<PreparedImage> {
  const card = () => sharp({
    create: { width, height, channels: 3, background: PALETTE.placeholder },
  });

  try {
    const png = await card()
      .composite([{ input: Buffer.from(placeholderSvg(label, width, height)), top: 0, left: 0 }])
      .png()
      .toBuffer();
    return { png, width, height };
  } catch (err) {
    logger.warn('Images: placeholder text layer failed, using plain card', { err });
    const png = await card().png().toBuffer();
    return { png, width, height };
  }
}
