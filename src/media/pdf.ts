/**
 * PDF text and figure extraction through poppler-utils (pdftotext, pdfimages).
 */
import { execFile } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs/promises';
import * as path from 'path';
import sharp from 'sharp';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

/** Embedded images smaller than this on either side are icons, logos or rules. */
const MIN_FIGURE_SIDE = 120;
const MAX_FIGURES = 30;

export interface ExtractedImage {
  name: string;
  bytes: Buffer;
}

async function runPoppler(tool: string, args: string[], signal?: AbortSignal): Promise<string> {
  try {
    const { stdout } = await execFileAsync(tool, args, {
      signal,
      encoding: 'utf-8',
      maxBuffer: 64 * 1024 * 1024,
    });
    return stdout;
  } catch (err) {
    const stderr = err instanceof Error && 'stderr' in err ? String(err.stderr).trim() : '';
    throw new Error(`${tool} failed: ${stderr || String(err)}`, { cause: err });
  }
}

export async function extractText(pdfPath: string, signal?: AbortSignal): Promise<string> {
  const text = await runPoppler('pdftotext', ['-layout', '-enc', 'UTF-8', pdfPath, '-'], signal);
  return text.replace(/\f/g, '\n').trim();
}

/**
 * Pull embedded raster images out of the PDF in page order.
 * Tiny images are dropped and at most MAX_FIGURES are kept.
 */
export async function extractImages(pdfPath: string, outDir: string, signal?: AbortSignal): Promise<ExtractedImage[]> {
  await fs.mkdir(outDir, { recursive: true });
  await runPoppler('pdfimages', ['-png', pdfPath, path.join(outDir, 'img')], signal);

  const names = (await fs.readdir(outDir)).filter(n => n.endsWith('.png')).sort();
  const images: ExtractedImage[] = [];

  for (const name of names) {
    if (images.length >= MAX_FIGURES) break;
    const bytes = await fs.readFile(path.join(outDir, name));
    try {
      const { width = 0, height = 0 } = await sharp(bytes).metadata();
      if (width < MIN_FIGURE_SIDE || height < MIN_FIGURE_SIDE) continue;
    } catch (err) {
      logger.debug('PDF: skipping unreadable embedded image', { name, err });
      continue;
    }
    images.push({ name, bytes });
  }

  logger.info('PDF: images extracted', { found: names.length, kept: images.length });
  return images;
}
