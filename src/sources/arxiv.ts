/**
 * arXiv paper source: metadata from the Atom export API, body text and
 * figures from the PDF.
 *
 * Only the metadata lookup is fatal. If the PDF cannot be downloaded or
 * poppler cannot read it, the paper is returned with the abstract as its text
 * and no figures, and every scene falls back to a placeholder visual.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { extractImages, extractText } from '../media/pdf.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Figure, Paper, PaperSource } from './paper.js';

const NEW_STYLE_ID = /^\d{4}\.\d{4,5}(v\d+)?$/;
const OLD_STYLE_ID = /^[a-z-]+(\.[A-Z]{2})?\/\d{7}(v\d+)?$/;

/**
 * Accepts a bare id ("2401.06015", "hep-th/9901001v2") or an abs/pdf URL and
 * returns the bare id. Throws FetchError for anything else.
 */
export function normalizeArxivId(input: string): string {
  const trimmed = input.trim();
  const fromUrl = /arxiv\.org\/(?:abs|pdf)\/(.+?)(?:\.pdf)?\/?$/i.exec(trimmed);
  const id = fromUrl?.[1] ?? trimmed;
  if (!NEW_STYLE_ID.test(id) && !OLD_STYLE_ID.test(id)) {
    throw new FetchError(`Not an arXiv identifier: "${input}"`);
  }
  return id;
}

// ── Atom feed parsing ──────────────────────────────────────────────────────────

export interface ArxivEntry {
  id: string;
  title: string;
  summary: string;
  pdfUrl: string | undefined;
}

const ENTITIES: Record<string, string> = {
  amp: '&', lt: '<', gt: '>', quot: '"', apos: "'",
};

function decodeEntities(s: string): string {
  return s.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, ref: string) => {
    if (ref.startsWith('#x') || ref.startsWith('#X')) return String.fromCodePoint(parseInt(ref.slice(2), 16));
    if (ref.startsWith('#')) return String.fromCodePoint(parseInt(ref.slice(1), 10));
    return ENTITIES[ref.toLowerCase()] ?? whole;
  });
}

function tagText(xml: string, tag: string): string | undefined {
  const m = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`).exec(xml);
  if (m?.[1] === undefined) return undefined;
  return decodeEntities(m[1]).replace(/\s+/g, ' ').trim();
}

/**
 * Extract the first entry of an arXiv Atom response. Returns undefined when
 * the feed has no entry or the entry is the API's error record.
 */
export function parseArxivFeed(xml: string): ArxivEntry | undefined {
  const entry = /<entry>([\s\S]*?)<\/entry>/.exec(xml)?.[1];
  if (!entry) return undefined;

  const id = tagText(entry, 'id');
  const title = tagText(entry, 'title');
  if (!id || !title || id.includes('/api/errors')) return undefined;

  const pdfLink = /<link\b[^>]*\btitle="pdf"[^>]*>/.exec(entry)?.[0];
  const href = pdfLink ? /\bhref="([^"]+)"/.exec(pdfLink)?.[1] : undefined;

  return {
    id,
    title,
    summary: tagText(entry, 'summary') ?? '',
    pdfUrl: href ? decodeEntities(href) : undefined,
  };
}

// ── Source ─────────────────────────────────────────────────────────────────────

export interface ArxivSourceOptions {
  apiUrl: string;
}

async function fetchOk(url: string, what: string, signal?: AbortSignal): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, { signal });
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new FetchError(`${what} request failed: ${errorMessage(err)}`, err);
  }
  if (!res.ok) throw new FetchError(`${what} returned HTTP ${res.status}`);
  return res;
}

async function downloadFigures(pdfUrl: string, workDir: string, signal?: AbortSignal): Promise<{ text: string; figures: Figure[] }> {
  const res = await fetchOk(pdfUrl, 'PDF download', signal);
  const pdfPath = path.join(workDir, 'paper.pdf');
  await fs.writeFile(pdfPath, Buffer.from(await res.arrayBuffer()));

  const text = await extractText(pdfPath, signal);
  const images = await extractImages(pdfPath, path.join(workDir, 'figures'), signal);
  return {
    text,
    figures: images.map((img, index) => ({ index, bytes: img.bytes, name: img.name })),
  };
}

export function createArxivSource(opts: ArxivSourceOptions): PaperSource {
  return {
    async fetch(paperId, workDir, signal) {
      const id = normalizeArxivId(paperId);
      logger.info('arXiv: fetching metadata', { id });

      const url = `${opts.apiUrl}?id_list=${encodeURIComponent(id)}`;
      const res = await fetchOk(url, 'arXiv API', signal);
      const entry = parseArxivFeed(await res.text());
      if (!entry) throw new FetchError(`arXiv has no paper with id ${id}`);

      let fullText = entry.summary;
      let figures: Figure[] = [];
      const pdfUrl = entry.pdfUrl ?? `https://arxiv.org/pdf/${id}`;
      try {
        const extracted = await downloadFigures(pdfUrl, workDir, signal);
        if (extracted.text) fullText = extracted.text;
        figures = extracted.figures;
      } catch (err) {
        if (signal?.aborted) throw err;
        logger.warn('arXiv: PDF extraction failed, continuing with abstract only', { id, err });
      }

      logger.info('arXiv: paper ready', { id, title: entry.title, figures: figures.length, chars: fullText.length });
      return { id, title: entry.title, abstract: entry.summary, fullText, figures };
    },
  };
}
