/**
 * Scene renderer: one scene (asset + narration + overlay text) to one clip.
 *
 * Layering, back to front:
 *   1. slide background
 *   2. asset, centred in the figure box
 *   3. semi-transparent title bar, accent line
 *   4. title, "Scene i/N" counter, wrapped narration caption
 *
 * The clip runs for the narration plus TIMING.trailingPadSeconds of silence.
 */
import * as fs from 'fs/promises';
import { ENCODING, PALETTE, TIMING, type AspectMode } from '../config.js';
import { renderSlide, type SlideSpec } from '../media/ffmpeg.js';
import { centerIn, computeLayout } from '../media/layout.js';
import { drawBox, drawText, ffmpegColor } from '../media/overlay.js';
import { RenderError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { charsPerLine, clampLines, fitFontSize, linesThatFit, wrapText } from '../utils/text.js';
import type { RunWorkspace } from '../utils/workspace.js';
import type { Asset } from './assets.js';
import type { NarrationClip } from './narration.js';
import type { Scene } from './script.js';

export type ClipKind = 'scene' | 'intro' | 'outro';

export interface SceneClip {
  path: string;
  durationSeconds: number;
  width: number;
  height: number;
  fps: number;
  kind: ClipKind;
}

export interface RenderContext {
  aspectMode: AspectMode;
  fontFile: string;
  fadeSeconds: number;
  workspace: RunWorkspace;
  signal?: AbortSignal;
}

/** Horizontal room kept free at the right of the title bar for the counter. */
const COUNTER_RESERVE = 150;

const pad2 = (n: number) => String(n).padStart(2, '0');

async function writeText(path: string, lines: string[]): Promise<string> {
  await fs.writeFile(path, lines.join('\n'), 'utf-8');
  return path;
}

// ── Scenes ─────────────────────────────────────────────────────────────────────

export async function renderScene(
  scene: Scene,
  asset: Asset,
  narration: NarrationClip,
  position: { sceneNumber: number; total: number },
  ctx: RenderContext,
): Promise<SceneClip> {
  const { sceneNumber, total } = position;
  const layout = computeLayout(ctx.aspectMode);
  const { frame, titleBar, caption, margin, fonts } = layout;
  const stem = `scene-${pad2(sceneNumber)}`;
  const ws = ctx.workspace;
  const durationSeconds = narration.durationSeconds + TIMING.trailingPadSeconds;
  const outputPath = ws.file(`${stem}.mp4`);

  try {
    const imagePath = ws.file(`${stem}.png`);
    await fs.writeFile(imagePath, asset.png);

    const filters = [
      drawBox(titleBar, PALETTE.titleBar, PALETTE.titleBarAlpha),
      drawBox(layout.accentLine, PALETTE.accent),
    ];

    if (scene.title) {
      const titleWidth = titleBar.width - 2 * margin - COUNTER_RESERVE;
      const size = fitFontSize(scene.title, fonts.title.base, titleWidth, titleBar.height - 16, fonts.title.min);
      filters.push(drawText({
        textFile: await writeText(ws.file(`${stem}-title.txt`), wrapText(scene.title, charsPerLine(size, titleWidth))),
        fontFile: ctx.fontFile,
        fontSize: size,
        color: PALETTE.titleText,
        x: margin,
        y: `(${titleBar.height}-text_h)/2`,
        lineSpacing: Math.round(size * 0.15),
        shadow: true,
      }));
    }

    filters.push(drawText({
      textFile: await writeText(ws.file(`${stem}-counter.txt`), [`Scene ${sceneNumber}/${total}`]),
      fontFile: ctx.fontFile,
      fontSize: fonts.counter,
      color: PALETTE.counter,
      x: `w-text_w-${margin}`,
      y: `(${titleBar.height}-text_h)/2`,
    }));

    // Below the minimum font size the caption is cut to its region instead.
    const captionSize = fitFontSize(scene.narration, fonts.caption.base, caption.width, caption.height, fonts.caption.min);
    const captionSpacing = Math.round(captionSize * 0.5);
    const captionChars = charsPerLine(captionSize, caption.width);
    const captionLines = clampLines(
      wrapText(scene.narration, captionChars),
      linesThatFit(caption.height, captionSize, captionSpacing),
      captionChars,
    );
    filters.push(drawText({
      textFile: await writeText(ws.file(`${stem}-caption.txt`), captionLines),
      fontFile: ctx.fontFile,
      fontSize: captionSize,
      color: PALETTE.caption,
      x: caption.x,
      y: caption.y,
      lineSpacing: captionSpacing,
    }));

    const spec: SlideSpec = {
      width: frame.width,
      height: frame.height,
      durationSeconds,
      background: ffmpegColor(PALETTE.slide),
      image: { path: imagePath, ...centerIn(layout.figure, asset.width, asset.height) },
      audioPath: narration.audioPath,
      filters,
      fadeSeconds: ctx.fadeSeconds,
    };
    await renderSlide(spec, outputPath, ctx.signal);
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    throw new RenderError(`Scene ${sceneNumber} failed to render: ${errorMessage(err)}`, sceneNumber, err);
  }

  logger.info('Renderer: scene rendered', { sceneNumber, durationSeconds, source: asset.source });
  return {
    path: outputPath,
    durationSeconds,
    width: frame.width,
    height: frame.height,
    fps: ENCODING.fps,
    kind: 'scene',
  };
}

// ── Title cards ────────────────────────────────────────────────────────────────

const CARD_STYLE = {
  intro: { background: PALETTE.introCard, headingY: 0.35, heading: { landscape: 48, portrait: 36 }, subtitle: { landscape: 28, portrait: 22 } },
  outro: { background: PALETTE.outroCard, headingY: 0.4,  heading: { landscape: 52, portrait: 40 }, subtitle: { landscape: 32, portrait: 24 } },
} as const;

const CARD_SUBTITLE_Y = 0.55;
const CARD_SIDE_MARGIN = 50;

/** Silent fixed-length card before the first scene or after the last. */
export async function renderTitleCard(
  kind: 'intro' | 'outro',
  heading: string,
  subtitle: string,
  ctx: RenderContext,
): Promise<SceneClip> {
  const { frame } = computeLayout(ctx.aspectMode);
  const style = CARD_STYLE[kind];
  const ws = ctx.workspace;
  const textWidth = frame.width - 2 * CARD_SIDE_MARGIN;
  const headingSize = style.heading[ctx.aspectMode];
  const subtitleSize = style.subtitle[ctx.aspectMode];
  const outputPath = ws.file(`${kind}.mp4`);

  try {
    const filters = [
      drawText({
        textFile: await writeText(ws.file(`${kind}-heading.txt`), wrapText(heading, charsPerLine(headingSize, textWidth))),
        fontFile: ctx.fontFile,
        fontSize: headingSize,
        color: PALETTE.cardText,
        x: '(w-text_w)/2',
        y: Math.round(frame.height * style.headingY),
        lineSpacing: Math.round(headingSize * 0.15),
      }),
      drawText({
        textFile: await writeText(ws.file(`${kind}-subtitle.txt`), wrapText(subtitle, charsPerLine(subtitleSize, textWidth))),
        fontFile: ctx.fontFile,
        fontSize: subtitleSize,
        color: PALETTE.cardSubtitle,
        x: '(w-text_w)/2',
        y: Math.round(frame.height * CARD_SUBTITLE_Y),
      }),
    ];

    await renderSlide({
      width: frame.width,
      height: frame.height,
      durationSeconds: TIMING.titleCardSeconds,
      background: ffmpegColor(style.background),
      filters,
      fadeSeconds: ctx.fadeSeconds,
    }, outputPath, ctx.signal);
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    throw new RenderError(`The ${kind} card failed to render: ${errorMessage(err)}`, undefined, err);
  }

  logger.info('Renderer: title card rendered', { kind });
  return {
    path: outputPath,
    durationSeconds: TIMING.titleCardSeconds,
    width: frame.width,
    height: frame.height,
    fps: ENCODING.fps,
    kind,
  };
}
