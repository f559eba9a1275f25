/**
 * Slide geometry per aspect mode. All values are integer pixels in frame
 * coordinates (origin top-left).
 *
 *   ┌──────────── title bar ────────────┐  ← title + "Scene i/N" counter
 *   ├──── accent line ────┤
 *   │  caption (wrapped narration)       │
 *   │        ┌── figure box ──┐          │
 *   │        └────────────────┘          │
 *   └────────────────────────────────────┘
 */
import { FRAME, type AspectMode } from '../config.js';

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface SlideLayout {
  frame: { width: number; height: number };
  margin: number;
  titleBar: Box;
  accentLine: Box;
  caption: Box;
  figure: Box;
  fonts: {
    title:   { base: number; min: number };
    caption: { base: number; min: number };
    counter: number;
  };
}

interface LayoutRatios {
  margin: number;
  titleBar: number;
  captionTop: number;
  captionHeight: number;
  figureTop: number;
  figureHeight: number;
  figureWidth: number;
}

const RATIOS: Record<AspectMode, LayoutRatios> = {
  landscape: {
    margin: 0.05, titleBar: 0.15, captionTop: 0.19, captionHeight: 0.25,
    figureTop: 0.47, figureHeight: 0.48, figureWidth: 0.8,
  },
  portrait: {
    margin: 0.05, titleBar: 0.12, captionTop: 0.15, captionHeight: 0.3,
    figureTop: 0.5, figureHeight: 0.42, figureWidth: 0.9,
  },
};

const FONTS: Record<AspectMode, SlideLayout['fonts']> = {
  landscape: { title: { base: 56, min: 16 }, caption: { base: 36, min: 16 }, counter: 22 },
  portrait:  { title: { base: 48, min: 14 }, caption: { base: 28, min: 14 }, counter: 20 },
};

const ACCENT_LINE_HEIGHT = 4;
const ACCENT_LINE_WIDTH = 0.8;

export function computeLayout(aspectMode: AspectMode): SlideLayout {
  const { width, height } = FRAME[aspectMode];
  const r = RATIOS[aspectMode];

  const margin = Math.round(width * r.margin);
  const titleBarHeight = Math.round(height * r.titleBar);
  const accentWidth = Math.round(width * ACCENT_LINE_WIDTH);
  const figureWidth = Math.round(width * r.figureWidth);

  return {
    frame: { width, height },
    margin,
    titleBar: { x: 0, y: 0, width, height: titleBarHeight },
    accentLine: {
      x: Math.round((width - accentWidth) / 2),
      y: titleBarHeight,
      width: accentWidth,
      height: ACCENT_LINE_HEIGHT,
    },
    caption: {
      x: margin,
      y: Math.round(height * r.captionTop),
      width: width - 2 * margin,
      height: Math.round(height * r.captionHeight),
    },
    figure: {
      x: Math.round((width - figureWidth) / 2),
      y: Math.round(height * r.figureTop),
      width: figureWidth,
      height: Math.round(height * r.figureHeight),
    },
    fonts: FONTS[aspectMode],
  };
}

/** Top-left corner that centres an image of the given size inside `box`. */
export function centerIn(box: Box, width: number, height: number): { x: number; y: number } {
  return {
    x: box.x + Math.max(0, Math.floor((box.width - width) / 2)),
    y: box.y + Math.max(0, Math.floor((box.height - height) / 2)),
  };
}
