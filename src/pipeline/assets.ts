/**
 * Asset resolver: turns a scene's visual reference into a concrete PNG sized
 * for the slide's figure box. Never throws: anything unusable becomes a
 * placeholder card, and the two unexpected cases (bad index, undecodable
 * figure) are reported as warnings.
 */
import type { AspectMode } from '../config.js';
import { computeLayout } from '../media/layout.js';
import { fitFigure, renderPlaceholder } from '../media/images.js';
import type { Figure } from '../sources/paper.js';
import { errorMessage, type AssetWarning } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Scene } from './script.js';

export type AssetSource = 'figure' | 'generated' | 'fallback';

export interface Asset {
  png: Buffer;
  width: number;
  height: number;
  source: AssetSource;
  figureIndex?: number;
}

export interface ResolvedAsset {
  asset: Asset;
  warning?: AssetWarning;
}

export async function resolveAsset(
  scene: Scene,
  sceneNumber: number,
  figures: readonly Figure[],
  aspectMode: AspectMode,
): Promise<ResolvedAsset> {
  const box = computeLayout(aspectMode).figure;
  const label = scene.title ?? `Scene ${sceneNumber}`;

  const placeholder = async (source: AssetSource, warning?: string): Promise<ResolvedAsset> => {
    const image = await renderPlaceholder(label, box.width, box.height);
    const asset: Asset = { ...image, source };
    if (!warning) return { asset };
    logger.warn('Assets: using placeholder', { sceneNumber, reason: warning });
    return { asset, warning: { kind: 'asset', sceneNumber, message: warning } };
  };

  const visual = scene.visual;
  switch (visual.kind) {
    case 'none':
      return placeholder('fallback');
    case 'generated':
      return placeholder('generated');
    case 'figure': {
      const figure = figures[visual.index];
      if (!figure) {
        return placeholder(
          'fallback',
          `Figure ${visual.index + 1} requested but the paper has ${figures.length} figure(s)`,
        );
      }
      try {
        const image = await fitFigure(figure.bytes, box.width, box.height);
        logger.debug('Assets: figure fitted', { sceneNumber, figure: figure.name, width: image.width, height: image.height });
        return { asset: { ...image, source: 'figure', figureIndex: visual.index } };
      } catch (err) {
        return placeholder('fallback', `Figure ${visual.index + 1} (${figure.name}) could not be decoded: ${errorMessage(err)}`);
      }
    }
  }
}
