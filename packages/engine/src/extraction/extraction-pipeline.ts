import type { BrowserSurface } from '@tubeveil/browser-driver';
import { createLogger } from '@tubeveil/logger';
import { HtmlSnapshotReader, type PageReader } from './page-reader.js';
import { thumbnailUrl } from './resource-id.js';
import {
  CHANNEL_CHAIN,
  DURATION_CHAIN,
  PRIMARY_TITLE_SELECTOR,
  runChain,
  TITLE_CHAIN,
  VIEW_COUNT_CHAIN,
  type ChainResult,
} from './selector-chains.js';
import type { ExtractionOutcome, PageSnapshot } from './types.js';

const logger = createLogger('ExtractionPipeline');

/**
 * Turns a loaded watch page into VideoInfo. A selector miss moves to the next
 * step of the field's chain; an exhausted chain yields the field's default.
 */
export class ExtractionPipeline {
  /**
   * Waits (bounded) for the primary title element, then snapshots the
   * document. A timeout is not an error: the snapshot is taken anyway.
   */
  async read(surface: BrowserSurface, timeoutMs: number): Promise<PageSnapshot> {
    const found = await surface.waitForSelector(PRIMARY_TITLE_SELECTOR, timeoutMs);
    if (!found) {
      logger.debug('Primary title selector not found, reading page as is');
    }

    const [html, title] = await Promise.all([surface.content(), surface.title()]);
    return { html, reader: new HtmlSnapshotReader(html, title) };
  }

  extract(reader: PageReader, videoId: string, sourceUrl: string): ExtractionOutcome {
    const fallbacks: string[] = [];
    const track = <T>(field: string, result: ChainResult<T>): T => {
      if (result.step === undefined) {
        fallbacks.push(field);
      } else {
        logger.debug(`${field} resolved by step ${result.step}`);
      }
      return result.value;
    };

    const info = {
      id: videoId,
      title: track(TITLE_CHAIN.field, runChain(reader, TITLE_CHAIN)),
      channel: track(CHANNEL_CHAIN.field, runChain(reader, CHANNEL_CHAIN)),
      duration: track(DURATION_CHAIN.field, runChain(reader, DURATION_CHAIN)),
      viewCount: track(VIEW_COUNT_CHAIN.field, runChain(reader, VIEW_COUNT_CHAIN)),
      thumbnail: thumbnailUrl(videoId),
      url: sourceUrl,
    };

    if (fallbacks.length > 0) {
      logger.warn('Selector chains exhausted for', fallbacks.join(', '));
    }

    return { info, fallbacks };
  }
}
