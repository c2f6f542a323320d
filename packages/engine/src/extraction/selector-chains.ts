import type { PageReader } from './page-reader.js';

type Locator =
  | { kind: 'css-text'; selector: string }
  | { kind: 'css-attribute'; selector: string; attribute: string }
  | { kind: 'document-title' };

type ChainStep<T> = {
  locator: Locator;
  parse: (raw: string) => T | undefined;
};

type SelectorChain<T> = {
  field: string;
  steps: readonly ChainStep<T>[];
  fallback: T;
};

type ChainResult<T> = {
  value: T;
  /** Index of the winning step, or `undefined` when the fallback was used. */
  step: number | undefined;
};

const SUFFIX_MULTIPLIER: Record<string, number> = { K: 1e3, M: 1e6, B: 1e9 };

/** "1,234 views" → 1234, "2.5K views" → 2500, "10M" → 10000000. */
function parseViewCount(text: string): number | undefined {
  const match = /(\d+(?:\.\d+)?)\s*([KMB]\b)?/i.exec(text.replace(/,/g, ''));
  if (!match?.[1]) {
    return undefined;
  }

  const number = Number.parseFloat(match[1]);
  if (!Number.isFinite(number)) {
    return undefined;
  }

  const multiplier = match[2] ? (SUFFIX_MULTIPLIER[match[2].toUpperCase()] ?? 1) : 1;
  return Math.round(number * multiplier);
}

const CLOCK_DURATION = /^\d{1,2}(?::\d{2}){1,2}$/;
const ISO_DURATION = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/i;

const pad = (value: number): string => String(value).padStart(2, '0');

/** Accepts clock text as shown in the player or an ISO-8601 duration (`PT4M13S` → `4:13`). */
function normalizeDuration(text: string): string | undefined {
  const value = text.trim();
  if (CLOCK_DURATION.test(value)) {
    return value;
  }

  const iso = ISO_DURATION.exec(value);
  if (!iso || (!iso[1] && !iso[2] && !iso[3])) {
    return undefined;
  }

  const hours = Number(iso[1] ?? 0);
  const minutes = Number(iso[2] ?? 0);
  const seconds = Number(iso[3] ?? 0);
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(seconds)}` : `${minutes}:${pad(seconds)}`;
}

const nonEmpty = (raw: string): string | undefined => {
  const value = raw.trim();
  return value.length > 0 ? value : undefined;
};

const withoutSiteSuffix = (raw: string): string | undefined => nonEmpty(raw.replace(/ - YouTube$/, ''));

const cssText = <T>(selector: string, parse: (raw: string) => T | undefined): ChainStep<T> => ({
  locator: { kind: 'css-text', selector },
  parse,
});

const cssAttribute = <T>(
  selector: string,
  attribute: string,
  parse: (raw: string) => T | undefined,
): ChainStep<T> => ({
  locator: { kind: 'css-attribute', selector, attribute },
  parse,
});

const PRIMARY_TITLE_SELECTOR = 'h1.ytd-watch-metadata yt-formatted-string';

const TITLE_CHAIN: SelectorChain<string> = {
  field: 'title',
  steps: [
    cssText(PRIMARY_TITLE_SELECTOR, nonEmpty),
    cssText('h1.ytd-video-primary-info-renderer', nonEmpty),
    cssText('h1.style-scope.ytd-video-primary-info-renderer', nonEmpty),
    cssText("h1[class*='title']", nonEmpty),
    cssText('.ytd-video-primary-info-renderer h1', nonEmpty),
    cssText('#container h1', nonEmpty),
    cssAttribute("meta[property='og:title']", 'content', nonEmpty),
    cssAttribute("meta[name='title']", 'content', nonEmpty),
    { locator: { kind: 'document-title' }, parse: withoutSiteSuffix },
  ],
  fallback: 'Unknown Title',
};

const CHANNEL_CHAIN: SelectorChain<string> = {
  field: 'channel',
  steps: [
    cssText('#channel-name a', nonEmpty),
    cssText('.ytd-channel-name a', nonEmpty),
    cssText('#owner-text a', nonEmpty),
    cssText('.ytd-video-owner-renderer a', nonEmpty),
    cssText("[class*='channel'] a", nonEmpty),
    cssAttribute("[itemprop='author'] [itemprop='name']", 'content', nonEmpty),
  ],
  fallback: 'Unknown Channel',
};

const DURATION_CHAIN: SelectorChain<string | null> = {
  field: 'duration',
  steps: [
    cssText('.ytp-time-duration', normalizeDuration),
    cssText('.ytd-thumbnail-overlay-time-status-renderer', normalizeDuration),
    cssText("[class*='duration']", normalizeDuration),
    cssText('.badge-style-type-simple', normalizeDuration),
    cssAttribute("meta[itemprop='duration']", 'content', normalizeDuration),
  ],
  fallback: null,
};

const VIEW_COUNT_CHAIN: SelectorChain<number | null> = {
  field: 'viewCount',
  steps: [
    cssText('#info #count .view-count', parseViewCount),
    cssText('.ytd-video-view-count-renderer', parseViewCount),
    cssText("[class*='view-count']", parseViewCount),
    cssText('#count .style-scope', parseViewCount),
    cssAttribute("meta[itemprop='interactionCount']", 'content', parseViewCount),
  ],
  fallback: null,
};

const locate = (reader: PageReader, locator: Locator): string | undefined => {
  switch (locator.kind) {
    case 'css-text':
      return reader.text(locator.selector);
    case 'css-attribute':
      return reader.attribute(locator.selector, locator.attribute);
    case 'document-title':
      return reader.documentTitle();
  }
};

/** Walks the chain in declared order; the first step whose parsed value is defined wins. */
function runChain<T>(reader: PageReader, chain: SelectorChain<T>): ChainResult<T> {
  for (const [index, step] of chain.steps.entries()) {
    const raw = locate(reader, step.locator);
    if (raw === undefined) continue;

    const value = step.parse(raw);
    if (value !== undefined) {
      return { value, step: index };
    }
  }

  return { value: chain.fallback, step: undefined };
}

export {
  CHANNEL_CHAIN,
  DURATION_CHAIN,
  normalizeDuration,
  parseViewCount,
  PRIMARY_TITLE_SELECTOR,
  runChain,
  TITLE_CHAIN,
  VIEW_COUNT_CHAIN,
};
export type { ChainResult, ChainStep, Locator, SelectorChain };
