import type { PageReader } from './page-reader.js';

/** Metadata read from one watch page. Produced fresh per call. */
type VideoInfo = {
  id: string;
  title: string;
  channel: string;
  /** Clock text such as `4:13` or `1:02:03`. */
  duration: string | null;
  viewCount: number | null;
  thumbnail: string;
  /** The URL the caller passed in, not the canonical watch URL. */
  url: string;
};

type ExtractionOutcome = {
  info: VideoInfo;
  /** Fields that fell back to their default value. */
  fallbacks: string[];
};

type PageSnapshot = {
  html: string;
  reader: PageReader;
};

export type { ExtractionOutcome, PageSnapshot, VideoInfo };
