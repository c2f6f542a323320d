import type { BlockReason } from '../anti-blocking/types.js';
import type { DownloadFailureCode } from '../download/download-orchestrator.js';
import type { VideoInfo } from '../extraction/types.js';

type ResponseMetadata = {
  duration: number;
  sessionId: string;
  blockReason?: BlockReason;
  /** Fields whose selector chain was exhausted. */
  fallbacks?: string[];
};

type InfoErrorCode = 'invalid-resource' | 'browser-unavailable' | 'navigation-failed' | 'unexpected';

type InfoSuccess = {
  success: true;
  info: VideoInfo;
  metadata: ResponseMetadata;
};

type InfoError = {
  success: false;
  error: string;
  errorCode: InfoErrorCode;
  metadata: ResponseMetadata;
};

type InfoResponse = InfoSuccess | InfoError;

type DownloadSuccess = {
  success: true;
  info: VideoInfo;
  outputPath: string;
  metadata: ResponseMetadata;
};

type DownloadError = {
  success: false;
  error: string;
  errorCode: InfoErrorCode | DownloadFailureCode;
  /** Present when the metadata was read before the download failed. */
  info?: VideoInfo;
  metadata: ResponseMetadata;
};

type DownloadResponse = DownloadSuccess | DownloadError;

export type {
  DownloadError,
  DownloadResponse,
  DownloadSuccess,
  InfoError,
  InfoErrorCode,
  InfoResponse,
  InfoSuccess,
  ResponseMetadata,
};
