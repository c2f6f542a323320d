import type { VideoInfo } from '../extraction/types.js';
import type { SessionController } from '../session/session-controller.js';
import { printJson } from '../utils/json.js';
import type { WritableLike } from './session.js';

type VideoInfoOutput = {
  id: string;
  title: string;
  channel: string;
  duration: string | null;
  view_count: number | null;
  thumbnail: string;
  url: string;
};

export function toVideoInfoOutput(info: VideoInfo): VideoInfoOutput {
  return {
    id: info.id,
    title: info.title,
    channel: info.channel,
    duration: info.duration,
    view_count: info.viewCount,
    thumbnail: info.thumbnail,
    url: info.url,
  };
}

/** Prints the metadata, or `{error}` when it could not be read. Exits 0 either way. */
export async function runInfoAction(
  controller: Pick<SessionController, 'getInfo'>,
  url: string,
  pretty: boolean,
  stdout: WritableLike = process.stdout,
): Promise<number> {
  const response = await controller.getInfo(url);

  if (!response.success) {
    printJson({ error: response.error }, pretty, stdout);
    return 0;
  }

  printJson(toVideoInfoOutput(response.info), pretty, stdout);
  return 0;
}

export type { VideoInfoOutput };
