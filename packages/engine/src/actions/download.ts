import type { DownloadFormat } from '../download/download-orchestrator.js';
import type { SessionController } from '../session/session-controller.js';
import { printJson } from '../utils/json.js';
import { toVideoInfoOutput } from './info.js';
import type { WritableLike } from './session.js';

type RunDownloadActionOptions = {
  url: string;
  output: string;
  format: DownloadFormat;
  quality: string;
  pretty: boolean;
};

export async function runDownloadAction(
  controller: Pick<SessionController, 'download'>,
  options: RunDownloadActionOptions,
  stdout: WritableLike = process.stdout,
): Promise<number> {
  const { url, output, format, quality, pretty } = options;
  const response = await controller.download({ url, outputPath: output, format, quality });

  if (!response.success) {
    printJson(
      response.info
        ? { error: response.error, video_info: toVideoInfoOutput(response.info) }
        : { error: response.error },
      pretty,
      stdout,
    );
    return 0;
  }

  printJson(
    {
      success: true,
      video_info: toVideoInfoOutput(response.info),
      output_path: response.outputPath,
    },
    pretty,
    stdout,
  );
  return 0;
}

export type { RunDownloadActionOptions };
