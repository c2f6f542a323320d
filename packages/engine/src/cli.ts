#!/usr/bin/env node
import { runDownloadAction } from './actions/download.js';
import { runInfoAction } from './actions/info.js';
import { withSession } from './actions/session.js';
import {
  cliArgsSchema,
  OUTPUT_REQUIRED_MESSAGE,
  parseArgs,
  toEngineOverrides,
} from './cli-args.js';
import { safeLoadEngineConfig } from './config/engine-config.js';
import { printJson } from './utils/json.js';

function printHelp(): void {
  console.error(`tubeveil CLI

Usage:
  tubeveil --url="https://www.youtube.com/watch?v=VIDEO_ID"
  tubeveil --url="https://youtu.be/VIDEO_ID" --pretty
  tubeveil --url="https://youtu.be/VIDEO_ID" --anti-detection --headless
  tubeveil --url="https://youtu.be/VIDEO_ID" --action=download --output="./tmp/%(title)s.%(ext)s"
  tubeveil --url="https://youtu.be/VIDEO_ID" --action=download --format=mp4 --quality=1080 --output="./tmp/video.mp4"

Options:
  --url                 Required. Watch, short, embed or legacy /v/ URL.
  --action              Optional. One of: info, download (default: info).
  --output              Required for download. Output path or yt-dlp template.
  --format              Optional for download. One of: mp3, mp4 (default: mp3).
  --quality             Optional for download. Bitrate for mp3 (default: 192),
                        maximum height for mp4 (default: 720).
  --headless            Optional. Run the browser without a window (default: false).
  --anti-detection      Optional. Evasion flags, scripts and background rotation.
  --advanced-evasion    Optional. Adds simulated interaction before each visit.
                        Implies --anti-detection.
  --continuous-rotation Optional. Rotates identity after every visit.
                        Implies --anti-detection.
  --container           Optional. Adds sandbox-less launch flags for containers.
  --pretty              Optional. Pretty-print JSON output.
  --help                Show this help message.

Environment:
  TUBEVEIL_CHROME_PATH, TUBEVEIL_PROXY_LIST_URL, TUBEVEIL_PROXIES,
  TUBEVEIL_YTDLP_PATH, TUBEVEIL_DOWNLOAD_TIMEOUT_MS, TUBEVEIL_CONTAINER,
  LOG_LEVEL, LOG_PRETTY
`);
}

async function main(): Promise<number> {
  const { help, options } = parseArgs(process.argv.slice(2));

  if (help) {
    printHelp();
    return 0;
  }

  const parsedArgs = cliArgsSchema.safeParse(options);
  if (!parsedArgs.success) {
    console.error(parsedArgs.error.issues[0]?.message ?? 'Invalid arguments');
    printHelp();
    return 1;
  }

  const args = parsedArgs.data;
  if (args.action === 'download' && !args.output) {
    printJson({ error: OUTPUT_REQUIRED_MESSAGE }, args.pretty);
    return 1;
  }
  const output = args.output;

  const loaded = safeLoadEngineConfig(toEngineOverrides(args));
  if (!loaded.success) {
    printJson({ error: loaded.error }, args.pretty, process.stderr);
    return 1;
  }

  return withSession(loaded.config, { pretty: args.pretty }, (controller) => {
    if (args.action === 'download' && output) {
      return runDownloadAction(controller, {
        url: args.url,
        output,
        format: args.format,
        quality: args.quality,
        pretty: args.pretty,
      });
    }

    return runInfoAction(controller, args.url, args.pretty);
  });
}

const exitCode = await main();
process.exitCode = exitCode;
