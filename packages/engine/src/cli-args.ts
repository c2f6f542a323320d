import { z } from 'zod';
import type { EngineConfigInput } from './config/engine-config.js';
import type { DownloadFormat } from './download/download-orchestrator.js';

type ParsedArgs = {
  help: boolean;
  options: Record<string, string>;
};

const DEFAULT_QUALITY: Record<DownloadFormat, string> = {
  mp3: '192',
  mp4: '720',
};

const OUTPUT_REQUIRED_MESSAGE = 'Output path required for download';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const flagSchema = z
  .preprocess((value) => {
    if (value === undefined) {
      return 'false';
    }

    if (typeof value === 'string') {
      return value.toLowerCase();
    }

    return value;
  }, booleanFromCliSchema);

const optionalTextSchema = (message: string) =>
  z
    .preprocess(
      (value) => {
        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().min(1, message),
    )
    .optional();

const cliArgsSchema = z
  .object({
    url: z
      .string({ required_error: 'Missing required option: --url' })
      .trim()
      .min(1, 'Missing required option: --url'),
    action: z
      .enum(['info', 'download'], {
        errorMap: () => ({ message: 'Invalid --action. Must be one of: info, download' }),
      })
      .default('info'),
    output: optionalTextSchema('Invalid --output path'),
    format: z
      .enum(['mp3', 'mp4'], {
        errorMap: () => ({ message: 'Invalid --format. Must be one of: mp3, mp4' }),
      })
      .default('mp3'),
    quality: optionalTextSchema('Invalid --quality'),
    headless: flagSchema,
    'advanced-evasion': flagSchema,
    'continuous-rotation': flagSchema,
    'anti-detection': flagSchema,
    container: flagSchema,
    pretty: flagSchema,
  })
  .transform((args) => ({
    url: args.url,
    action: args.action,
    output: args.output,
    format: args.format,
    quality: args.quality ?? DEFAULT_QUALITY[args.format],
    headless: args.headless,
    advancedEvasion: args['advanced-evasion'],
    continuousRotation: args['continuous-rotation'],
    antiDetection: args['anti-detection'],
    container: args.container,
    pretty: args.pretty,
  }));

type CliArgs = z.infer<typeof cliArgsSchema>;

/**
 * `--key value`, `--key=value` and bare `--flag` (read as `true`). `--help`
 * and `-h` anywhere request the usage text.
 */
function parseArgs(argv: string[]): ParsedArgs {
  const options: Record<string, string> = {};
  let help = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--help' || arg === '-h' || arg === 'help') {
      help = true;
      continue;
    }
    if (!arg?.startsWith('--')) {
      continue;
    }

    const body = arg.slice(2);
    const separator = body.indexOf('=');
    const key = separator === -1 ? body : body.slice(0, separator);
    const maybeValue = separator === -1 ? undefined : body.slice(separator + 1);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = argv[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { help, options };
}

/** An absent `--container` leaves the decision to `TUBEVEIL_CONTAINER`. */
function toEngineOverrides(args: CliArgs): EngineConfigInput {
  return {
    headless: args.headless,
    antiDetection: args.antiDetection,
    advancedEvasion: args.advancedEvasion,
    continuousRotation: args.continuousRotation,
    container: args.container ? true : undefined,
  };
}

export { cliArgsSchema, DEFAULT_QUALITY, OUTPUT_REQUIRED_MESSAGE, parseArgs, toEngineOverrides };
export type { CliArgs, ParsedArgs };
