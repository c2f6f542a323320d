import { CHROME_PATH_ENV } from '@tubeveil/browser-driver';
import { z } from 'zod';

const rangeSchema = (min: number, max: number) =>
  z
    .object({ min: z.number().nonnegative(), max: z.number().nonnegative() })
    .refine((range) => range.min <= range.max, { message: 'min must not exceed max' })
    .default({ min, max });

const rotationSchema = z.object({
  requestThreshold: rangeSchema(50, 100),
  intervalSeconds: rangeSchema(600, 900),
  randomChance: z.number().min(0).max(1).default(0.05),
  wakeSeconds: rangeSchema(3, 8),
  joinTimeoutMs: z.number().int().positive().default(5_000),
});

const proxySchema = z.object({
  listUrl: z.string().url().optional(),
  staticProxies: z.array(z.string().min(1)).default([]),
  refreshTimeoutMs: z.number().int().positive().default(5_000),
  maxEntries: z.number().int().positive().default(10),
});

const downloadSchema = z.object({
  binaryPath: z.string().min(1).default('yt-dlp'),
  timeoutMs: z.coerce.number().int().positive().default(300_000),
});

const engineConfigSchema = z.object({
  headless: z.boolean().default(false),
  antiDetection: z.boolean().default(false),
  advancedEvasion: z.boolean().default(false),
  continuousRotation: z.boolean().default(false),
  container: z.boolean().default(false),
  chromePath: z.string().min(1).optional(),
  launchTimeoutMs: z.number().int().positive().default(30_000),
  navigationTimeoutMs: z.number().int().positive().default(30_000),
  selectorTimeoutMs: z.number().int().positive().default(20_000),
  rotation: rotationSchema.default({}),
  proxy: proxySchema.default({}),
  download: downloadSchema.default({}),
});

type EngineConfig = z.infer<typeof engineConfigSchema>;
type EngineConfigInput = z.input<typeof engineConfigSchema>;
type RotationSettings = EngineConfig['rotation'];

const parseFlag = (value: string | undefined): boolean | undefined => {
  if (value === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
};

const parseList = (value: string | undefined): string[] | undefined =>
  value
    ?.split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim().length > 0 ? value.trim() : undefined;

const mergeSources = (overrides: EngineConfigInput, env: NodeJS.ProcessEnv) => ({
  ...overrides,
  chromePath: overrides.chromePath ?? nonEmpty(env[CHROME_PATH_ENV]),
  container: overrides.container ?? parseFlag(env.TUBEVEIL_CONTAINER),
  proxy: {
    ...overrides.proxy,
    listUrl: overrides.proxy?.listUrl ?? nonEmpty(env.TUBEVEIL_PROXY_LIST_URL),
    staticProxies: overrides.proxy?.staticProxies ?? parseList(env.TUBEVEIL_PROXIES),
  },
  download: {
    ...overrides.download,
    binaryPath: overrides.download?.binaryPath ?? nonEmpty(env.TUBEVEIL_YTDLP_PATH),
    timeoutMs: overrides.download?.timeoutMs ?? nonEmpty(env.TUBEVEIL_DOWNLOAD_TIMEOUT_MS),
  },
});

const finalize = (config: EngineConfig): EngineConfig => ({
  ...config,
  antiDetection: config.antiDetection || config.advancedEvasion || config.continuousRotation,
});

/**
 * Builds the engine configuration. Explicit overrides win over environment
 * variables, which win over the schema defaults.
 *
 * Environment:
 * - `TUBEVEIL_CHROME_PATH`: Chromium binary probed before the built-in list
 * - `TUBEVEIL_PROXY_LIST_URL`: newline-delimited `host:port` list source
 * - `TUBEVEIL_PROXIES`: comma-separated static proxies
 * - `TUBEVEIL_YTDLP_PATH`, `TUBEVEIL_DOWNLOAD_TIMEOUT_MS`
 * - `TUBEVEIL_CONTAINER`: add sandbox-less container launch flags
 *
 * Also enables anti-detection whenever advanced evasion or continuous
 * rotation is requested. Throws a ZodError on invalid values.
 */
function loadEngineConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  return finalize(engineConfigSchema.parse(mergeSources(overrides, env)));
}

type ConfigResult = { success: true; config: EngineConfig } | { success: false; error: string };

/** Same as `loadEngineConfig`, reporting the first invalid value instead of throwing. */
function safeLoadEngineConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ConfigResult {
  const parsed = engineConfigSchema.safeParse(mergeSources(overrides, env));
  if (parsed.success) {
    return { success: true, config: finalize(parsed.data) };
  }

  const issue = parsed.error.issues[0];
  const error = issue
    ? `Invalid configuration at ${issue.path.join('.')}: ${issue.message}`
    : 'Invalid configuration';
  return { success: false, error };
}

export { engineConfigSchema, loadEngineConfig, safeLoadEngineConfig };
export type { ConfigResult, EngineConfig, EngineConfigInput, RotationSettings };
