import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFeedprobeDir, ensureParentDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  verify: z
    .object({
      workers: z.number().int().positive().default(10),
      fetch_timeout_ms: z.number().int().positive().default(5000),
      task_timeout_ms: z.number().int().positive().default(10000),
      max_titles: z.number().int().positive().default(5),
      user_agent: z.string().default('feedprobe/0.1'),
    })
    .default({}),

  audit: z
    .object({
      min_title_length: z.number().int().nonnegative().default(10),
      min_titles: z.number().int().nonnegative().default(3),
    })
    .default({}),

  output: z
    .object({
      path: z.string().default('./artifacts/rss_data.json'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  ensureParentDir(configPath);
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Apply FEEDPROBE_* environment overrides on top of the raw file config.
 * Values are passed through as numbers and left to the schema to reject.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const overrides: Array<[string, string | undefined]> = [
    ['workers', env['FEEDPROBE_WORKERS']],
    ['task_timeout_ms', env['FEEDPROBE_TASK_TIMEOUT_MS']],
    ['max_titles', env['FEEDPROBE_MAX_TITLES']],
  ];
  const present = overrides.filter(([, value]) => value !== undefined && value !== '');
  if (present.length === 0) return rawConfig;

  const existing = rawConfig['verify'];
  const verify: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
  for (const [key, value] of present) {
    verify[key] = Number(value);
  }
  return { ...rawConfig, verify };
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/** Command-line values for the verify section, as typed by the user. */
export interface VerifyOverrides {
  workers?: string;
  /** Per-URL limit: bounds both the HTTP request and the whole task. */
  timeout?: string;
  maxTitles?: string;
}

/**
 * Layer command-line overrides on a loaded config and validate the result
 * with the same schema, so a bad flag fails before any URL is dispatched.
 */
export function applyVerifyOverrides(config: Config, overrides: VerifyOverrides): Config {
  const verify: Record<string, unknown> = { ...config.verify };
  if (overrides.workers !== undefined) verify['workers'] = Number(overrides.workers);
  if (overrides.timeout !== undefined) {
    const timeoutMs = Number(overrides.timeout);
    verify['task_timeout_ms'] = timeoutMs;
    verify['fetch_timeout_ms'] = timeoutMs;
  }
  if (overrides.maxTitles !== undefined) verify['max_titles'] = Number(overrides.maxTitles);
  return parseConfig({ ...config, verify });
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedprobe', {
    searchPlaces: [
      'feedprobe.config.yaml',
      'feedprobe.config.yml',
      '.feedproberc.yaml',
      '.feedproberc.yml',
    ],
  });

  const envConfigPath = process.env['FEEDPROBE_CONFIG'];
  const defaultConfigPath = path.join(getFeedprobeDir(), 'config.yaml');

  let loaded: unknown = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    loaded = result?.config ?? {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    loaded = result?.config ?? {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  if (!isRecord(loaded)) {
    throw new ConfigError('Config file must contain a mapping at the top level');
  }

  cachedConfig = parseConfig(applyEnvOverrides(loaded));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
