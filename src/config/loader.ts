import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute } from 'node:path';
import { z } from 'zod';
import { DEFAULT_NOISE_PATTERNS, type NoisePolicy } from '../analysis/noise-filter.js';
import { ConfigurationError } from '../errors.js';
import { exists } from '../util/fs.js';
import { InsightsConfigSchema, type InsightsConfig } from './schema.js';

const JsonObjectSchema = z.record(z.unknown());

export const DEFAULT_CONFIG_FILE = 'comment-insights.config.json';

/**
 * Config as consumed by the runtime: paths absolute, credential resolved
 * and the noise policy assembled.
 */
export interface RuntimeConfig extends Omit<InsightsConfig, 'auth' | 'noise'> {
  readonly auth: { readonly pat: string };
  readonly noisePolicy: NoisePolicy;
}

export interface ConfigOverrides {
  organization?: string;
  project?: string;
  outputDir?: string;
  logLevel?: InsightsConfig['logLevel'];
}

/**
 * Resolve `${ENV_VAR}` references in strings.
 */
export function resolveEnvRef(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)\}/g, (_, name: string) => env[name] ?? '');
}

function toAbsolute(path: string, cwd: string): string {
  return isAbsolute(path) ? path : resolve(cwd, path);
}

async function readConfigFile(absPath: string, required: boolean): Promise<Record<string, unknown>> {
  if (!(await exists(absPath))) {
    if (required) throw new ConfigurationError(`Config file not found: ${absPath}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(absPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Failed to parse config file: ${absPath}`, err);
  }

  const parsed = JsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${absPath}`);
  }
  return parsed.data;
}

/**
 * Load and validate configuration. The file is optional only at its
 * default location; values in `overrides` win over the file.
 *
 * @throws ConfigurationError for a missing or invalid file, invalid values
 *   or a credential that resolves to an empty string.
 */
export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_FILE,
  overrides: ConfigOverrides = {},
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<RuntimeConfig> {
  const cwd = options.cwd ?? process.cwd();
  const absPath = toAbsolute(configPath, cwd);
  const fromFile = await readConfigFile(absPath, configPath !== DEFAULT_CONFIG_FILE);

  const merged: Record<string, unknown> = { ...fromFile };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = InsightsConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid config:\n${issues}`, result.error);
  }

  const { auth, noise, ...config } = result.data;

  const pat = resolveEnvRef(auth.pat, options.env ?? process.env).trim();
  if (!pat) {
    throw new ConfigurationError(
      'No Azure DevOps personal access token configured. Set AZURE_DEVOPS_PAT or auth.pat in the config file.',
    );
  }

  return {
    ...config,
    outputDir: toAbsolute(config.outputDir, cwd),
    logDir: toAbsolute(config.logDir, cwd),
    auth: { pat },
    noisePolicy: {
      version: noise.version,
      minLength: noise.minLength,
      systemActorPrefix: noise.systemActorPrefix,
      patterns: [...(noise.patterns ?? DEFAULT_NOISE_PATTERNS), ...noise.extraPatterns],
    },
  };
}
