import { z } from 'zod';
import { compileNoisePatterns } from '../analysis/noise-filter.js';
import { OTHER_TEAM } from '../analysis/team-classifier.js';

function isValidPattern(pattern: string): boolean {
  try {
    compileNoisePatterns([pattern]);
    return true;
  } catch {
    return false;
  }
}

const PatternSchema = z.string().min(1).refine(isValidPattern, {
  message: 'must be a valid regular expression',
});

const HttpConfigSchema = z
  .object({
    /** Attempts per request for network errors and 5xx responses. */
    maxAttempts: z.number().int().min(1).default(3),
    /** Backoff before retry N is backoffBaseSeconds^N seconds. */
    backoffBaseSeconds: z.number().min(0).default(2),
    /** Per-attempt timeout in milliseconds. */
    timeoutMs: z.number().int().positive().default(30_000),
    /** Wait after a 429 without a usable Retry-After header. */
    defaultRetryAfterSeconds: z.number().min(0).default(5),
    /** 429 responses tolerated per request before giving up. */
    maxRateLimitRetries: z.number().int().min(0).default(10),
  })
  .default({});

const NoiseConfigSchema = z
  .object({
    /** Version tag of the pattern set, recorded in logs. */
    version: z.string().min(1).default('1'),
    /** Replaces the built-in pattern list when set. */
    patterns: z.array(PatternSchema).nullish(),
    /** Appended to the built-in (or replaced) pattern list. */
    extraPatterns: z.array(PatternSchema).default([]),
    minLength: z.number().int().min(0).default(4),
    systemActorPrefix: z.string().default('microsoft.visualstudio.services.tfs'),
  })
  .default({});

const TeamsSchema = z
  .record(z.string().min(1), z.array(z.string().min(1)))
  .refine((teams) => !Object.keys(teams).some((label) => label.toLowerCase() === OTHER_TEAM), {
    message: `"${OTHER_TEAM}" is reserved for authors outside every team`,
  })
  .default({
    team_a: ['user1@example.com'],
    team_b: ['user2@example.com'],
  });

export const InsightsConfigSchema = z.object({
  /** Azure DevOps organization name. */
  organization: z.string().min(1),
  /** Azure DevOps project name. */
  project: z.string().min(1),
  /** REST API version sent with every request. */
  apiVersion: z.string().min(1).default('7.1'),
  /** Personal Access Token. Supports ${ENV_VAR} syntax. */
  auth: z
    .object({
      pat: z.string().default('${AZURE_DEVOPS_PAT}'),
    })
    .default({}),
  /** Team label → member identities (unique names). */
  teams: TeamsSchema,
  noise: NoiseConfigSchema,
  http: HttpConfigSchema,
  /** Directory that receives the workbook, charts and run report. */
  outputDir: z.string().default('.'),
  /** Directory for JSON-lines log files. */
  logDir: z.string().default('logs'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type InsightsConfig = z.infer<typeof InsightsConfigSchema>;
