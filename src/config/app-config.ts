/**
 * Application Configuration
 *
 * Combines CLI args, environment variables and defaults into one validated
 * configuration for a snapshot run.
 */

import { z } from 'zod';
import type { CliArgs } from '../cli/args.js';
import { DEFAULT_MAX_HIGHLIGHT, DEFAULT_REFRESH_INTERVAL_MS } from '../lib/constants.js';
import { ConfigError } from '../shared/errors/index.js';
import { LOG_LEVELS } from '../shared/services/logging.service.js';

const numberFromString = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${name} must be a non-negative integer`)
    .transform((value) => Number.parseInt(value, 10));

const AppConfigSchema = z.object({
  url: z.string({ required_error: 'A URL is required (--url <url>)' }).url('url must be a valid URL'),
  highlight: z.boolean(),
  maxHighlight: numberFromString('maxHighlight'),
  headless: z.boolean(),
  executablePath: z.string().min(1).optional(),
  channel: z.enum(['chrome', 'chrome-beta', 'chrome-dev', 'chrome-canary']),
  refresh: numberFromString('refresh'),
  intervalMs: numberFromString('interval'),
  format: z.enum(['json', 'list']),
  logLevel: z.enum(LOG_LEVELS),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

type Env = Record<string, string | undefined>;

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

/**
 * Resolve configuration. CLI args win over environment, environment over defaults.
 *
 * @throws ConfigError when a value is missing or invalid
 */
export function resolveAppConfig(args: CliArgs, env: Env = process.env): AppConfig {
  const result = AppConfigSchema.safeParse({
    url: args.url,
    highlight: args.highlight ?? true,
    maxHighlight: args.maxHighlight ?? String(DEFAULT_MAX_HIGHLIGHT),
    headless: args.headless ?? envBoolean(env.HEADLESS) ?? true,
    executablePath: args.executablePath ?? env.CHROME_PATH,
    channel: args.channel ?? 'chrome',
    refresh: args.refresh ?? '0',
    intervalMs: args.interval ?? String(DEFAULT_REFRESH_INTERVAL_MS),
    format: args.format ?? 'json',
    logLevel: args.logLevel ?? env.LOG_LEVEL ?? 'info',
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(issue?.message ?? 'Invalid configuration', {
      field: issue?.path.join('.'),
    });
  }
  return result.data;
}
