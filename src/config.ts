import { z } from 'zod';
import type { TraversalMode } from './types/index.js';
import { ConfigurationError } from './core/errors.js';
import { DEFAULT_PORT, DEFAULT_RETRY_POLICY } from './protocols/ftp.js';
import { DEFAULT_DEPTH_CEILING } from './tree/traversal.js';
import { DEFAULT_EXPORT_FILE } from './tree/export.js';

export const DEFAULT_USERNAME = 'anonymous';
export const DEFAULT_PASSWORD = 'anonymous@example.com';

/**
 * Raw values as they arrive from the command line
 */
export interface CliInput {
  server?: string;
  username?: string;
  password?: string;
  maxDepth?: string | number;
  mode?: string;
  json?: boolean;
  output?: string;
  port?: string | number;
  verbose?: boolean;
}

export interface AppConfig {
  server: string;
  port: number;
  username: string;
  password: string;
  /** Inclusive; Infinity when unbounded */
  maxDepth: number;
  mode: TraversalMode;
  json: boolean;
  output: string;
  verbose: boolean;
  maxAttempts: number;
  retryDelay: number;
  depthCeiling: number;
}

const intField = (fallback: number, min: number, max: number) =>
  z.union([z.string(), z.number(), z.undefined()]).transform((value, ctx): number => {
    if (value === undefined || (typeof value === 'string' && value.trim() === '')) {
      return fallback;
    }

    const parsed = typeof value === 'number' ? value : /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected an integer between ${min} and ${max}, got "${value}"`,
      });
      return z.NEVER;
    }
    return parsed;
  });

const stringField = (fallback: string) =>
  z.union([z.string(), z.undefined()]).transform((value): string => {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    return fallback;
  });

const depthField = intField(Infinity, 0, Number.MAX_SAFE_INTEGER);

// Anything but "bfs" walks depth-first
const modeField = z
  .union([z.string(), z.undefined()])
  .transform((value): TraversalMode => (value?.trim().toLowerCase() === 'bfs' ? 'bfs' : 'dfs'));

const cliSchema = z.object({
  server: z.string({ required_error: 'server address is required' }).trim().min(1, 'server address is required'),
  username: stringField(DEFAULT_USERNAME),
  password: stringField(DEFAULT_PASSWORD),
  maxDepth: depthField,
  mode: modeField,
  json: z.boolean().default(false),
  output: stringField(DEFAULT_EXPORT_FILE),
  port: intField(DEFAULT_PORT, 1, 65535),
  verbose: z.boolean().default(false),
});

const envSchema = z.object({
  FTPTREE_RETRY_ATTEMPTS: intField(DEFAULT_RETRY_POLICY.maxAttempts, 1, 100),
  FTPTREE_RETRY_DELAY_MS: intField(DEFAULT_RETRY_POLICY.retryDelay, 0, 600000),
  FTPTREE_DEPTH_CEILING: intField(DEFAULT_DEPTH_CEILING, 1, 10000),
});

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const issue = error.issues[0];
  const key = issue?.path.join('.') || 'config';
  return new ConfigurationError(`Invalid ${key}: ${issue?.message ?? 'invalid value'}`, {
    configKey: key,
  });
}

export function resolveConfig(
  input: CliInput,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const cli = cliSchema.safeParse(input);
  if (!cli.success) {
    throw toConfigurationError(cli.error);
  }

  const settings = envSchema.safeParse(env);
  if (!settings.success) {
    throw toConfigurationError(settings.error);
  }

  return {
    ...cli.data,
    maxAttempts: settings.data.FTPTREE_RETRY_ATTEMPTS,
    retryDelay: settings.data.FTPTREE_RETRY_DELAY_MS,
    depthCeiling: settings.data.FTPTREE_DEPTH_CEILING,
  };
}
