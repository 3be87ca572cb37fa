import { z } from 'zod';

import { AuthError } from '@record-tree/core';

export type EnvSource = Record<string, string | undefined>;

export const DEFAULT_API_URL = 'https://api.cloudflare.com/client/v4';
export const DEFAULT_TOKEN_ENV = 'CLOUDFLARE_API_TOKEN';
export const DEFAULT_TIMEOUT_MS = 15_000;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

export const appConfigSchema = z.object({
  apiUrl: optionalString.pipe(z.string().url().default(DEFAULT_API_URL)),
  timeoutMs: optionalString.pipe(
    z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  ),
  logLevel: optionalString.pipe(z.enum(LOG_LEVELS).default('info')),
  logFile: optionalString,
});

export type AppConfig = z.infer<typeof appConfigSchema> & {
  apiToken: string;
};

/** Values given on the command line; each one overrides its environment variable. */
export interface ConfigOverrides {
  apiUrl?: string;
  timeout?: string;
  logLevel?: string;
  logFile?: string;
  tokenEnv?: string;
}

type IssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: IssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(issues: IssueTarget[]): string {
  const details = issues.map((issue) => `  • ${formatIssue(issue)}`).join('\n');
  return `[record-tree] Invalid configuration\n${details}`;
}

/**
 * Resolves the runtime configuration. A missing or blank API token is an
 * AuthError; any other invalid value is an EnvConfigError.
 */
export function loadAppConfig(
  overrides: ConfigOverrides = {},
  env: EnvSource = process.env,
): AppConfig {
  const tokenEnv = overrides.tokenEnv?.trim() || DEFAULT_TOKEN_ENV;
  const apiToken = env[tokenEnv]?.trim();
  if (!apiToken) {
    throw new AuthError(`${tokenEnv} is not set`);
  }

  const result = appConfigSchema.safeParse({
    apiUrl: overrides.apiUrl ?? env.CLOUDFLARE_API_URL,
    timeoutMs: overrides.timeout ?? env.RECORD_TREE_HTTP_TIMEOUT_MS,
    logLevel: overrides.logLevel ?? env.RECORD_TREE_LOG_LEVEL,
    logFile: overrides.logFile ?? env.RECORD_TREE_LOG_FILE,
  });

  if (!result.success) {
    throw new EnvConfigError(
      formatErrorMessage(
        result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
      ),
    );
  }

  return { ...result.data, apiToken };
}
