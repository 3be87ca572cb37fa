import { Command } from 'commander';

import { AuthError, type ResourceGateway } from '@record-tree/core';

import { createAppState } from '../lib/app-state';
import { EnvConfigError, loadAppConfig } from '../lib/config/env-config';
import { CloudflareGateway } from '../lib/gateway/cloudflare-gateway';
import { type Logger, createLogger } from '../lib/logging/logger';
import { TerminalApp } from '../lib/terminal/terminal-app';

export const USER_AGENT = 'record-tree/0.1.0';

type GlobalOptions = {
  apiUrl?: string;
  timeout?: string;
  logLevel?: string;
  logFile?: string;
  tokenEnv?: string;
};

export interface GatewaySettings {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  logger: Logger;
}

/** Seams the tests replace; the defaults talk to Cloudflare and the real terminal. */
export interface ProgramDependencies {
  env?: Record<string, string | undefined>;
  createGateway?: (settings: GatewaySettings) => ResourceGateway;
  runApp?: (app: TerminalApp) => Promise<void>;
}

function createCloudflareGateway(settings: GatewaySettings): ResourceGateway {
  return new CloudflareGateway({ ...settings, userAgent: USER_AGENT });
}

export function createInterface(dependencies: ProgramDependencies = {}): Command {
  const program = new Command();
  const createGateway = dependencies.createGateway ?? createCloudflareGateway;
  const runApp = dependencies.runApp ?? ((app: TerminalApp) => app.run());

  program
    .name('record-tree')
    .description('Browse and edit DNS records as a zone tree')
    .option('--api-url <url>', 'Cloudflare API base URL (CLOUDFLARE_API_URL)')
    .option('--timeout <ms>', 'HTTP timeout in milliseconds (RECORD_TREE_HTTP_TIMEOUT_MS)')
    .option('--log-level <level>', 'Log level (RECORD_TREE_LOG_LEVEL)')
    .option('--log-file <path>', 'Write logs to this file (RECORD_TREE_LOG_FILE)')
    .option('--token-env <name>', 'Environment variable holding the API token')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const config = loadAppConfig(options, dependencies.env ?? process.env);
      const logger = createLogger({ level: config.logLevel, file: config.logFile });
      const gateway = createGateway({
        baseUrl: config.apiUrl,
        token: config.apiToken,
        timeoutMs: config.timeoutMs,
        logger,
      });

      const state = createAppState({ gateway, logger });
      logger.info({ apiUrl: config.apiUrl }, 'explorer started');
      try {
        await runApp(new TerminalApp(state));
      } finally {
        state.dispose();
        logger.info('explorer stopped');
        logger.flush();
      }
    });

  return program;
}

/** Startup failures the operator can fix; printed without a stack. */
export function isFatalConfigError(error: unknown): error is AuthError | EnvConfigError {
  return error instanceof AuthError || error instanceof EnvConfigError;
}
