// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { createLogger, errorMessage, setLogLevel } from '@coach/shared';
import { GeminiProvider } from '@coach/providers';
import { createRepositories } from '@coach/storage';
import { loadConfig } from './config.js';
import { CoachServer } from './service.js';

const log = createLogger('main');

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.logLevel) setLogLevel(config.logLevel);

  if (config.apiTokens.size === 0) {
    log.warn('API_TOKENS is empty; every authenticated request will be rejected');
  }

  const repos = createRepositories({ path: config.databasePath, verbose: config.debugSql });
  const model = new GeminiProvider(config.gemini);
  const server = new CoachServer({ config, repos, model });

  let isShuttingDown = false;

  /**
   * Graceful shutdown.
   */
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    log.info('Shutting down', { signal });

    try {
      await server.stop();
    } finally {
      repos.db.close();
    }
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Shutdown failed', error);
        process.exit(1);
      },
    );
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled rejection', reason, { message: errorMessage(reason) });
  });

  try {
    await server.start();
  } catch (error) {
    repos.db.close();
    throw error;
  }
}

main().catch((error: unknown) => {
  log.error('Failed to start', error);
  process.exit(1);
});
