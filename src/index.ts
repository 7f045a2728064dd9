#!/usr/bin/env node

/**
 * GenAI Network Automation backend - entry point
 */

import { getConfig, printConfigInfo } from './config.js';
import { createApplication, type Application } from './app.js';
import { initLogger, getLogger } from './utils/logger.js';
import { errorMessage } from './core/errors.js';

async function main(): Promise<void> {
  let app: Application | null = null;

  try {
    const config = getConfig();
    initLogger({ level: config.logging.level, dir: config.logging.dir, silent: config.logging.silent });
    printConfigInfo(config);

    app = createApplication(config);
    await app.start();

    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      try {
        await app?.stop();
        console.error('👋 Goodbye!\n');
        process.exit(0);
      } catch (error) {
        getLogger().error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      }
    };

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (app) {
      await app.stop();
    }

    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
