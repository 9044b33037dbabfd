#!/usr/bin/env node

import { parseArgs } from 'util';
import dotenv from 'dotenv';
import { PACKAGE_NAME } from './config/constants';
import { loadSettings, type Settings } from './config/environment';
import { IvrServer } from './server';
import { ConfigurationError } from './utils/errors';
import { createLogger } from './utils/logger';
import { PACKAGE_VERSION } from './utils/version';

const HELP_TEXT = `
${PACKAGE_NAME} v${PACKAGE_VERSION}

Health-check endpoint and WebSocket echo service for the agentic IVR demo.

Usage: agentic-ivr [command] [options]

Commands:
  serve          Start the HTTP and WebSocket server (default)
  config         Validate the environment and print the resolved settings
  version        Show version information
  help           Show this help message

Options:
  --help, -h     Show help
  --version      Show version

Environment:
  APP_NAME, APP_VERSION, HOST, PORT, LOG_LEVEL, LOG_FORMAT, ENVIRONMENT,
  WS_PATH, SHUTDOWN_GRACE_MS (a .env file in the working directory is read first)

Examples:
  agentic-ivr serve
  PORT=9000 LOG_FORMAT=json agentic-ivr
  agentic-ivr config
`;

interface ParsedArgs {
  values: {
    help?: boolean;
    version?: boolean;
  };
  positionals: string[];
}

function parseCliArgs(): ParsedArgs {
  try {
    return parseArgs({
      args: process.argv.slice(2),
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    console.error(
      `Error parsing arguments: ${error instanceof Error ? error.message : 'unknown error'}`
    );
    console.error('Use --help for usage information.');
    process.exit(1);
  }
}

function loadSettingsOrExit(): Settings {
  try {
    return loadSettings();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function serve(): Promise<void> {
  const settings = loadSettingsOrExit();
  const logger = createLogger(settings);
  const server = new IvrServer(settings, logger);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal, closing gracefully...');
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await server.start();
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseCliArgs();

  if (values.help) {
    console.log(HELP_TEXT);
    return;
  }

  if (values.version) {
    console.log(`${PACKAGE_NAME} v${PACKAGE_VERSION}`);
    return;
  }

  dotenv.config();
  const command = positionals[0] ?? 'serve';

  switch (command) {
    case 'serve': {
      await serve();
      break;
    }

    case 'config': {
      const settings = loadSettingsOrExit();
      console.log(JSON.stringify(settings, null, 2));
      break;
    }

    case 'version': {
      console.log(`${PACKAGE_NAME} v${PACKAGE_VERSION}`);
      break;
    }

    case 'help': {
      console.log(HELP_TEXT);
      break;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Use --help for usage information.');
      process.exit(1);
    }
  }
}

main().catch(error => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
  process.exit(1);
});
