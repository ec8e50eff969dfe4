// Path: src/commands/start.ts
// Start command - runs the supervisor until interrupted

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadClientConfig } from '../lib/config/index.js';
import { validateClientConfig, formatValidationResult } from '../lib/validation.js';
import { flushLogs, logger } from '../lib/logger.js';
import { ClientSupervisor, type ClientConfig, type ClientMessage } from '../services/supervisor/index.js';
import { extractErrorMessage } from '../utils/error.js';
import type { StartCommandOptions } from './types.js';

/**
 * Stop the supervisor on SIGINT or SIGTERM, then exit.
 */
function setupSignalHandlers(supervisor: ClientSupervisor): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    await supervisor.stop();
    await flushLogs();
    process.exit(0);
  };

  const handler = (signal: string) => () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown error');
      process.exit(1);
    });
  };

  process.once('SIGINT', handler('SIGINT'));
  process.once('SIGTERM', handler('SIGTERM'));
}

export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description('Start the supervised gateway connections')
    .option('-c, --config <file>', 'Config file (default: $PULSAR_WS_CONFIG or ./pulsar-ws.json)')
    .option('--validate', 'Validate configuration before starting')
    .option('-v, --verbose', 'Enable verbose logging')
    .addHelpText('after', `
Examples:
  # Start with ./pulsar-ws.json
  pulsar-ws-supervisor start

  # Validate configuration before starting
  pulsar-ws-supervisor start -c ./orders.json --validate

  # Override the gateway host and token
  PULSAR_WS_HOST=broker:8080 PULSAR_WS_AUTH_TOKEN=... pulsar-ws-supervisor start
`)
    .action(async (options: StartCommandOptions) => {
      if (options.verbose === true) {
        logger.level = 'debug';
      }

      let config: ClientConfig;
      try {
        config = loadClientConfig(options.config);
      } catch (err) {
        console.error(chalk.red('Invalid configuration:'), extractErrorMessage(err));
        process.exit(1);
      }

      // Validate configuration if requested
      if (options.validate === true) {
        const result = validateClientConfig(config);
        console.log(formatValidationResult(result));
        console.log();

        if (!result.valid) {
          console.error(chalk.red('Configuration validation failed. Fix errors before starting.'));
          process.exit(1);
        }
      }

      let supervisor: ClientSupervisor;
      try {
        supervisor = new ClientSupervisor(config);
      } catch (err) {
        console.error(chalk.red('Invalid configuration:'), extractErrorMessage(err));
        process.exit(1);
      }

      supervisor.on('message', (message: ClientMessage) => {
        logger.info({ child: message.child, role: message.role, bytes: message.data.length }, 'Message received');
      });
      supervisor.on('child_restarted', (id: string) => {
        console.log(chalk.yellow(`Restarted ${id}`));
      });
      supervisor.on('error', (err: Error) => {
        console.error(chalk.red('Supervisor failed:'), err.message);
        flushLogs().then(() => process.exit(1), () => process.exit(1));
      });

      setupSignalHandlers(supervisor);

      try {
        await supervisor.start();
      } catch (err) {
        logger.error({ err }, 'Supervisor failed to start');
        console.error(chalk.red('Failed to start:'), extractErrorMessage(err));
        await flushLogs();
        process.exit(1);
      }

      const connections = supervisor.whichChildren().filter(child => child.kind === 'connection');
      console.log(chalk.green(`Started ${supervisor.name} with ${connections.length} connection(s)`));
    });
}
