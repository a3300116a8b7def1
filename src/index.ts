import path from 'path';
import { config, parseSlackConfig, type SlackConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';
import { isCommandAvailable } from './utils/system.js';
import { MessageChunker } from './output/chunker.js';
import { SessionManager } from './session/manager.js';
import { createSlackBot, startSlackBot, stopSlackBot, type SlackBot } from './slack/bot.js';

const log = logger.child({ component: 'main' });

let slackBot: SlackBot | null = null;
let sessionManager: SessionManager | null = null;
let isShuttingDown = false;

async function main(): Promise<void> {
  log.info({ version: '1.0.0' }, 'Starting TermBridge');

  let slackConfig: SlackConfig;
  try {
    slackConfig = parseSlackConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ issues: err.issues }, 'Slack configuration is invalid');
      process.exit(1);
    }
    throw err;
  }

  if (!isCommandAvailable(config.bridge.command)) {
    log.warn({ command: config.bridge.command }, 'Sessions will fail to start until the command is installed');
  }

  sessionManager = new SessionManager({
    command: config.bridge.command,
    args: config.bridge.args,
    defaultWorkingDirectory: path.resolve(config.bridge.workingDirectory),
    sessionTimeoutMs: config.session.timeoutSeconds * 1000,
    cleanupIntervalMs: config.session.cleanupIntervalSeconds * 1000,
    maxHistoryLength: config.session.maxHistoryLength,
    maxOutputHistory: config.session.maxOutputHistory,
    buffer: {
      strategy: config.output.strategy,
      flushIntervalMs: config.output.flushIntervalMs,
      chunker: new MessageChunker({ maxLength: config.output.maxOutputLength }),
    },
  });
  sessionManager.start();

  log.info('Starting Slack bot...');
  slackBot = createSlackBot(sessionManager, slackConfig, config);
  await startSlackBot(slackBot);

  log.info({
    command: config.bridge.command,
    workingDirectory: config.bridge.workingDirectory,
    sessionTimeout: `${config.session.timeoutSeconds} seconds`,
    strategy: config.output.strategy,
    commandName: slackConfig.commandName,
  }, 'TermBridge is running');
}

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info({ signal }, 'Shutting down...');

  try {
    // Terminates every bridged process and drains notifications
    if (sessionManager) {
      await sessionManager.stop();
    }

    if (slackBot) {
      await slackBot.bridge.idle();
      await stopSlackBot(slackBot);
    }

    log.info('Shutdown complete');
    process.exit(0);
  } catch (err) {
    log.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(() => process.exit(1));
});
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(() => process.exit(1));
});

process.on('uncaughtException', (err) => {
  log.fatal({ err }, 'Uncaught exception');
  shutdown('uncaughtException').catch(() => process.exit(1));
});

process.on('unhandledRejection', (reason) => {
  log.fatal({ reason }, 'Unhandled rejection');
  shutdown('unhandledRejection').catch(() => process.exit(1));
});

main().catch((err) => {
  log.fatal({ err }, 'Failed to start TermBridge');
  process.exit(1);
});
