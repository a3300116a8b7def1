import pkg from '@slack/bolt';
import type { App as AppType } from '@slack/bolt';

const { App, LogLevel } = pkg;
import type { Config, SlackConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { SessionManager } from '../session/manager.js';
import { SlackThreadPoster } from '../streaming/thread-streamer.js';
import { SlackBridge, type Reply } from './handlers.js';

const log = logger.child({ component: 'slack-bot' });

export interface SlackBot {
  app: AppType;
  bridge: SlackBridge;
  unsubscribe: () => void;
}

function boltLogLevel(level: Config['logging']['level']) {
  switch (level) {
    case 'trace':
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    default:
      return LogLevel.ERROR;
  }
}

export function createSlackBot(
  sessionManager: SessionManager,
  slack: SlackConfig,
  appConfig: Config
): SlackBot {
  const app = new App({
    token: slack.botToken,
    signingSecret: slack.signingSecret,
    socketMode: true,
    appToken: slack.appToken,
    logLevel: boltLogLevel(appConfig.logging.level),
  });

  const bridge = new SlackBridge(
    sessionManager,
    (channelId, threadTs) => new SlackThreadPoster(app.client, channelId, threadTs),
    {
      minPostIntervalMs: slack.minPostIntervalMs,
      transportLimit: appConfig.output.transportLimit,
    }
  );

  const unsubscribe = sessionManager.onEvent((event) => bridge.handleEvent(event));

  app.event('message', async ({ event, client }) => {
    // Edits, joins, bot posts and the like carry a subtype.
    if (event.subtype !== undefined) return;
    if (event.bot_id || !event.text) return;

    const threadTs = event.thread_ts ?? event.ts;
    const userId = event.user;
    const channel = event.channel;
    log.debug({ userId, channelId: channel, hasThread: !!event.thread_ts }, 'Received message');

    await bridge.handleMessage({ userId, channelId: channel, threadTs }, event.text, async (text, { ephemeral }) => {
      if (ephemeral) {
        await client.chat.postEphemeral({ channel, user: userId, thread_ts: threadTs, text });
        return;
      }
      await client.chat.postMessage({ channel, thread_ts: threadTs, text });
    });
  });

  app.event('app_mention', async ({ event, client }) => {
    if (!event.user) return;

    const userId = event.user;
    const threadTs = event.thread_ts ?? event.ts;
    const text = event.text.replace(/<@[A-Z0-9]+>/g, '').trim();

    const reply: Reply = async (message, { ephemeral }) => {
      if (ephemeral) {
        await client.chat.postEphemeral({ channel: event.channel, user: userId, thread_ts: threadTs, text: message });
        return;
      }
      await client.chat.postMessage({ channel: event.channel, thread_ts: threadTs, text: message });
    };

    if (!text) {
      await reply('Hello! Use `/new` to start a session or `/help` for commands.', { ephemeral: false });
      return;
    }

    log.debug({ userId, channelId: event.channel }, 'Received app mention');
    await bridge.handleMessage({ userId, channelId: event.channel, threadTs }, text, reply);
  });

  app.command(slack.commandName, async ({ command, ack, respond }) => {
    await ack();

    log.debug({ userId: command.user_id, subcommand: command.text }, 'Received slash command');

    const result = await bridge.handleSlashCommand(
      { userId: command.user_id, channelId: command.channel_id, threadTs: null },
      command.text
    );

    await respond({
      text: result.text,
      response_type: result.ephemeral ? 'ephemeral' : 'in_channel',
    });
  });

  app.error(async (error) => {
    log.error({ err: error }, 'Slack app error');
  });

  return { app, bridge, unsubscribe };
}

export async function startSlackBot(bot: SlackBot): Promise<void> {
  await bot.app.start();
  log.info('Slack bot started in Socket Mode');
}

export async function stopSlackBot(bot: SlackBot): Promise<void> {
  bot.unsubscribe();
  await bot.app.stop();
  log.info('Slack bot stopped');
}
