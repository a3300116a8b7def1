import type { InlineCommand, CommandResult, ConnectionStore, SlackContext } from './types.js';
import type { SessionManager } from '../session/manager.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'commands' });

const DEFAULT_COUNT = 10;
const MAX_COUNT = 50;
const MAX_REPLY_LENGTH = 1800;

function parseCount(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    return DEFAULT_COUNT;
  }
  return Math.min(parsed, MAX_COUNT);
}

/**
 * Parse a subcommand and its arguments, without the leading slash.
 */
export function parseSubcommand(text: string): InlineCommand {
  const parts = text.trim().split(/\s+/).filter(Boolean);
  const cmd = parts[0]?.toLowerCase();

  switch (cmd) {
    case undefined:
    case 'help':
    case 'commands':
      return { type: 'help' };

    case 'new':
    case 'start':
      return { type: 'new', workingDirectory: parts[1] };

    case 'connect':
    case 'attach':
      return { type: 'connect', sessionId: parts[1]?.toUpperCase() };

    case 'disconnect':
    case 'detach':
      return { type: 'disconnect' };

    case 'stop':
    case 'end':
    case 'exit':
    case 'quit':
      return { type: 'stop' };

    case 'restart':
      return { type: 'restart' };

    case 'status':
    case 'info':
      return { type: 'status' };

    case 'output':
    case 'out':
      return { type: 'output', count: parseCount(parts[1]) };

    case 'history':
      return { type: 'history', count: parseCount(parts[1]) };

    case 'sessions':
    case 'list':
    case 'ls':
      return { type: 'sessions' };

    case 'y':
    case 'yes':
    case 'accept':
      return { type: 'accept' };

    case 'n':
    case 'no':
    case 'reject':
      return { type: 'reject' };

    case 'c':
    case 'cancel':
    case 'ctrl-c':
      return { type: 'cancel' };

    default:
      return { type: 'unknown', command: cmd };
  }
}

/**
 * Parse a chat message as a command. Returns null for anything that does not
 * start with a slash.
 */
export function parseInlineCommand(text: string): InlineCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/') || trimmed.length === 1) {
    return null;
  }
  return parseSubcommand(trimmed.slice(1));
}

export interface CommandDependencies {
  sessionManager: SessionManager;
  connections: ConnectionStore;
}

const notConnected: CommandResult = {
  text: 'You are not connected to a session. Use `/new` to start one or `/connect <id>` to join one.',
  ephemeral: true,
};

export async function executeCommand(
  command: InlineCommand,
  ctx: SlackContext,
  deps: CommandDependencies
): Promise<CommandResult> {
  log.debug({ command, userId: ctx.userId }, 'Executing command');

  switch (command.type) {
    case 'new':
      return handleNewCommand(command.workingDirectory, ctx, deps);

    case 'connect':
      return handleConnectCommand(command.sessionId, ctx, deps);

    case 'disconnect': {
      const sessionId = deps.connections.disconnect(ctx.userId);
      return sessionId
        ? { text: `Disconnected from session \`${sessionId}\`.` }
        : notConnected;
    }

    case 'help':
      return handleHelpCommand();

    case 'sessions':
      return handleSessionsCommand(deps.sessionManager);

    case 'unknown':
      return {
        text: `Unknown command: \`/${command.command}\`. Use \`/help\` to see available commands.`,
        ephemeral: true,
      };
  }

  const sessionId = deps.connections.getConnection(ctx.userId);
  if (!sessionId) {
    return notConnected;
  }

  switch (command.type) {
    case 'stop':
      return handleStopCommand(sessionId, ctx, deps);

    case 'restart': {
      const restarted = await deps.sessionManager.restartSession(sessionId);
      return restarted
        ? { text: `Session \`${sessionId}\` restarted.` }
        : { text: `Could not restart session \`${sessionId}\`. Use \`/new\` to start a new one.`, ephemeral: true };
    }

    case 'status':
      return handleStatusCommand(sessionId, deps.sessionManager);

    case 'output':
      return handleOutputCommand(sessionId, command.count, deps.sessionManager);

    case 'history':
      return handleHistoryCommand(sessionId, command.count, deps.sessionManager);

    case 'accept':
      return sendAnswer(sessionId, 'y', deps.sessionManager);

    case 'reject':
      return sendAnswer(sessionId, 'n', deps.sessionManager);

    case 'cancel': {
      const sent = deps.sessionManager.interruptSession(sessionId);
      return sent
        ? { text: 'Sent interrupt (Ctrl+C).' }
        : { text: `Session \`${sessionId}\` is not active.`, ephemeral: true };
    }
  }
}

async function handleNewCommand(
  workingDirectory: string | undefined,
  ctx: SlackContext,
  deps: CommandDependencies
): Promise<CommandResult> {
  try {
    const session = await deps.sessionManager.createSession(workingDirectory);
    if (!session) {
      return {
        text: 'Failed to start session: the bridged command could not be started.',
        ephemeral: true,
      };
    }

    deps.connections.connect(ctx.userId, session.id, ctx);
    return {
      text: `Started session \`${session.id}\` in \`${session.workingDirectory}\`.`,
    };
  } catch (err) {
    log.error({ err, userId: ctx.userId }, 'Failed to create session');
    return {
      text: 'Failed to start session. Please try again.',
      ephemeral: true,
    };
  }
}

function handleConnectCommand(
  sessionId: string | undefined,
  ctx: SlackContext,
  deps: CommandDependencies
): CommandResult {
  if (!sessionId) {
    return {
      text: 'Please specify a session id: `/connect <id>`. Use `/sessions` to list them.',
      ephemeral: true,
    };
  }

  if (!deps.connections.connect(ctx.userId, sessionId, ctx)) {
    return {
      text: `Session \`${sessionId}\` not found.`,
      ephemeral: true,
    };
  }

  return { text: `Connected to session \`${sessionId}\`.` };
}

async function handleStopCommand(
  sessionId: string,
  ctx: SlackContext,
  deps: CommandDependencies
): Promise<CommandResult> {
  const terminated = await deps.sessionManager.terminateSession(sessionId);
  deps.connections.disconnect(ctx.userId);

  if (terminated) {
    return { text: `Session \`${sessionId}\` terminated.` };
  }

  return {
    text: `Session \`${sessionId}\` was already gone.`,
    ephemeral: true,
  };
}

function handleStatusCommand(sessionId: string, sessionManager: SessionManager): CommandResult {
  const session = sessionManager.getSession(sessionId);
  if (!session) {
    return { text: `Session \`${sessionId}\` not found.`, ephemeral: true };
  }

  const snapshot = session.toSnapshot();
  const info = session.process.getProcessInfo();
  const uptime = Math.round((Date.now() - session.createdAt) / 1000 / 60);

  return {
    text: [
      '*Session Status*',
      `• ID: \`${snapshot.id}\``,
      `• Directory: \`${snapshot.workingDirectory}\``,
      `• Status: ${snapshot.status}${snapshot.isActive ? '' : ' (not running)'}`,
      `• Process: ${info.status}${info.pid !== null ? ` (pid ${info.pid})` : ''}`,
      `• Commands: ${snapshot.commandCount}`,
      `• Output lines: ${snapshot.outputCount}`,
      `• Uptime: ${uptime} minutes`,
    ].join('\n'),
    ephemeral: true,
  };
}

function tail(text: string, limit: number): string {
  return text.length <= limit ? text : '…' + text.slice(text.length - limit + 1);
}

function handleOutputCommand(sessionId: string, count: number, sessionManager: SessionManager): CommandResult {
  const lines = sessionManager.getRecentOutput(sessionId, count);
  if (lines.length === 0) {
    return { text: 'No output yet.', ephemeral: true };
  }

  const body = tail(lines.join('\n').replace(/```/g, '`\u200b``'), MAX_REPLY_LENGTH);
  return {
    text: `*Last ${lines.length} output lines*\n\`\`\`\n${body}\n\`\`\``,
    ephemeral: true,
  };
}

function handleHistoryCommand(sessionId: string, count: number, sessionManager: SessionManager): CommandResult {
  const commands = sessionManager.getRecentCommands(sessionId, count);
  if (commands.length === 0) {
    return { text: 'No commands sent yet.', ephemeral: true };
  }

  const list = commands.map((command, i) => `${i + 1}. \`${command}\``).join('\n');
  return {
    text: tail(`*Last ${commands.length} commands*\n${list}`, MAX_REPLY_LENGTH),
    ephemeral: true,
  };
}

function handleSessionsCommand(sessionManager: SessionManager): CommandResult {
  const sessions = sessionManager.getAllSessions();
  if (sessions.length === 0) {
    return {
      text: '*Sessions*\n\nNo sessions. Use `/new` to start one.',
      ephemeral: true,
    };
  }

  const list = sessions.map((session) => {
    const snapshot = session.toSnapshot();
    return `• \`${snapshot.id}\` ${snapshot.status} in \`${snapshot.workingDirectory}\` (${snapshot.commandCount} commands)`;
  });

  return {
    text: ['*Sessions*', '', ...list].join('\n'),
    ephemeral: true,
  };
}

function sendAnswer(sessionId: string, answer: 'y' | 'n', sessionManager: SessionManager): CommandResult {
  const sent = sessionManager.sendCommand(sessionId, answer);
  if (sent) {
    return { text: answer === 'y' ? 'Accepted (y)' : 'Rejected (n)' };
  }

  return {
    text: `Session \`${sessionId}\` is not active.`,
    ephemeral: true,
  };
}

function handleHelpCommand(): CommandResult {
  return {
    text: [
      '*TermBridge Commands*',
      '',
      '*Sessions:*',
      '`/new [dir]` - Start a new session (optionally in a directory)',
      '`/connect <id>` - Join an existing session',
      '`/disconnect` - Leave the current session',
      '`/stop` - Terminate the current session',
      '`/restart` - Restart the bridged process',
      '`/status` - Show session status',
      '`/sessions` - List all sessions',
      '',
      '*Inspecting:*',
      '`/output [n]` - Show the last n output lines',
      '`/history [n]` - Show the last n commands',
      '',
      '*Prompts:*',
      '`/y` - Answer yes',
      '`/n` - Answer no',
      '`/cancel` - Send Ctrl+C',
      '',
      '*Or just send a message* - It goes to the connected session',
    ].join('\n'),
    ephemeral: true,
  };
}
