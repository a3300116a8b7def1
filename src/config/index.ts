import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const bufferStrategies = ['immediate', 'line', 'time', 'smart'] as const;

const configSchema = z.object({
  bridge: z.object({
    command: z.string().min(1, 'Bridge command is required').default('bash'),
    args: z.array(z.string()).default([]),
    workingDirectory: z.string().min(1).default('./workspace'),
  }),

  session: z.object({
    timeoutSeconds: z.number().int().positive().default(3600),
    cleanupIntervalSeconds: z.number().int().positive().default(300),
    maxHistoryLength: z.number().int().positive().default(100),
    maxOutputHistory: z.number().int().positive().default(50),
  }),

  output: z.object({
    maxOutputLength: z.number().int().min(100, 'Max output length must leave room for decoration').default(1900),
    transportLimit: z.number().int().positive().default(2000),
    flushIntervalMs: z.number().int().positive().default(2000),
    strategy: z.enum(bufferStrategies).default('smart'),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }),
}).refine(
  (cfg) => cfg.output.maxOutputLength <= cfg.output.transportLimit,
  { message: 'Max output length must not exceed the transport limit', path: ['output', 'maxOutputLength'] }
);

export type Config = z.infer<typeof configSchema>;

const slackConfigSchema = z.object({
  botToken: z.string().startsWith('xoxb-', { message: 'Bot token must start with xoxb-' }),
  signingSecret: z.string().min(1, 'Signing secret is required'),
  appToken: z.string().startsWith('xapp-', { message: 'App token must start with xapp-' }),
  commandName: z.string().startsWith('/').default('/bridge'),
  minPostIntervalMs: z.number().int().nonnegative().default(500),
});

export type SlackConfig = z.infer<typeof slackConfigSchema>;

type Env = Record<string, string | undefined>;

function parseEnvInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseEnvList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(/\s+/).filter(Boolean);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}

export function parseConfig(env: Env): Config {
  const rawConfig = {
    bridge: {
      command: env.BRIDGE_COMMAND,
      args: parseEnvList(env.BRIDGE_ARGS),
      workingDirectory: env.BRIDGE_WORKDIR,
    },
    session: {
      timeoutSeconds: parseEnvInt(env.SESSION_TIMEOUT),
      cleanupIntervalSeconds: parseEnvInt(env.SESSION_CLEANUP_INTERVAL),
      maxHistoryLength: parseEnvInt(env.SESSION_MAX_HISTORY),
      maxOutputHistory: parseEnvInt(env.SESSION_MAX_OUTPUT_HISTORY),
    },
    output: {
      maxOutputLength: parseEnvInt(env.SESSION_MAX_OUTPUT),
      transportLimit: parseEnvInt(env.TRANSPORT_MAX_LENGTH),
      flushIntervalMs: parseEnvInt(env.OUTPUT_FLUSH_INTERVAL_MS),
      strategy: env.OUTPUT_STRATEGY,
    },
    logging: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY !== undefined
        ? env.LOG_PRETTY === 'true'
        : env.NODE_ENV === 'development',
    },
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  return result.data;
}

export function parseSlackConfig(env: Env): SlackConfig {
  const result = slackConfigSchema.safeParse({
    botToken: env.SLACK_BOT_TOKEN ?? '',
    signingSecret: env.SLACK_SIGNING_SECRET ?? '',
    appToken: env.SLACK_APP_TOKEN ?? '',
    commandName: env.SLACK_COMMAND_NAME,
    minPostIntervalMs: parseEnvInt(env.SLACK_MIN_POST_INTERVAL_MS),
  });

  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  return result.data;
}

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error('Configuration validation failed:');
      for (const issue of err.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw err;
  }
}

export const config = loadConfig();
