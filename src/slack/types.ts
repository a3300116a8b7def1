export interface SlackContext {
  userId: string;
  channelId: string;
  /** Thread replies go to; null posts at channel level. */
  threadTs: string | null;
}

export interface CommandResult {
  text: string;
  ephemeral?: boolean;
}

export type InlineCommand =
  | { type: 'new'; workingDirectory?: string }
  | { type: 'connect'; sessionId?: string }
  | { type: 'disconnect' }
  | { type: 'stop' }
  | { type: 'restart' }
  | { type: 'status' }
  | { type: 'output'; count: number }
  | { type: 'history'; count: number }
  | { type: 'sessions' }
  | { type: 'accept' }
  | { type: 'reject' }
  | { type: 'cancel' }
  | { type: 'help' }
  | { type: 'unknown'; command: string };

/**
 * Which session each chat user is currently driving.
 */
export interface ConnectionStore {
  getConnection(userId: string): string | null;
  connect(userId: string, sessionId: string, ctx: SlackContext): boolean;
  disconnect(userId: string): string | null;
}
