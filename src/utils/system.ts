import { execFileSync } from 'child_process';
import { logger } from './logger.js';

const log = logger.child({ component: 'system' });

const availability = new Map<string, boolean>();

/**
 * Startup check for the bridged executable. Spawning still reports a missing
 * command on its own; this only lets the entry point warn early.
 */
export function isCommandAvailable(command: string): boolean {
  const cached = availability.get(command);
  if (cached !== undefined) {
    return cached;
  }

  let available: boolean;
  try {
    execFileSync('which', [command], { stdio: 'ignore' });
    available = true;
    log.info({ command }, 'Bridged command is available');
  } catch {
    available = false;
    log.error({ command }, 'Bridged command was not found on PATH');
  }

  availability.set(command, available);
  return available;
}
