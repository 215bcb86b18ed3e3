import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/** `~/amazon-q`: where the chat runs when no directory is given. */
export function defaultWorkingDirectory(home: string = homedir()): string {
  return join(home, 'amazon-q');
}

export function defaultLogDirectory(base: string = process.cwd()): string {
  return join(base, 'logs');
}

/** Expand a leading `~` and make the path absolute. */
export function normalizeWorkingDirectory(input: string, home: string = homedir(), base: string = process.cwd()): string {
  const trimmed = input.trim();
  if (trimmed === '~') return home;
  if (trimmed.startsWith('~/')) return join(home, trimmed.slice(2));
  return isAbsolute(trimmed) ? resolve(trimmed) : resolve(base, trimmed);
}
