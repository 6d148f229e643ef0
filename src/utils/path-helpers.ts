import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Resolves a user-supplied project path to an absolute, symlink-free path.
 * Falls back to the plain resolved path when it does not exist yet.
 */
export function resolveProjectRoot(rawPath: string | undefined): string {
  const trimmed = rawPath?.trim() ?? '';
  const absolute = path.resolve(trimmed.length > 0 ? trimmed : '.');
  try {
    return fs.realpathSync(absolute);
  } catch {
    return absolute;
  }
}

/** Expands a leading `~` or `~/` to the current user's home directory. */
export function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}
