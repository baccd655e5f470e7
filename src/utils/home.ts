import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { APP_CONFIG_DIR, ENV_CONFIG_OVERRIDE } from '../config/branding.js';

/**
 * Returns the config directory (e.g. ~/.classfleet).
 * Respects the CLASSFLEET_HOME env var override.
 */
export function getConfigRoot(): string {
  return process.env[ENV_CONFIG_OVERRIDE] ?? APP_CONFIG_DIR;
}

/**
 * Returns the path to a specific file within the config directory.
 */
export function getHomePath(filename: string): string {
  return join(getConfigRoot(), filename);
}

/** Expand a leading ~ and resolve to an absolute path. */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return resolve(path);
}
