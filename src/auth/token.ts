import { execSync } from 'node:child_process';
import { APP_NAME, APP_CONFIG_DIR_DISPLAY, SETTINGS_FILENAME } from '../config/branding.js';
import type { Settings } from '../config/schema.js';
import { ConfigurationError } from '../core/errors.js';

export interface TokenSource {
  token: string;
  source: 'settings' | 'env:GITHUB_TOKEN' | 'env:GH_TOKEN' | 'gh-cli';
}

// ─── GitHub Token Resolution ────────────────────────────────────────
// Cascading lookup:
//   1. github_token in config.yaml
//   2. $GITHUB_TOKEN / $GH_TOKEN
//   3. `gh auth token`             (GitHub CLI)

/**
 * Resolve a GitHub token from all available sources.
 * Returns token and its source, or null if none found.
 */
export function resolveGitHubToken(settings?: Pick<Settings, 'github_token'>): TokenSource | null {
  if (settings?.github_token) {
    return { token: settings.github_token, source: 'settings' };
  }
  if (process.env.GITHUB_TOKEN) {
    return { token: process.env.GITHUB_TOKEN, source: 'env:GITHUB_TOKEN' };
  }
  if (process.env.GH_TOKEN) {
    return { token: process.env.GH_TOKEN, source: 'env:GH_TOKEN' };
  }

  const ghToken = tryGhAuthToken();
  if (ghToken) return { token: ghToken, source: 'gh-cli' };

  return null;
}

function tryGhAuthToken(): string | null {
  try {
    const token = execSync('gh auth token', { encoding: 'utf-8', timeout: 5000, stdio: ['pipe', 'pipe', 'pipe'] }).trim();
    return token.length > 0 ? token : null;
  } catch {
    // gh missing or not logged in
    return null;
  }
}

/** Resolve token or throw with the list of places that were tried. */
export function requireGitHubToken(settings?: Pick<Settings, 'github_token'>): TokenSource {
  const result = resolveGitHubToken(settings);
  if (result) return result;

  throw new ConfigurationError(
    [
      'Could not find a GitHub token. Tried:',
      `  1. github_token in ${APP_CONFIG_DIR_DISPLAY}/${SETTINGS_FILENAME}`,
      '  2. $GITHUB_TOKEN / $GH_TOKEN env vars',
      '  3. gh auth token (GitHub CLI)',
      '',
      'To fix, do one of:',
      `  • ${APP_NAME} configure --reset`,
      '  • gh auth login',
      '  • export GITHUB_TOKEN=<token>',
    ].join('\n'),
  );
}
