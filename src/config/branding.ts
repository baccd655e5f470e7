import { join } from 'node:path';
import { homedir } from 'node:os';

// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (CLI command, config dir, default working dir). */
export const APP_NAME = 'classfleet';

/** CLI version reported by --version. */
export const APP_VERSION = '0.1.0';

// ─── Derived Brand Constants ────────────────────────────────────────

/** Directory under $HOME for settings: .classfleet */
export const CONFIG_DIR_NAME = `.${APP_NAME}`;

/** Settings filename inside the config directory. */
export const SETTINGS_FILENAME = 'config.yaml';

/** Environment variable for overriding the config directory. */
export const ENV_CONFIG_OVERRIDE = `${APP_NAME.toUpperCase()}_HOME`;

/** Default location for student clones. */
export const DEFAULT_WORKING_DIR = `~/${APP_NAME}-workdir`;

/** Human-readable config dir path for messages (uses ~ instead of absolute path). */
export const APP_CONFIG_DIR_DISPLAY = `~/${CONFIG_DIR_NAME}`;

/** Default config directory: ~/.classfleet */
export const APP_CONFIG_DIR = join(homedir(), CONFIG_DIR_NAME);
