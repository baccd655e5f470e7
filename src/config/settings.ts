import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { SettingsSchema } from './schema.js';
import type { AssignmentSelector, Settings } from './schema.js';
import { APP_NAME, SETTINGS_FILENAME } from './branding.js';
import { expandHome, getHomePath } from '../utils/home.js';
import { ConfigurationError } from '../core/errors.js';

/**
 * Reads and writes the classfleet settings file (~/.classfleet/config.yaml).
 * Settings are validated with Zod and handed out frozen; nothing mutates them after load.
 */
export class SettingsManager {
  private filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath ?? getHomePath(SETTINGS_FILENAME);
  }

  get settingsPath(): string {
    return this.filePath;
  }

  exists(): boolean {
    return existsSync(this.filePath);
  }

  // ─── Load / Save ──────────────────────────────────────────────────

  /** Load and validate settings. Throws ConfigurationError if missing or invalid. */
  load(): Readonly<Settings> {
    if (!this.exists()) {
      throw new ConfigurationError(`Could not open '${this.filePath}', run '${APP_NAME} configure'`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Could not parse '${this.filePath}': ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    try {
      return Object.freeze(SettingsSchema.parse(parsed ?? {}));
    } catch (err) {
      if (err instanceof ZodError) {
        const issues = err.issues.map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
        throw new ConfigurationError(`Invalid settings in '${this.filePath}':\n${issues}`, { cause: err });
      }
      throw err;
    }
  }

  /** Validate and write settings as YAML. Creates the parent directory if needed. */
  save(settings: Settings): void {
    const validated = SettingsSchema.parse(settings);
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const content = yaml.dump(validated, { indent: 2, lineWidth: 100, noRefs: true });
    writeFileSync(this.filePath, content, { encoding: 'utf-8', mode: 0o600 });
  }

  // ─── Derived Values ───────────────────────────────────────────────

  /** Build the per-invocation selector for an assignment. */
  static selectorFor(settings: Settings, assignment: string): AssignmentSelector {
    return {
      organization: settings.organization,
      assignmentPrefix: assignment,
      workingDirectory: expandHome(settings.working_dir),
      cloneProtocol: settings.clone_protocol,
    };
  }
}
