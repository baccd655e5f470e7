import { access, mkdir, readdir } from 'node:fs/promises';
import { constants, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { AssignmentSelectorSchema } from '../config/schema.js';
import type { AssignmentSelector, RemoteRepository, RepositoryTarget } from '../config/schema.js';
import { repositoryUrl, type RepositoryLister } from '../github/client.js';
import { RemoteListingError, ResolutionError, errorMessage } from './errors.js';

/** Sentinel selecting every repository of the assignment. */
export const ALL_TARGETS = Symbol('ALL_TARGETS');

export type TargetSelection = typeof ALL_TARGETS | readonly string[];

/**
 * Where ALL is looked up: the organization on GitHub, or clones already
 * present in the working directory.
 */
export type Discovery = 'remote' | 'local';

/**
 * Resolves an assignment plus a student selection into ordered repository targets.
 * The returned order is the order every report uses.
 */
export class RepositorySet {
  private readonly selector: AssignmentSelector;
  private readonly lister: RepositoryLister | undefined;

  constructor(selector: AssignmentSelector, lister?: RepositoryLister) {
    const parsed = AssignmentSelectorSchema.safeParse(selector);
    if (!parsed.success) {
      throw new ResolutionError(parsed.error.issues.map((i) => i.message).join('; '));
    }
    this.selector = Object.freeze(parsed.data);
    this.lister = lister;
  }

  get assignment(): string {
    return this.selector.assignmentPrefix;
  }

  async resolve(selection: TargetSelection, options: { discovery?: Discovery } = {}): Promise<RepositoryTarget[]> {
    await this.ensureWorkingDirectory();

    if (selection !== ALL_TARGETS) return this.fromIdentifiers(selection);
    return (options.discovery ?? 'remote') === 'remote' ? this.fromRemote() : this.fromWorkingDirectory();
  }

  /** Build a target for one repository name; the name must carry the assignment prefix. */
  targetFor(name: string, remoteUrl?: string): RepositoryTarget {
    const { organization, workingDirectory, cloneProtocol } = this.selector;
    return {
      identifier: name.slice(this.prefix.length),
      name,
      remoteUrl: remoteUrl ?? repositoryUrl(organization, name, cloneProtocol),
      localPath: join(workingDirectory, name),
    };
  }

  private get prefix(): string {
    return `${this.selector.assignmentPrefix}-`;
  }

  // ─── Sources ──────────────────────────────────────────────────────

  private fromIdentifiers(identifiers: readonly string[]): RepositoryTarget[] {
    const seen = new Set<string>();
    const targets: RepositoryTarget[] = [];
    for (const raw of identifiers) {
      const identifier = raw.trim();
      if (!identifier) throw new ResolutionError('student name must not be empty');
      if (identifier.includes('/')) throw new ResolutionError(`invalid student name "${identifier}"`);
      if (seen.has(identifier)) continue;
      seen.add(identifier);
      targets.push(this.targetFor(`${this.prefix}${identifier}`));
    }
    return targets;
  }

  private async fromRemote(): Promise<RepositoryTarget[]> {
    if (!this.lister) {
      throw new ResolutionError('Listing all repositories requires a GitHub connection');
    }
    const { organization, assignmentPrefix } = this.selector;
    let repos: RemoteRepository[];
    try {
      repos = await this.lister.listRepositories(organization, assignmentPrefix);
    } catch (err) {
      if (err instanceof RemoteListingError) throw err;
      throw new RemoteListingError(`Could not list repositories for github.com/${organization}: ${errorMessage(err)}`, { cause: err });
    }

    const seen = new Set<string>();
    const targets: RepositoryTarget[] = [];
    for (const repo of repos) {
      if (!repo.name.startsWith(this.prefix) || repo.name.length === this.prefix.length) continue;
      if (seen.has(repo.name)) continue;
      seen.add(repo.name);
      targets.push(this.targetFor(repo.name, repo.remoteUrl));
    }
    return targets;
  }

  private async fromWorkingDirectory(): Promise<RepositoryTarget[]> {
    const { workingDirectory } = this.selector;
    let entries: Dirent[];
    try {
      entries = await readdir(workingDirectory, { withFileTypes: true });
    } catch (err) {
      throw new ResolutionError(`Could not read working directory ${workingDirectory}: ${errorMessage(err)}`, { cause: err });
    }
    return entries
      .filter((e) => e.isDirectory() && e.name.startsWith(this.prefix) && e.name.length > this.prefix.length)
      .map((e) => e.name)
      .sort()
      .map((name) => this.targetFor(name));
  }

  // ─── Working Directory ────────────────────────────────────────────

  private async ensureWorkingDirectory(): Promise<void> {
    const { workingDirectory } = this.selector;
    try {
      await mkdir(workingDirectory, { recursive: true });
      await access(workingDirectory, constants.R_OK | constants.W_OK | constants.X_OK);
    } catch (err) {
      throw new ResolutionError(`Working directory ${workingDirectory} is not accessible: ${errorMessage(err)}`, { cause: err });
    }
  }
}
