import { Octokit } from 'octokit';
import { requireGitHubToken } from '../auth/token.js';
import type { CloneProtocol, RemoteRepository, Settings } from '../config/schema.js';
import { RemoteListingError, errorMessage } from '../core/errors.js';

/** Enumerates repositories of an organization whose name starts with `{prefix}-`. */
export interface RepositoryLister {
  listRepositories(organization: string, assignmentPrefix: string): Promise<RemoteRepository[]>;
}

/** Build the clone URL for a repository without asking the API. */
export function repositoryUrl(organization: string, name: string, protocol: CloneProtocol): string {
  return protocol === 'ssh'
    ? `git@github.com:${organization}/${name}.git`
    : `https://github.com/${organization}/${name}.git`;
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  return typeof err.status === 'number' ? err.status : undefined;
}

/**
 * GitHub API client for organization repository listing.
 * Token comes from settings, env vars, or the gh CLI (see auth/token.ts).
 */
export class GitHubClient implements RepositoryLister {
  private octokit: Octokit;
  private protocol: CloneProtocol;

  constructor(octokit: Octokit, protocol: CloneProtocol = 'ssh') {
    this.octokit = octokit;
    this.protocol = protocol;
  }

  static create(settings: Pick<Settings, 'github_token' | 'clone_protocol'>): GitHubClient {
    const { token } = requireGitHubToken(settings);
    return new GitHubClient(new Octokit({ auth: token }), settings.clone_protocol);
  }

  /** List every repo in the organization named `{assignmentPrefix}-*`, sorted by name. */
  async listRepositories(organization: string, assignmentPrefix: string): Promise<RemoteRepository[]> {
    const prefix = `${assignmentPrefix}-`;
    try {
      const repos = await this.octokit.paginate(this.octokit.rest.repos.listForOrg, {
        org: organization,
        type: 'all',
        sort: 'full_name',
        per_page: 100,
      });
      return repos
        .filter((r) => r.name.startsWith(prefix) && r.name.length > prefix.length)
        .map((r) => ({
          name: r.name,
          remoteUrl: (this.protocol === 'ssh' ? r.ssh_url : r.clone_url) ?? repositoryUrl(organization, r.name, this.protocol),
        }));
    } catch (err) {
      throw new RemoteListingError(describeFailure(organization, err), { cause: err });
    }
  }

  /** Confirm the token can see the organization. Used by `configure` before writing settings. */
  async verifyOrganization(organization: string): Promise<{ login: string; name: string | null }> {
    try {
      const { data } = await this.octokit.rest.orgs.get({ org: organization });
      return { login: data.login, name: data.name ?? null };
    } catch (err) {
      throw new RemoteListingError(describeFailure(organization, err), { cause: err });
    }
  }
}

function describeFailure(organization: string, err: unknown): string {
  const status = httpStatus(err);
  if (status === 401) return `Could not authenticate for github.com/${organization}: bad credentials`;
  if (status === 403) return `Access to github.com/${organization} denied (check token scopes or rate limit)`;
  if (status === 404) return `Organization github.com/${organization} not found or not visible to this token`;
  return `Could not list repositories for github.com/${organization}: ${errorMessage(err)}`;
}
