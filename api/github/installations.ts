/**
 * Installation Clients
 *
 * Timer-driven resolutions and reconciliation have no webhook context, so
 * they authenticate as the app's installation on the session's repository.
 * Installation IDs come from webhook payloads when seen, otherwise from
 * apps.getRepoInstallation. Probot's installation clients refresh their own
 * tokens, so one client per installation is kept for the process lifetime.
 * Repository config is cached briefly to keep privilege checks cheap.
 */

import { validateClient } from "../lib/client-validation.js";
import { createRequestOperations, type RequestOperations } from "../lib/github-client.js";
import { loadRepositoryConfig, type EffectiveConfig, type RepoConfigClient } from "../lib/repo-config.js";
import type { IssueRef } from "../lib/types.js";

type Repository = Pick<IssueRef, "owner" | "repo">;

/**
 * The part of Probot used here: `auth()` for the app client,
 * `auth(installationId)` for an installation client.
 */
export interface AppAuthenticator {
  auth(installationId?: number): Promise<unknown>;
}

interface AppClient {
  rest: {
    apps: {
      getRepoInstallation: (params: { owner: string; repo: string }) => Promise<{ data: { id: number } }>;
    };
  };
}

function isAppClient(obj: unknown): obj is AppClient {
  return validateClient(obj, [{ path: "rest.apps", requiredMethods: ["getRepoInstallation"] }]);
}

function isRepoConfigClient(obj: unknown): obj is RepoConfigClient {
  return validateClient(obj, [{ path: "rest.repos", requiredMethods: ["getContent"] }]);
}

export const CONFIG_CACHE_TTL_MS = 60_000;

export interface InstallationClientsOptions {
  appId: number;
  now?: () => number;
}

export class InstallationClients {
  private readonly installationIds = new Map<string, number>();
  private readonly clients = new Map<number, Promise<unknown>>();
  private readonly configs = new Map<string, { config: EffectiveConfig; loadedAt: number }>();
  private readonly appId: number;
  private readonly now: () => number;

  constructor(
    private readonly app: AppAuthenticator,
    options: InstallationClientsOptions,
  ) {
    this.appId = options.appId;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Record the installation seen on a webhook for this repository.
   */
  remember(repository: Repository, installationId: number): void {
    this.installationIds.set(repoKey(repository), installationId);
  }

  async getOctokit(repository: Repository): Promise<unknown> {
    const installationId = await this.getInstallationId(repository);
    let client = this.clients.get(installationId);
    if (!client) {
      client = this.app.auth(installationId);
      this.clients.set(installationId, client);
      // A failed auth must not poison the cache.
      client.catch(() => this.clients.delete(installationId));
    }
    return client;
  }

  readonly getOperations = async (repository: Repository): Promise<RequestOperations> => {
    return createRequestOperations(await this.getOctokit(repository), { appId: this.appId });
  };

  readonly loadConfig = async (repository: Repository): Promise<EffectiveConfig> => {
    const key = repoKey(repository);
    const cached = this.configs.get(key);
    if (cached && this.now() - cached.loadedAt < CONFIG_CACHE_TTL_MS) {
      return cached.config;
    }

    const octokit = await this.getOctokit(repository);
    if (!isRepoConfigClient(octokit)) {
      throw new Error("Installation client is missing rest.repos.getContent");
    }
    const config = await loadRepositoryConfig(octokit, repository.owner, repository.repo);
    this.configs.set(key, { config, loadedAt: this.now() });
    return config;
  };

  private async getInstallationId(repository: Repository): Promise<number> {
    const key = repoKey(repository);
    const known = this.installationIds.get(key);
    if (known !== undefined) {
      return known;
    }

    const appClient = await this.app.auth();
    if (!isAppClient(appClient)) {
      throw new Error("App client is missing rest.apps.getRepoInstallation");
    }
    const { data } = await appClient.rest.apps.getRepoInstallation({
      owner: repository.owner,
      repo: repository.repo,
    });
    this.installationIds.set(key, data.id);
    return data.id;
  }
}

function repoKey(repository: Repository): string {
  return `${repository.owner}/${repository.repo}`.toLowerCase();
}
