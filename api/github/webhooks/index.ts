import type { Probot } from "probot";
import { executeCommand, isKnownCommand, parseCommand } from "../../lib/commands/index.js";
import { createRequestOperations } from "../../lib/github-client.js";
import type { RepositoryPrivilegeCheck } from "../../lib/privilege.js";
import type { EffectiveConfig } from "../../lib/repo-config.js";
import { matchRequestedRole } from "../../lib/role-request.js";
import { buildSessionId, type IssueRef } from "../../lib/types.js";
import type { SessionCoordinator } from "../../lib/voting/coordinator.js";
import { VOTING_ERROR_CODES, isVotingError } from "../../lib/voting/errors.js";

/**
 * Role Vote - role requests decided by time-bounded votes
 *
 * Handles GitHub webhooks:
 * - New issues: open a voting session when the title names a configured role
 * - Issue comments: `@rolevote <verb>` commands
 */

type Repository = Pick<IssueRef, "owner" | "repo">;

export interface WebhookAppDeps {
  appId: number;
  coordinator: SessionCoordinator;
  loadConfig: (repository: Repository) => Promise<EffectiveConfig>;
  checkPrivilege: RepositoryPrivilegeCheck;
  /** Called with each webhook's installation so timers can find it later */
  rememberInstallation?: (repository: Repository, installationId: number) => void;
}

/** Extract repository context from webhook payload */
function getRepoContext(repository: { owner: { login: string }; name: string; full_name: string }) {
  return {
    owner: repository.owner.login,
    repo: repository.name,
    fullName: repository.full_name,
  };
}

export function createApp(deps: WebhookAppDeps): (probotApp: Probot) => void {
  const { appId, coordinator } = deps;

  const remember = (repository: Repository, installation: { id: number } | undefined): void => {
    if (installation && deps.rememberInstallation) {
      deps.rememberInstallation(repository, installation.id);
    }
  };

  return (probotApp: Probot): void => {
    probotApp.log.info("Role Vote initialized");

    probotApp.on("issues.opened", async (context) => {
      const { issue } = context.payload;
      const { owner, repo, fullName } = getRepoContext(context.payload.repository);
      remember({ owner, repo }, context.payload.installation);

      if (issue.user.type === "Bot") {
        return;
      }

      try {
        const config = await deps.loadConfig({ owner, repo });
        if (!config.requests.enabled) {
          return;
        }

        const role = matchRequestedRole(issue.title, config.requests.roles);
        if (!role) {
          return;
        }

        context.log.info(`Opening ${role.name} vote for ${issue.user.login} on #${issue.number} in ${fullName}`);
        await coordinator.open({
          id: buildSessionId({ owner, repo, issueNumber: issue.number }),
          requester: issue.user.login,
          title: issue.title,
          consequence: { role: role.name, grant: role.team },
          policy: role.policy,
          durationSeconds: config.requests.durationMs / 1000,
        });
      } catch (error) {
        if (isVotingError(error, VOTING_ERROR_CODES.DUPLICATE_SESSION)) {
          context.log.info(`Session already exists for #${issue.number} in ${fullName}`);
          return;
        }
        context.log.error({ err: error, issue: issue.number, repo: fullName }, "Failed to open role vote");
        throw error;
      }
    });

    probotApp.on("issue_comment.created", async (context) => {
      const { issue, comment } = context.payload;
      if (issue.pull_request) {
        return;
      }
      if (comment.performed_via_github_app?.id === appId || comment.user.type === "Bot") {
        return;
      }

      const parsed = parseCommand(comment.body);
      if (!parsed || !isKnownCommand(parsed.verb)) {
        return;
      }

      const { owner, repo, fullName } = getRepoContext(context.payload.repository);
      remember({ owner, repo }, context.payload.installation);
      const ref: IssueRef = { owner, repo, issueNumber: issue.number };

      try {
        await executeCommand({
          coordinator,
          ops: createRequestOperations(context.octokit, { appId }),
          ref,
          issueTitle: issue.title,
          issueAuthor: issue.user.login,
          commentId: comment.id,
          senderLogin: comment.user.login,
          verb: parsed.verb,
          freeText: parsed.freeText,
          loadConfig: () => deps.loadConfig({ owner, repo }),
          isPrivileged: (login) => deps.checkPrivilege({ owner, repo }, login),
          log: context.log,
        });
      } catch (error) {
        context.log.error({ err: error, issue: issue.number, repo: fullName }, `Failed to process ${parsed.verb} command`);
        throw error;
      }
    });
  };
}
