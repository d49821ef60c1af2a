/**
 * GitHub API Client Abstraction
 *
 * The handful of GitHub calls role requests need, behind one class that
 * accepts probot's context.octokit or an installation client built by the
 * server for timer-driven work.
 */

import { isBotComment, type CommentType } from "./bot-comments.js";
import { REQUEST_CLIENT_CHECKS, hasPaginateIterator, validateClient } from "./client-validation.js";
import { getErrorStatus } from "./transient-error.js";
import { isPermissionLevel, type IssueComment, type IssueRef, type PermissionLevel } from "./types.js";

export type ReactionContent = "+1" | "-1" | "confused" | "eyes" | "rocket";

export type MembershipState = "active" | "pending";

/**
 * Minimal Octokit surface used here. Probot's octokit satisfies it.
 */
export interface GitHubClient {
  rest: {
    issues: {
      createComment: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        body: string;
      }) => Promise<{ data: { id: number } }>;

      updateComment: (params: {
        owner: string;
        repo: string;
        comment_id: number;
        body: string;
      }) => Promise<unknown>;

      listComments: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        per_page?: number;
      }) => Promise<{ data: IssueComment[] }>;
    };
    repos: {
      getCollaboratorPermissionLevel: (params: {
        owner: string;
        repo: string;
        username: string;
      }) => Promise<{ data: { permission: string; role_name?: string } }>;
    };
    teams: {
      addOrUpdateMembershipForUserInOrg: (params: {
        org: string;
        team_slug: string;
        username: string;
        role?: "member" | "maintainer";
      }) => Promise<{ data: { state: string } }>;
    };
    reactions: {
      createForIssueComment: (params: {
        owner: string;
        repo: string;
        comment_id: number;
        content: ReactionContent;
      }) => Promise<unknown>;

      listForIssueComment: (params: {
        owner: string;
        repo: string;
        comment_id: number;
        content?: ReactionContent;
        per_page?: number;
        page?: number;
      }) => Promise<{ data: Array<{ user?: { login: string } | null }> }>;
    };
  };
  paginate: {
    iterator: <T>(method: unknown, params: unknown) => AsyncIterable<{ data: T[] }>;
  };
}

function isValidGitHubClient(obj: unknown): obj is GitHubClient {
  return validateClient(obj, REQUEST_CLIENT_CHECKS) && hasPaginateIterator(obj);
}

export interface RequestOperationsConfig {
  /** Our GitHub App ID, used to recognise our own comments */
  appId: number;
}

/**
 * @throws Error if the client lacks a method RequestOperations calls
 */
export function createRequestOperations(octokit: unknown, config: RequestOperationsConfig): RequestOperations {
  if (!isValidGitHubClient(octokit)) {
    throw new Error(
      "Invalid GitHub client: expected an Octokit-like object with rest.issues, rest.repos, rest.teams, rest.reactions and paginate.iterator",
    );
  }
  return new RequestOperations(octokit, config.appId);
}

export class RequestOperations {
  constructor(
    private readonly client: GitHubClient,
    private readonly appId: number,
  ) {}

  /**
   * Post a comment and return its ID.
   */
  async createComment(ref: IssueRef, body: string): Promise<number> {
    const { data } = await this.client.rest.issues.createComment({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.issueNumber,
      body,
    });
    return data.id;
  }

  async updateComment(ref: IssueRef, commentId: number, body: string): Promise<void> {
    await this.client.rest.issues.updateComment({
      owner: ref.owner,
      repo: ref.repo,
      comment_id: commentId,
      body,
    });
  }

  /**
   * Find our comment of the given type for a session. Only comments
   * posted by this app count. Paginates through all comments.
   */
  async findBotComment(ref: IssueRef, type: CommentType, sessionId: string): Promise<number | null> {
    const iterator = this.client.paginate.iterator<IssueComment>(this.client.rest.issues.listComments, {
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.issueNumber,
      per_page: 100,
    });

    for await (const { data: comments } of iterator) {
      for (const comment of comments) {
        if (isBotComment(comment.body, this.appId, comment.performed_via_github_app?.id, type, sessionId)) {
          return comment.id;
        }
      }
    }
    return null;
  }

  /**
   * Effective permission of a user on the repository. Users who aren't
   * collaborators (404) have "none".
   */
  async getPermissionLevel(ref: Pick<IssueRef, "owner" | "repo">, username: string): Promise<PermissionLevel> {
    try {
      const { data } = await this.client.rest.repos.getCollaboratorPermissionLevel({
        owner: ref.owner,
        repo: ref.repo,
        username,
      });
      // role_name distinguishes maintain/triage; permission folds them into write/read.
      if (isPermissionLevel(data.role_name)) {
        return data.role_name;
      }
      return isPermissionLevel(data.permission) ? data.permission : "none";
    } catch (error) {
      if (getErrorStatus(error) === 404) {
        return "none";
      }
      throw error;
    }
  }

  /**
   * Add a user to an organisation team. Idempotent: an existing member
   * stays a member. "pending" means the user still has to accept an org
   * invitation.
   */
  async addTeamMember(org: string, teamSlug: string, username: string): Promise<MembershipState> {
    const { data } = await this.client.rest.teams.addOrUpdateMembershipForUserInOrg({
      org,
      team_slug: teamSlug,
      username,
      role: "member",
    });
    return data.state === "pending" ? "pending" : "active";
  }

  async react(ref: Pick<IssueRef, "owner" | "repo">, commentId: number, content: ReactionContent): Promise<void> {
    await this.client.rest.reactions.createForIssueComment({
      owner: ref.owner,
      repo: ref.repo,
      comment_id: commentId,
      content,
    });
  }
  /**
   * Whether `login` left a reaction of this type on the comment.
   */
  async hasReactionFrom(
    ref: Pick<IssueRef, "owner" | "repo">,
    commentId: number,
    content: ReactionContent,
    login: string,
  ): Promise<boolean> {
    const perPage = 100;
    for (let page = 1; ; page += 1) {
      const { data: reactions } = await this.client.rest.reactions.listForIssueComment({
        owner: ref.owner,
        repo: ref.repo,
        comment_id: commentId,
        content,
        per_page: perPage,
        page,
      });
      if (reactions.some((reaction) => reaction.user?.login === login)) {
        return true;
      }
      if (reactions.length < perPage) {
        return false;
      }
    }
  }

  /**
   * Login of this app's bot user (e.g. "rolevote[bot]"), taken from a
   * comment it posted on the issue. Null when it hasn't posted there.
   */
  async findAppBotLogin(ref: IssueRef): Promise<string | null> {
    const iterator = this.client.paginate.iterator<IssueComment>(this.client.rest.issues.listComments, {
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.issueNumber,
      per_page: 100,
    });

    for await (const { data: comments } of iterator) {
      for (const comment of comments) {
        if (comment.performed_via_github_app?.id === this.appId && comment.user) {
          return comment.user.login;
        }
      }
    }
    return null;
  }

}

/**
 * Operations for a repository's installation. Timer-driven work has no
 * webhook context, so adapters look the client up per repository.
 */
export type OperationsResolver = (repository: Pick<IssueRef, "owner" | "repo">) => Promise<RequestOperations>;
