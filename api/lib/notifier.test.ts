import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createMetadata, generateMetadataTag } from "./bot-comments.js";
import { createRequestOperations, type RequestOperations } from "./github-client.js";
import type { Logger } from "./logger.js";
import { GitHubNotifier } from "./notifier.js";
import type { IssueComment } from "./types.js";
import type { Session } from "./voting/types.js";

const TEST_APP_ID = 12345;
const T0 = new Date("2025-03-01T12:00:00Z").getTime();

const createSession = (overrides: Partial<Session> = {}): Session => ({
  id: "octo/widgets#7",
  requester: "alice",
  title: "Request Adept role",
  consequence: { role: "Adept", grant: "adepts" },
  createdAt: T0,
  deadline: T0 + 60_000,
  policy: {
    approveThreshold: 0.5,
    minParticipants: 1,
    countAbstain: false,
    tieBreak: "fail-on-tie",
    retainBallotsAfterFinalize: true,
  },
  state: "open",
  outcome: "unset",
  resolution: null,
  resolvedAt: null,
  consequenceStatus: "not-required",
  consequenceError: null,
  feedback: [],
  ...overrides,
});

const finalizedSession = (): Session =>
  createSession({
    state: "finalized",
    outcome: "passed",
    resolution: { kind: "timer-expired" },
    resolvedAt: T0 + 60_000,
    consequenceStatus: "applied",
  });

function createMockOctokit() {
  let comments: IssueComment[] = [];
  const octokit = {
    rest: {
      issues: {
        createComment: vi.fn().mockResolvedValue({ data: { id: 501 } }),
        updateComment: vi.fn().mockResolvedValue({}),
        listComments: vi.fn(),
      },
      repos: { getCollaboratorPermissionLevel: vi.fn() },
      teams: { addOrUpdateMembershipForUserInOrg: vi.fn() },
      reactions: { createForIssueComment: vi.fn(), listForIssueComment: vi.fn() },
    },
    paginate: {
      iterator: vi.fn().mockImplementation(async function* () {
        yield { data: comments };
      }),
    },
  };
  return {
    octokit,
    setComments: (next: IssueComment[]) => {
      comments = next;
    },
  };
}

const createLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  group: vi.fn(),
  groupEnd: vi.fn(),
});

describe("GitHubNotifier", () => {
  let mock: ReturnType<typeof createMockOctokit>;
  let ops: RequestOperations;
  let resolveOperations: ReturnType<typeof vi.fn>;
  let logger: Logger;
  let notifier: GitHubNotifier;

  const createdBodies = () => mock.octokit.rest.issues.createComment.mock.calls.map(([params]) => params.body);

  beforeEach(() => {
    mock = createMockOctokit();
    ops = createRequestOperations(mock.octokit, { appId: TEST_APP_ID });
    resolveOperations = vi.fn().mockResolvedValue(ops);
    logger = createLogger();
    notifier = new GitHubNotifier(resolveOperations, { logger, retryBaseDelayMs: 0 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates the ballot box on first render", async () => {
    await notifier.render(createSession(), []);

    expect(resolveOperations).toHaveBeenCalledWith({ owner: "octo", repo: "widgets", issueNumber: 7 });
    expect(createdBodies()).toHaveLength(1);
    expect(createdBodies()[0]).toContain('"type":"ballot-box","sessionId":"octo/widgets#7"');
    expect(logger.debug).toHaveBeenCalledWith("Rendered octo/widgets#7 (open, 0 ballot(s))");
  });

  it("edits the cached ballot box on later renders", async () => {
    await notifier.render(createSession(), []);
    await notifier.render(createSession(), [{ voter: "bob", choice: "approve", updatedAt: T0 }]);

    expect(mock.octokit.paginate.iterator).toHaveBeenCalledTimes(1);
    expect(mock.octokit.rest.issues.createComment).toHaveBeenCalledTimes(1);
    expect(mock.octokit.rest.issues.updateComment).toHaveBeenCalledWith(
      expect.objectContaining({ owner: "octo", repo: "widgets", comment_id: 501 }),
    );
  });

  it("reuses an existing ballot box found by metadata", async () => {
    mock.setComments([
      {
        id: 77,
        body: generateMetadataTag(createMetadata("ballot-box", "octo/widgets#7")),
        performed_via_github_app: { id: TEST_APP_ID },
      },
    ]);

    await notifier.render(createSession(), []);

    expect(mock.octokit.rest.issues.createComment).not.toHaveBeenCalled();
    expect(mock.octokit.rest.issues.updateComment).toHaveBeenCalledWith(expect.objectContaining({ comment_id: 77 }));
  });

  it("recreates a ballot box that was deleted", async () => {
    await notifier.render(createSession(), []);
    mock.octokit.rest.issues.updateComment.mockRejectedValueOnce(Object.assign(new Error("Not Found"), { status: 404 }));

    await notifier.render(createSession(), []);

    expect(mock.octokit.paginate.iterator).toHaveBeenCalledTimes(2);
    expect(mock.octokit.rest.issues.createComment).toHaveBeenCalledTimes(2);
  });

  it("propagates permanent update failures", async () => {
    await notifier.render(createSession(), []);
    mock.octokit.rest.issues.updateComment.mockRejectedValueOnce(Object.assign(new Error("Forbidden"), { status: 403 }));

    await expect(notifier.render(createSession(), [])).rejects.toThrow("Forbidden");
  });

  it("posts the outcome comment once the session is finalized", async () => {
    await notifier.render(finalizedSession(), []);

    const bodies = createdBodies();
    expect(bodies).toHaveLength(2);
    expect(bodies[0]).toContain('"type":"ballot-box"');
    expect(bodies[1]).toContain('"type":"outcome"');
    expect(logger.debug).toHaveBeenCalledWith("Rendered octo/widgets#7 (finalized, 0 ballot(s))");
  });

  it("looks comments up again after finalization", async () => {
    await notifier.render(createSession(), []);
    await notifier.render(finalizedSession(), []);
    await notifier.render(finalizedSession(), []);

    // open render: 1 lookup; each finalized render: 1 outcome lookup, and the
    // last one also re-finds the ballot box.
    expect(mock.octokit.paginate.iterator).toHaveBeenCalledTimes(4);
  });

  it("retries transient failures", async () => {
    vi.spyOn(Math, "random").mockReturnValue(0);
    mock.octokit.rest.issues.createComment.mockRejectedValueOnce(Object.assign(new Error("HTTP 502"), { status: 502 }));

    await notifier.render(createSession(), []);

    expect(mock.octokit.rest.issues.createComment).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith("Attempt 1 failed, retrying in 0ms: HTTP 502");
  });

  describe("retire", () => {
    it("rewrites the known ballot box as deleted", async () => {
      await notifier.render(createSession(), []);

      await notifier.retire(createSession(), "admin");

      const [params] = mock.octokit.rest.issues.updateComment.mock.calls[0];
      expect(params).toMatchObject({ owner: "octo", repo: "widgets", comment_id: 501 });
      expect(params.body.split("\n")).toContain("**Status:** 🗑️ Deleted by @admin");
      expect(params.body).not.toContain("How to vote");
      // the open render was the only lookup
      expect(mock.octokit.paginate.iterator).toHaveBeenCalledTimes(1);
    });

    it("forgets the ballot box once retired", async () => {
      await notifier.render(createSession(), []);
      await notifier.retire(createSession(), "admin");
      await notifier.retire(createSession(), "admin");

      expect(mock.octokit.paginate.iterator).toHaveBeenCalledTimes(2);
    });

    it("posts nothing when the session has no ballot box", async () => {
      await notifier.retire(createSession(), "admin");

      expect(mock.octokit.rest.issues.createComment).not.toHaveBeenCalled();
      expect(mock.octokit.rest.issues.updateComment).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith("No ballot box to retire for octo/widgets#7");
    });
  });

  it("rejects session IDs that don't name an issue", async () => {
    await expect(notifier.render(createSession({ id: "not-an-issue" }), [])).rejects.toThrow(
      "Cannot render session not-an-issue: not an issue session ID",
    );
    expect(resolveOperations).not.toHaveBeenCalled();
  });
});
