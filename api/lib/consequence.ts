/**
 * Team Membership Consequence
 *
 * A passed role request adds the requester to the role's team in the
 * repository owner's organisation. The GitHub call is idempotent, so a
 * retried or resumed consequence never double-applies.
 */

import type { OperationsResolver } from "./github-client.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { withRetry } from "./transient-error.js";
import { parseSessionId } from "./types.js";
import type { ConsequenceHandler, Session } from "./voting/types.js";

export interface GitHubTeamConsequenceOptions {
  logger?: Logger;
  retryBaseDelayMs?: number;
}

export class GitHubTeamConsequence implements ConsequenceHandler {
  private readonly logger: Logger;
  private readonly retryBaseDelayMs: number | undefined;

  constructor(
    private readonly resolveOperations: OperationsResolver,
    options: GitHubTeamConsequenceOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.retryBaseDelayMs = options.retryBaseDelayMs;
  }

  /**
   * Resolves false when the session doesn't map to a repository; API
   * failures are thrown after retries.
   */
  async applyOutcome(session: Session): Promise<boolean> {
    const ref = parseSessionId(session.id);
    if (!ref) {
      this.logger.warn(`Cannot apply consequence for ${session.id}: not an issue session ID`);
      return false;
    }

    const ops = await this.resolveOperations(ref);
    const state = await withRetry(
      () => ops.addTeamMember(ref.owner, session.consequence.grant, session.requester),
      { logger: this.logger, baseDelayMs: this.retryBaseDelayMs },
    );

    this.logger.info(
      `Added ${session.requester} to ${ref.owner}/${session.consequence.grant} (membership ${state})`,
    );
    return true;
  }
}
