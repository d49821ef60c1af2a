/**
 * Unconfirmed Consequence Report
 *
 * Runs on a schedule (via GitHub Actions) against the session store and
 * lists every session whose vote passed but whose team membership grant is
 * not confirmed: still pending (the server stopped mid-finalization) or
 * failed after retries. The job fails when any exist, so an operator gets
 * notified; the server's reconciliation pass retries them on its own.
 */

import * as core from "@actions/core";
import { getRedisConfig } from "../api/lib/env-validation.js";
import { logger } from "../api/lib/index.js";
import { RedisSessionStore, createRedisClient, type Session, type SessionStore } from "../api/lib/voting/index.js";
import { runIfMain } from "./shared/run-script.js";

export interface UnconfirmedSession {
  id: string;
  requester: string;
  role: string;
  team: string;
  status: Session["consequenceStatus"];
  error: string | null;
  resolvedAt: number | null;
}

export function isUnconfirmed(session: Session): boolean {
  if (session.outcome !== "passed") {
    return false;
  }
  if (session.state === "resolving") {
    return true;
  }
  return session.consequenceStatus === "pending" || session.consequenceStatus === "failed";
}

export async function findUnconfirmedSessions(store: SessionStore): Promise<UnconfirmedSession[]> {
  const records = await store.list();
  return records
    .map((record) => record.session)
    .filter(isUnconfirmed)
    .map((session) => ({
      id: session.id,
      requester: session.requester,
      role: session.consequence.role,
      team: session.consequence.grant,
      status: session.consequenceStatus,
      error: session.consequenceError,
      resolvedAt: session.resolvedAt,
    }))
    .sort((a, b) => (a.resolvedAt ?? 0) - (b.resolvedAt ?? 0));
}

export function formatUnconfirmedLine(entry: UnconfirmedSession): string {
  const resolved = entry.resolvedAt === null ? "unknown" : new Date(entry.resolvedAt).toISOString();
  const detail = entry.error ? `: ${entry.error}` : "";
  return `${entry.id} ${entry.requester} → ${entry.team} (${entry.role}) ${entry.status} since ${resolved}${detail}`;
}

/**
 * Log the report and mark the run failed when anything is unconfirmed.
 * Returns the number of unconfirmed sessions.
 */
export async function reportUnconfirmed(store: SessionStore): Promise<number> {
  const unconfirmed = await findUnconfirmedSessions(store);

  if (unconfirmed.length === 0) {
    logger.info("All passed sessions have a confirmed consequence");
    return 0;
  }

  logger.group(`Unconfirmed consequences (${unconfirmed.length})`);
  for (const entry of unconfirmed) {
    logger.warn(formatUnconfirmedLine(entry));
  }
  logger.groupEnd();

  core.setFailed(`${unconfirmed.length} session(s) have an unconfirmed consequence`);
  return unconfirmed.length;
}

async function main(): Promise<void> {
  const redisConfig = getRedisConfig();
  const redis = createRedisClient(redisConfig.url);
  await redis.connect();

  try {
    await reportUnconfirmed(new RedisSessionStore(redis, { keyPrefix: redisConfig.keyPrefix }));
  } finally {
    await redis.quit();
  }
}

runIfMain(import.meta.url, main);
