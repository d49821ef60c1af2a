/**
 * Redis Session Store
 *
 * Layout:
 *   <prefix>:<sessionId>  string, JSON SessionRecord
 *   <prefix>:index        set of all session IDs (startup scan)
 *
 * Upsert and delete touch both keys in a single MULTI so the index never
 * points at a missing record written by this store. Records are validated
 * with zod on the way out.
 */

import { Redis } from "ioredis";
import { z } from "zod";

import { logger as defaultLogger, type Logger } from "../logger.js";
import type { SessionId, SessionRecord } from "./types.js";
import type { SessionStore } from "./session-store.js";

const REDIS_COMMAND_TIMEOUT_MS = 5000;
const REDIS_CONNECT_TIMEOUT_MS = 5000;

const ballotSchema = z.object({
  voter: z.string().min(1),
  choice: z.enum(["approve", "deny", "abstain"]),
  updatedAt: z.number(),
});

const resolutionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("timer-expired") }),
  z.object({
    kind: z.literal("privileged-override"),
    actor: z.string(),
    chosenOutcome: z.enum(["passed", "failed"]),
  }),
  z.object({ kind: z.literal("early-close"), actor: z.string() }),
]);

const sessionSchema = z.object({
  id: z.string().min(1),
  requester: z.string(),
  title: z.string(),
  consequence: z.object({ role: z.string(), grant: z.string() }),
  createdAt: z.number(),
  deadline: z.number(),
  policy: z.object({
    approveThreshold: z.number(),
    minParticipants: z.number(),
    countAbstain: z.boolean(),
    tieBreak: z.enum(["fail-on-tie", "pass-on-tie"]),
    retainBallotsAfterFinalize: z.boolean(),
  }),
  state: z.enum(["open", "resolving", "finalized"]),
  outcome: z.enum(["unset", "passed", "failed"]),
  resolution: resolutionSchema.nullable(),
  resolvedAt: z.number().nullable(),
  consequenceStatus: z.enum(["not-required", "pending", "applied", "failed"]),
  consequenceError: z.string().nullable(),
  feedback: z.array(
    z.object({ author: z.string(), text: z.string(), submittedAt: z.number() }),
  ),
  finalCounts: z.object({ approve: z.number(), deny: z.number(), abstain: z.number() }).optional(),
});

export const sessionRecordSchema = z.object({
  session: sessionSchema,
  ballots: z.array(ballotSchema),
});

/**
 * Parse a stored record. Throws with the offending key on malformed data.
 */
export function parseSessionRecord(raw: string, key: string): SessionRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Session record ${key} is not valid JSON`);
  }

  const result = sessionRecordSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join(".") : "";
    throw new Error(`Session record ${key} is invalid at '${path}': ${issue?.message ?? "unknown"}`);
  }
  return result.data;
}

export interface RedisSessionStoreOptions {
  keyPrefix: string;
  logger?: Logger;
}

export class RedisSessionStore implements SessionStore {
  private readonly keyPrefix: string;
  private readonly logger: Logger;

  constructor(
    private readonly client: Redis,
    options: RedisSessionStoreOptions,
  ) {
    this.keyPrefix = options.keyPrefix;
    this.logger = options.logger ?? defaultLogger;
  }

  private recordKey(id: SessionId): string {
    return `${this.keyPrefix}:${id}`;
  }

  private get indexKey(): string {
    return `${this.keyPrefix}:index`;
  }

  async get(id: SessionId): Promise<SessionRecord | null> {
    const key = this.recordKey(id);
    const raw = await this.client.get(key);
    return raw === null ? null : parseSessionRecord(raw, key);
  }

  async upsert(record: SessionRecord): Promise<void> {
    const id = record.session.id;
    const results = await this.client
      .multi()
      .set(this.recordKey(id), JSON.stringify(record))
      .sadd(this.indexKey, id)
      .exec();
    assertTransactionSucceeded(results, `upsert ${id}`);
  }

  async delete(id: SessionId): Promise<void> {
    const results = await this.client
      .multi()
      .del(this.recordKey(id))
      .srem(this.indexKey, id)
      .exec();
    assertTransactionSucceeded(results, `delete ${id}`);
  }

  /**
   * Load every indexed record. Malformed or vanished records are skipped
   * with a warning so one bad key cannot block startup.
   */
  async list(): Promise<SessionRecord[]> {
    const ids = await this.client.smembers(this.indexKey);
    if (ids.length === 0) {
      return [];
    }

    const keys = ids.map((id) => this.recordKey(id));
    const values = await this.client.mget(keys);
    const records: SessionRecord[] = [];

    values.forEach((raw, i) => {
      const key = keys[i];
      if (raw === null) {
        this.logger.warn(`Session index lists ${ids[i]} but ${key} is missing`);
        return;
      }
      try {
        records.push(parseSessionRecord(raw, key));
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Skipping session record: ${detail}`);
      }
    });

    return records;
  }
}

function assertTransactionSucceeded(
  results: Array<[error: Error | null, result: unknown]> | null,
  operation: string,
): void {
  if (results === null) {
    throw new Error(`Redis transaction aborted during ${operation}`);
  }
  for (const [error] of results) {
    if (error) {
      throw new Error(`Redis transaction failed during ${operation}: ${error.message}`, {
        cause: error,
      });
    }
  }
}

/**
 * Build a Redis client tuned for a long-running webhook process.
 */
export function createRedisClient(redisUrl: string, log: Logger = defaultLogger): Redis {
  const client = new Redis(redisUrl, {
    lazyConnect: true,
    commandTimeout: REDIS_COMMAND_TIMEOUT_MS,
    connectTimeout: REDIS_CONNECT_TIMEOUT_MS,
    maxRetriesPerRequest: 1,
  });

  // Unhandled 'error' events would crash the process; command errors are
  // surfaced by the store calls themselves.
  client.on("error", (err: Error) => {
    log.error("Redis client error", err);
  });

  return client;
}
