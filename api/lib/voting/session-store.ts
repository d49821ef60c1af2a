/**
 * Session Store
 *
 * Durable mapping from session ID to the full session record. The
 * coordinator persists on every state transition and scans everything at
 * startup to re-register timers.
 */

import type { SessionId, SessionRecord } from "./types.js";

export interface SessionStore {
  get(id: SessionId): Promise<SessionRecord | null>;
  /** Atomic insert-or-replace of the whole record */
  upsert(record: SessionRecord): Promise<void>;
  delete(id: SessionId): Promise<void>;
  list(): Promise<SessionRecord[]>;
}

function copyRecord(record: SessionRecord): SessionRecord {
  return structuredClone(record);
}

/**
 * Process-local store for tests and single-process development.
 * Records are deep-copied in both directions.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<SessionId, SessionRecord>();

  async get(id: SessionId): Promise<SessionRecord | null> {
    const record = this.records.get(id);
    return record ? copyRecord(record) : null;
  }

  async upsert(record: SessionRecord): Promise<void> {
    this.records.set(record.session.id, copyRecord(record));
  }

  async delete(id: SessionId): Promise<void> {
    this.records.delete(id);
  }

  async list(): Promise<SessionRecord[]> {
    return Array.from(this.records.values(), copyRecord);
  }
}
