/**
 * Transient Error Detection
 *
 * Classifies GitHub API and network failures as transient (worth retrying)
 * or permanent, and wraps calls with exponential backoff. Used by the
 * consequence handler and the notifier; the coordinator decides what a
 * failure after the last attempt means.
 */

import { logger as defaultLogger, type Logger } from "./logger.js";

/** Network-level error codes that indicate a transient failure. */
export const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

type Headers = Record<string, string | number | undefined>;

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function getResponseHeaders(error: unknown): Headers | undefined {
  const headers = readProperty(readProperty(error, "response"), "headers");
  if (typeof headers !== "object" || headers === null) {
    return undefined;
  }
  const result: Headers = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string" || typeof value === "number") {
      result[key] = value;
    }
  }
  return result;
}

function getHeaderValue(headers: Headers | undefined, name: string): string | undefined {
  if (!headers) {
    return undefined;
  }
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === target && value !== undefined) {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Extract the HTTP status code from an error object, or null if absent.
 */
export function getErrorStatus(error: unknown): number | null {
  const status = readProperty(error, "status");
  return typeof status === "number" ? status : null;
}

/**
 * 403 or 429 carrying rate-limit signals. A plain 403 (permission denied)
 * is not a rate limit.
 */
export function isRateLimitError(error: unknown): boolean {
  const status = getErrorStatus(error);
  if (status !== 403 && status !== 429) {
    return false;
  }
  const headers = getResponseHeaders(error);
  if (getHeaderValue(headers, "x-ratelimit-remaining") === "0" || getHeaderValue(headers, "retry-after")) {
    return true;
  }
  const message = readProperty(error, "message");
  return typeof message === "string" && message.toLowerCase().includes("rate limit");
}

/**
 * Covers network error codes, HTTP 429, any 5xx and rate-limited 403s.
 */
export function isTransientError(error: unknown): boolean {
  const code = readProperty(error, "code");
  if (typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code)) {
    return true;
  }

  const status = getErrorStatus(error);
  if (status === 429) {
    return true;
  }
  if (status !== null && status >= 500) {
    return true;
  }

  return isRateLimitError(error);
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  logger?: Logger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying transient failures with exponential backoff and jitter.
 * Permanent failures and the last transient one are rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const log = options.logger ?? defaultLogger;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransientError(error) || attempt >= maxAttempts) {
        throw error;
      }
      const delay = baseDelayMs * Math.pow(2, attempt - 1) + Math.random() * 500;
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Attempt ${attempt} failed, retrying in ${Math.round(delay)}ms: ${message}`);
      await sleep(delay);
    }
  }
}
