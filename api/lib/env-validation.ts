/**
 * Environment Variable Validation
 *
 * Required settings for the webhook server (GitHub App credentials, Redis)
 * and the scheduled report script.
 */

/**
 * Result of validateEnv(): names of the unset variables, if any.
 */
export interface EnvValidationResult {
  valid: boolean;
  missing: string[];
}

/**
 * GitHub App credentials for the webhook server and installation clients.
 */
export interface AppConfig {
  appId: number;
  privateKey: string;
  webhookSecret?: string;
}

/**
 * Connection settings for the session store.
 */
export interface RedisConfig {
  url: string;
  keyPrefix: string;
}

export const DEFAULT_REDIS_KEY_PREFIX = "rolevote:session";
export const DEFAULT_PORT = 3000;

/** Probot's name and ours are both accepted */
const PRIVATE_KEY_VARS = ["PRIVATE_KEY", "APP_PRIVATE_KEY"] as const;

/**
 * Whether either private key variable is set.
 */
export function hasPrivateKey(): boolean {
  return PRIVATE_KEY_VARS.some((key) => !!process.env[key]);
}

/**
 * Private key from PRIVATE_KEY, falling back to APP_PRIVATE_KEY.
 * Empty strings are treated as unset, matching hasPrivateKey().
 */
export function getPrivateKey(): string | undefined {
  return process.env.PRIVATE_KEY || process.env.APP_PRIVATE_KEY || undefined;
}

export interface ValidateEnvOptions {
  requireWebhookSecret?: boolean;
  requireRedis?: boolean;
}

/**
 * Check the variables the caller needs without throwing.
 */
export function validateEnv(options: ValidateEnvOptions = {}): EnvValidationResult {
  const missing: string[] = [];

  if (!process.env.APP_ID) {
    missing.push("APP_ID");
  }
  if (!hasPrivateKey()) {
    missing.push("PRIVATE_KEY or APP_PRIVATE_KEY");
  }
  if (options.requireWebhookSecret && !process.env.WEBHOOK_SECRET) {
    missing.push("WEBHOOK_SECRET");
  }
  if (options.requireRedis && !process.env.ROLEVOTE_REDIS_URL) {
    missing.push("ROLEVOTE_REDIS_URL");
  }

  return { valid: missing.length === 0, missing };
}

/**
 * @throws Error if APP_ID is missing or not a positive number
 */
export function getAppId(): number {
  const appIdStr = process.env.APP_ID;
  if (!appIdStr) {
    throw new Error("APP_ID environment variable is not set");
  }

  const appId = Number(appIdStr);
  if (isNaN(appId) || appId <= 0) {
    throw new Error(`APP_ID must be a positive number, got: ${appIdStr}`);
  }

  return appId;
}

/**
 * Basic PEM check.
 */
export function validatePrivateKeyFormat(key: string): void {
  if (!key.includes("-----BEGIN") || !key.includes("-----END")) {
    throw new Error("Private key does not appear to be a valid PEM-encoded key");
  }
}

// ───────────────────────────────────────────────────────────────────────────────
// App Configuration
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Validated App credentials.
 * @throws Error listing missing variables, or on a malformed private key
 */
export function getAppConfig(requireWebhookSecret = false): AppConfig {
  const validation = validateEnv({ requireWebhookSecret });
  if (!validation.valid) {
    throw new Error(`Missing required environment variables: ${validation.missing.join(", ")}`);
  }

  const appId = getAppId();
  const privateKey = getPrivateKey();
  if (!privateKey) {
    throw new Error("Private key is not set");
  }
  validatePrivateKeyFormat(privateKey);

  return {
    appId,
    privateKey,
    webhookSecret: process.env.WEBHOOK_SECRET,
  };
}

/**
 * @throws Error if ROLEVOTE_REDIS_URL is unset or not a redis:// URL
 */
export function getRedisConfig(): RedisConfig {
  const url = process.env.ROLEVOTE_REDIS_URL?.trim();
  if (!url) {
    throw new Error("ROLEVOTE_REDIS_URL environment variable is not set");
  }
  if (!/^rediss?:\/\//.test(url)) {
    throw new Error(`ROLEVOTE_REDIS_URL must start with redis:// or rediss://, got: ${url}`);
  }

  const keyPrefix = process.env.ROLEVOTE_REDIS_KEY_PREFIX?.trim() || DEFAULT_REDIS_KEY_PREFIX;
  return { url, keyPrefix };
}

/**
 * HTTP port from PORT, DEFAULT_PORT when unset.
 */
export function getPort(): number {
  const raw = process.env.PORT;
  if (!raw) {
    return DEFAULT_PORT;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got: ${raw}`);
  }
  return port;
}
