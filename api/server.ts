/**
 * Role Vote Server
 *
 * Long-running process: voting deadlines are in-process timers, so the app
 * runs as a plain HTTP server rather than a per-request function.
 *
 * GET /health reports configuration and open-session count.
 * POST /api/github/webhooks is handed to probot, which verifies signatures.
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { createNodeMiddleware, createProbot } from "probot";
import type { Redis } from "ioredis";

import { ALLOW_SELF_OVERRIDE, RECONCILE_INTERVAL_MS, STORE_RETRY_DELAY_MS } from "./config.js";
import { InstallationClients } from "./github/installations.js";
import { createApp } from "./github/webhooks/index.js";
import { getAppConfig, getPort, getRedisConfig, validateEnv } from "./lib/env-validation.js";
import {
  GitHubNotifier,
  GitHubTeamConsequence,
  createPermissionPrivilegeCheck,
  createRepositoryPrivilegeCheck,
  logger,
} from "./lib/index.js";
import { RedisSessionStore, SessionCoordinator, createRedisClient } from "./lib/voting/index.js";
import { runIfMain } from "../scripts/shared/run-script.js";

export const WEBHOOKS_PATH = "/api/github/webhooks";
export const HEALTH_PATH = "/health";

type WebhookMiddleware = (req: IncomingMessage, res: ServerResponse) => Promise<unknown>;

export interface RequestListenerDeps {
  middleware: WebhookMiddleware;
  coordinator: Pick<SessionCoordinator, "listOpenSessions">;
}

function sendJson(res: ServerResponse, statusCode: number, body: Record<string, unknown>): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

/**
 * Route requests to the health check or probot. Both validate the
 * environment first (fail closed).
 */
export function createRequestListener(deps: RequestListenerDeps) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const validation = validateEnv({ requireWebhookSecret: true, requireRedis: true });
    const path = (req.url ?? "").split("?")[0];

    if (req.method === "GET" && path === HEALTH_PATH) {
      sendJson(res, validation.valid ? 200 : 503, {
        status: validation.valid ? "ok" : "misconfigured",
        app: "rolevote",
        openSessions: deps.coordinator.listOpenSessions().length,
      });
      return;
    }

    if (path !== WEBHOOKS_PATH) {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    if (!validation.valid) {
      sendJson(res, 503, { error: "Webhook processing unavailable" });
      return;
    }

    await deps.middleware(req, res);
  };
}

async function main(): Promise<void> {
  const appConfig = getAppConfig(true);
  const redisConfig = getRedisConfig();
  const port = getPort();

  const redis: Redis = createRedisClient(redisConfig.url);
  await redis.connect();

  const probot = createProbot({
    overrides: {
      appId: appConfig.appId,
      privateKey: appConfig.privateKey,
      secret: appConfig.webhookSecret,
    },
  });

  const installations = new InstallationClients(probot, { appId: appConfig.appId });
  const checkPrivilege = createRepositoryPrivilegeCheck(
    installations.getOperations,
    async (repository) => (await installations.loadConfig(repository)).requests.privilegedPermissions,
  );

  const coordinator = new SessionCoordinator(
    {
      store: new RedisSessionStore(redis, { keyPrefix: redisConfig.keyPrefix }),
      notifier: new GitHubNotifier(installations.getOperations),
      consequence: new GitHubTeamConsequence(installations.getOperations),
      isPrivileged: createPermissionPrivilegeCheck(checkPrivilege),
    },
    {
      allowSelfOverride: ALLOW_SELF_OVERRIDE,
      storeRetryDelayMs: STORE_RETRY_DELAY_MS,
    },
  );

  await coordinator.recover();

  const reconcile = async (): Promise<void> => {
    const summary = await coordinator.reconcile();
    if (summary.resumed > 0 || summary.retried > 0 || summary.unconfirmed > 0) {
      logger.info(
        `Reconciled: ${summary.resumed} resumed, ${summary.retried} retried, ${summary.unconfirmed} unconfirmed`,
      );
    }
  };
  const runReconcile = (): void => {
    reconcile().catch((error: unknown) => logger.error("Reconciliation failed", error));
  };
  runReconcile();
  const reconcileTimer = setInterval(runReconcile, RECONCILE_INTERVAL_MS);

  const middleware = await createNodeMiddleware(
    createApp({
      appId: appConfig.appId,
      coordinator,
      loadConfig: installations.loadConfig,
      checkPrivilege,
      rememberInstallation: (repository, installationId) => installations.remember(repository, installationId),
    }),
    { probot, webhooksPath: WEBHOOKS_PATH },
  );

  const listener = createRequestListener({ middleware, coordinator });
  const server = createServer((req, res) => {
    listener(req, res).catch((error: unknown) => {
      logger.error(`Request ${req.method} ${req.url} failed`, error);
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal error" });
      }
    });
  });

  server.listen(port, () => logger.info(`Role Vote listening on port ${port}`));

  let stopping = false;
  const stop = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    clearInterval(reconcileTimer);
    coordinator.shutdown();
    server.close();
    redis.quit().catch((error: unknown) => logger.error("Failed to close Redis connection", error));
  };
  process.on("SIGTERM", () => stop("SIGTERM"));
  process.on("SIGINT", () => stop("SIGINT"));
}

runIfMain(import.meta.url, main);
