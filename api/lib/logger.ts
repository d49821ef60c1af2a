/**
 * Logging Abstraction
 *
 * One interface for the webhook server, the coordinator and the scripts:
 * - GitHub Actions runs (scheduled report) go through @actions/core
 * - Everything else goes to the console
 */

import * as core from "@actions/core";

/**
 * True inside a GitHub Actions job.
 */
const isGitHubActions = (): boolean => {
  return process.env.GITHUB_ACTIONS === "true";
};

/**
 * Logging surface shared by the server, the coordinator and the scripts.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  /** `error` may be anything thrown; non-Error values are stringified */
  error(message: string, error?: unknown): void;
  debug(message: string): void;
  group(name: string): void;
  groupEnd(): void;
}

function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Writes through @actions/core so groups and annotations show in the job log.
 */
class ActionsLogger implements Logger {
  info(message: string): void {
    core.info(message);
  }

  warn(message: string): void {
    core.warning(message);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      core.error(message);
      return;
    }
    const detail = describeError(error);
    core.error(`${message}: ${detail.message}`);
    if (detail.stack) {
      core.debug(detail.stack);
    }
  }

  debug(message: string): void {
    core.debug(message);
  }

  group(name: string): void {
    core.startGroup(name);
  }

  groupEnd(): void {
    core.endGroup();
  }
}

/**
 * Console output for the webhook server and local runs. Debug lines need DEBUG set.
 */
class ConsoleLogger implements Logger {
  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      console.error(`❌ ${message}`);
    } else {
      console.error(`❌ ${message}:`, error);
    }
  }

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`🔍 ${message}`);
    }
  }

  group(name: string): void {
    console.group(name);
  }

  groupEnd(): void {
    console.groupEnd();
  }
}

/**
 * Logger for the current environment.
 */
export function createLogger(): Logger {
  return isGitHubActions() ? new ActionsLogger() : new ConsoleLogger();
}

/**
 * Default instance.
 */
export const logger = createLogger();
