/**
 * Shared Script Entry
 *
 * Entry guard for the server and scheduled scripts.
 */

import * as core from "@actions/core";
import { pathToFileURL } from "node:url";

/**
 * Runs main() only when the module is executed directly (not imported for
 * testing). A rejected main() marks the run failed and exits non-zero.
 *
 * @param callerUrl - Pass `import.meta.url` from the calling module
 */
export function runIfMain(callerUrl: string, main: () => Promise<void>): void {
  const entryUrl = process.argv[1] ? pathToFileURL(process.argv[1]).href : "";
  if (callerUrl === entryUrl) {
    main().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      core.setFailed(`Fatal error: ${message}`);
      process.exit(1);
    });
  }
}
