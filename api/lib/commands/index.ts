/**
 * Commands Module
 *
 * Public API for `@rolevote` comment commands.
 */

export { parseCommand, KNOWN_VERBS } from "./parser.js";
export type { ParsedCommand } from "./parser.js";
export { executeCommand, isKnownCommand } from "./handlers.js";
export type { CommandContext, CommandLog, CommandResult } from "./handlers.js";
