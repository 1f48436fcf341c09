/**
 * Commands Module
 *
 * Public API for the @mention command system.
 * Re-exports the parser and handler for use in webhook handlers.
 */

export { parseCommand, parseReleaseCommand, RELEASE_VERBS } from "./parser.js";
export type { ParsedCommand, ReleaseCommand } from "./parser.js";
export { executeCommand } from "./handlers.js";
export type { CommandContext, CommandOctokit, CommandResult } from "./handlers.js";
