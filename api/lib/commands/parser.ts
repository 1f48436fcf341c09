/**
 * Command Parser
 *
 * Reads release commands from issue and pull request comments. A command is
 * a line that starts with the bot mention, followed by a verb and its
 * options:
 *
 *   "@release-bot env --project-name myapp --branch-name develop"
 *   "@release-bot deploy --project-name myapp --branch-name main --environment beta"
 *   "@release-bot /help"
 *
 * Options are parsed with commander so flags, required options and stray
 * arguments behave like any other CLI.
 */

import { Command, CommanderError } from "commander";

/**
 * Mention + verb extracted from a comment body, before option parsing.
 */
export interface ParsedCommand {
  /** Lower-cased verb, e.g. "deploy" */
  verb: string;
  /** Tokens following the verb, quotes removed */
  args: string[];
}

export type ReleaseCommand =
  | { kind: "env"; projectName: string; branchName: string }
  | { kind: "deploy"; projectName: string; branchName: string; environment: string }
  | { kind: "help" }
  | { kind: "invalid"; verb: string; reason: string };

export const RELEASE_VERBS = new Set(["env", "deploy", "help"]);

interface EnvOptions {
  projectName: string;
  branchName: string;
}

interface DeployOptions extends EnvOptions {
  environment: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Remove fenced code blocks and quoted lines so pasted examples and
 * quoted replies never trigger a release.
 */
function stripNonCommandContent(body: string): string {
  return body
    .replace(/```[\s\S]*?```/g, "")
    .split("\n")
    .filter((line) => !line.trimStart().startsWith(">"))
    .join("\n");
}

/**
 * Split an argument string on whitespace, honoring single and double quotes.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of text.matchAll(pattern)) {
    tokens.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return tokens;
}

/**
 * Find the first command line addressed to `mention` in a comment body.
 * Returns null when the comment holds no command.
 */
export function parseCommand(body: string, mention: string): ParsedCommand | null {
  const pattern = new RegExp(`^[ \\t]*@${escapeRegExp(mention)}[ \\t]+/?([a-zA-Z][\\w-]*)(?:[ \\t]+(.*))?$`, "im");
  const match = stripNonCommandContent(body).match(pattern);
  if (!match) {
    return null;
  }

  return {
    verb: match[1].toLowerCase(),
    args: tokenize(match[2] ?? ""),
  };
}

function describeCommanderError(error: CommanderError): string {
  return error.message.replace(/^error: /, "");
}

function buildProgram(onParsed: (command: ReleaseCommand) => void): Command {
  const program = new Command("release")
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });

  program
    .command("env")
    .description("Describe the release tool environment of a branch")
    .requiredOption("--project-name <name>", "configured project name (case-insensitive)")
    .requiredOption("--branch-name <branch>", "remote branch to check out")
    .allowExcessArguments(false)
    .action((options: EnvOptions) => {
      onParsed({ kind: "env", projectName: options.projectName, branchName: options.branchName });
    });

  program
    .command("deploy")
    .description("Run the release tool's deploy action on a branch")
    .requiredOption("--project-name <name>", "configured project name (case-insensitive)")
    .requiredOption("--branch-name <branch>", "remote branch to check out")
    .requiredOption("--environment <env>", "deployment target handed to the release tool")
    .allowExcessArguments(false)
    .action((options: DeployOptions) => {
      onParsed({
        kind: "deploy",
        projectName: options.projectName,
        branchName: options.branchName,
        environment: options.environment,
      });
    });

  return program;
}

function validate(command: ReleaseCommand): ReleaseCommand {
  if (command.kind !== "env" && command.kind !== "deploy") {
    return command;
  }

  const projectName = command.projectName.trim().toLowerCase();
  const invalid = (reason: string): ReleaseCommand => ({ kind: "invalid", verb: command.kind, reason });

  if (!projectName) {
    return invalid("--project-name must not be empty");
  }
  if (!command.branchName.trim()) {
    return invalid("--branch-name must not be empty");
  }
  if (command.kind === "deploy") {
    if (!/^[\w.-]+$/.test(command.environment)) {
      return invalid("--environment may only contain letters, digits, '.', '_' and '-'");
    }
  }
  return { ...command, projectName };
}

/**
 * Parse the options of a release verb.
 * Unknown verbs are not expected here; callers filter on RELEASE_VERBS.
 */
export function parseReleaseCommand(command: ParsedCommand): ReleaseCommand {
  if (command.verb === "help") {
    return { kind: "help" };
  }

  const parsed: { command?: ReleaseCommand } = {};
  const program = buildProgram((result) => {
    parsed.command = result;
  });

  try {
    program.parse([command.verb, ...command.args], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === "commander.helpDisplayed" || error.code === "commander.help") {
        return { kind: "help" };
      }
      return { kind: "invalid", verb: command.verb, reason: describeCommanderError(error) };
    }
    throw error;
  }

  if (!parsed.command) {
    return { kind: "invalid", verb: command.verb, reason: `unknown command '${command.verb}'` };
  }
  return validate(parsed.command);
}
