import { runCopy, type CopyArguments } from "./commands/copy.js";
import { runList, type ListArguments } from "./commands/list.js";
import { runLogin } from "./commands/login.js";
import { runRemove, type RemoveArguments } from "./commands/remove.js";
import { runSend, type SendArguments } from "./commands/send.js";
import { VERSION } from "./config.js";
import { createDefaultContext, type CommandContext } from "./context.js";
import { resolveSettings } from "./env.js";
import { CliError, describeError } from "./errors.js";
import { GitHubApiError } from "./github.js";

export type CommandName = "login" | "send" | "copy" | "rm" | "ls";

export type CliOptions =
  | { command: "help" }
  | { command: "version" }
  | { command: "login" }
  | ({ command: "send" } & SendArguments)
  | ({ command: "copy" } & CopyArguments)
  | ({ command: "rm" } & RemoveArguments)
  | ({ command: "ls" } & ListArguments);

type CommandSpec = {
  maxPositionals: number;
  branch: boolean;
  message: boolean;
};

const COMMANDS: Record<CommandName, CommandSpec> = {
  login: { maxPositionals: 0, branch: false, message: false },
  send: { maxPositionals: 2, branch: true, message: true },
  copy: { maxPositionals: 2, branch: true, message: true },
  rm: { maxPositionals: 1, branch: true, message: true },
  ls: { maxPositionals: 1, branch: true, message: false },
};

const AVAILABLE_COMMANDS = "Available commands: login, send, copy, rm, ls";

export const USAGE = `gitup ${VERSION}
GitHub CLI tool for simple repository management

Usage: gitup <command> [options]

Commands:
  login                              Authenticate with GitHub
  send <file> <user/repo[:path]>     Upload file to repository
  copy <source> <destination>        Copy files to/from repository
  rm <user/repo:path>                Remove file from repository
  ls [user/repo[:path]]              List files in repository

Options:
  -b, --branch <name>   Branch to read from or commit to
  -m, --message <text>  Commit message for send, copy and rm
  -h, --help            Show this help
  -v, --version         Show the version

Examples:
  gitup login                                    # Authenticate with GitHub
  gitup ls :.                                    # List your repositories
  gitup ls user/repo                             # List files in repository root
  gitup ls user/repo:folder                      # List files in folder
  gitup send file.txt user/repo                  # Upload file to root
  gitup send file.txt user/repo:folder/          # Upload file to folder
  gitup copy ./folder user/repo:remote_folder    # Upload entire folder
  gitup copy user/repo:file.txt ./local/         # Download file
  gitup rm user/repo:file.txt                    # Remove file

Repository format: user/repository[:path]`;

function isCommandName(value: string): value is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

function readOptionValue(
  argv: string[],
  index: number,
  flag: string
): { value: string; next: number } {
  const arg = argv[index];
  const equals = arg.indexOf("=");
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value) throw new CliError(`Missing value for ${flag}`);
    return { value, next: index };
  }
  const value = argv[index + 1];
  if (value === undefined || value === "") {
    throw new CliError(`Missing value for ${flag}`);
  }
  return { value, next: index + 1 };
}

export function parseArguments(argv: string[]): CliOptions {
  let branch: string | undefined;
  let message: string | undefined;
  let command: CommandName | undefined;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { command: "help" };
    }
    if (arg === "-v" || arg === "--version") {
      return { command: "version" };
    }

    if (arg === "-b" || arg === "--branch" || arg.startsWith("--branch=")) {
      const { value, next } = readOptionValue(argv, i, "--branch");
      branch = value.trim();
      if (!branch) throw new CliError("Branch name cannot be empty");
      i = next;
      continue;
    }

    if (arg === "-m" || arg === "--message" || arg.startsWith("--message=")) {
      const { value, next } = readOptionValue(argv, i, "--message");
      message = value;
      i = next;
      continue;
    }

    if (arg.startsWith("-") && arg !== "-") {
      throw new CliError(`Unknown option: ${arg}`);
    }

    if (command === undefined) {
      if (!isCommandName(arg)) {
        throw new CliError(`Unknown command: ${arg}`, [AVAILABLE_COMMANDS]);
      }
      command = arg;
      continue;
    }

    positional.push(arg);
  }

  if (command === undefined) {
    throw new CliError("No command specified", [
      AVAILABLE_COMMANDS,
      "Use 'gitup --help' for more information",
    ]);
  }

  const spec = COMMANDS[command];
  if (positional.length > spec.maxPositionals) {
    throw new CliError(`Unexpected argument: ${positional[spec.maxPositionals]}`);
  }
  if (branch !== undefined && !spec.branch) {
    throw new CliError(`Option --branch is not supported by ${command}`);
  }
  if (message !== undefined && !spec.message) {
    throw new CliError(`Option --message is not supported by ${command}`);
  }

  const [first, second] = positional;
  switch (command) {
    case "login":
      return { command };
    case "send":
      return { command, file: first, target: second, options: { branch, message } };
    case "copy":
      return { command, source: first, destination: second, options: { branch, message } };
    case "rm":
      return { command, target: first, options: { branch, message } };
    case "ls":
      return { command, target: first, options: { branch } };
  }
}

async function dispatch(options: CliOptions, context: CommandContext): Promise<void> {
  switch (options.command) {
    case "help":
      context.logger.plain(USAGE);
      return;
    case "version":
      context.logger.plain(VERSION);
      return;
    case "login":
      return runLogin(context);
    case "send":
      return runSend(options, context);
    case "copy":
      return runCopy(options, context);
    case "rm":
      return runRemove(options, context);
    case "ls":
      return runList(options, context);
  }
}

function report(error: unknown, context: CommandContext): number {
  if (error instanceof CliError) {
    if (error.exitCode === 0) {
      context.logger.plain(error.message);
    } else {
      context.logger.error(error.message, error.details);
    }
    return error.exitCode;
  }
  if (error instanceof GitHubApiError) {
    context.logger.error(error.message);
    return 1;
  }
  context.logger.error(`Unexpected error: ${describeError(error)}`);
  return 1;
}

/** Runs one command and resolves to the process exit status. */
export async function runCli(
  argv: string[] = process.argv.slice(2),
  context: CommandContext = createDefaultContext(resolveSettings())
): Promise<number> {
  try {
    await dispatch(parseArguments(argv), context);
    return 0;
  } catch (error) {
    return report(error, context);
  }
}
