import { normalizeRemotePath, parseRepoAddress } from "../address.js";
import type { CommandContext } from "../context.js";
import { CliError } from "../errors.js";
import { GitHubApiError, isNotFound } from "../github.js";
import { commitMessage } from "../transfer.js";
import type { ContentListing, WriteOptions } from "../types.js";
import { connect } from "./shared.js";

export type RemoveArguments = {
  target?: string;
  options: WriteOptions;
};

const REMOVE_EXAMPLE = "Example: gitup rm user/myrepo:file.txt";

export async function runRemove(args: RemoveArguments, context: CommandContext): Promise<void> {
  if (!args.target) {
    throw new CliError("File not specified", ["Usage: gitup rm <user/repo:path>", REMOVE_EXAMPLE]);
  }

  const address = parseRepoAddress(args.target);
  if (!address) {
    throw new CliError("Invalid repository format", ["Expected format: user/repo:path", REMOVE_EXAMPLE]);
  }

  const path = normalizeRemotePath(address.path);
  if (!path) {
    throw new CliError("File path not specified", [
      "You must specify which file to remove",
      REMOVE_EXAMPLE,
    ]);
  }

  const api = await connect(context);
  const { branch } = args.options;

  try {
    const entry: ContentListing = await context.withSpinner(
      `Connecting to ${address.fullName}...`,
      () => api.getContents(address.owner, address.repo, path, branch)
    );
    if (Array.isArray(entry) || entry.type === "dir") {
      throw new CliError(`Cannot remove directory: ${path}`, [
        "You must specify a file to remove",
      ]);
    }

    await context.withSpinner(`Removing ${path}...`, () =>
      api.deleteFile(address.owner, address.repo, path, {
        message: commitMessage(args.options, "Remove", path),
        sha: entry.sha,
        branch,
      })
    );
  } catch (error) {
    if (isNotFound(error)) {
      throw new CliError(`File not found: ${path}`, [
        "Please verify:",
        "  - File path is correct",
        "  - File exists in repository",
      ]);
    }
    if (error instanceof GitHubApiError) {
      throw new CliError(`Remove failed: ${error.message}`, [
        "Please verify:",
        "  - You have delete permissions",
        "  - Repository is accessible",
      ]);
    }
    throw error;
  }

  context.logger.success(`Removed ${path} from ${address.fullName}`);
}
