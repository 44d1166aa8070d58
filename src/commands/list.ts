import { describeAddress, normalizeRemotePath, parseRepoAddress } from "../address.js";
import type { CommandContext } from "../context.js";
import { CliError } from "../errors.js";
import { GitHubApiError, isNotFound } from "../github.js";
import type { ContentEntry, GitHubApi, RepoAddress, RepoResponse } from "../types.js";
import { connect } from "./shared.js";

export type ListArguments = {
  target?: string;
  options: { branch?: string };
};

/** `ls` with no argument and `ls :.` both list the user's repositories. */
export const OWN_REPOSITORIES = ":.";

async function listRepositories(context: CommandContext, api: GitHubApi): Promise<void> {
  const { logger } = context;
  let owned: { login: string; repositories: RepoResponse[] };
  try {
    owned = await context.withSpinner("Fetching repositories...", async () => {
      const user = await api.getAuthenticatedUser();
      return { login: user.login, repositories: await api.listRepositories() };
    });
  } catch (error) {
    if (!(error instanceof GitHubApiError)) throw error;
    throw new CliError(`Failed to fetch repositories: ${error.message}`);
  }

  if (owned.repositories.length === 0) {
    logger.info("No repositories found");
    return;
  }

  logger.plain(`Repositories for ${logger.bold(owned.login)}:`);
  for (const repository of owned.repositories) {
    logger.plain(`  ${repository.full_name} (${logger.visibility(repository.private)})`);
  }
}

/** A file path yields one entry, a directory its children. */
export async function fetchEntries(
  api: GitHubApi,
  address: RepoAddress,
  branch?: string
): Promise<ContentEntry[]> {
  const listing = await api.getContents(
    address.owner,
    address.repo,
    normalizeRemotePath(address.path),
    branch
  );
  return Array.isArray(listing) ? listing : [listing];
}

export function formatEntry(context: CommandContext, entry: ContentEntry): string {
  const { logger } = context;
  return entry.type === "dir"
    ? `  📁 ${logger.directory(entry.name)}`
    : `  📄 ${logger.file(entry.name)}`;
}

export async function runList(args: ListArguments, context: CommandContext): Promise<void> {
  const target = args.target ?? OWN_REPOSITORIES;
  if (target === OWN_REPOSITORIES) {
    if (args.options.branch !== undefined) {
      throw new CliError("Option --branch needs a repository", [
        "Example: gitup ls user/repo --branch dev",
      ]);
    }
    await listRepositories(context, await connect(context));
    return;
  }

  const address = parseRepoAddress(target);
  if (!address) {
    throw new CliError("Invalid repository format", [
      "Valid formats:",
      "  gitup ls :.                    (list your repositories)",
      "  gitup ls user/repo             (list repository root)",
      "  gitup ls user/repo:folder      (list specific folder)",
    ]);
  }

  const api = await connect(context);
  const path = normalizeRemotePath(address.path);
  let entries: ContentEntry[];
  try {
    entries = await context.withSpinner(`Fetching contents from ${address.fullName}...`, () =>
      fetchEntries(api, address, args.options.branch)
    );
  } catch (error) {
    if (isNotFound(error)) {
      throw new CliError(`Repository or path not found: ${address.fullName}:${path}`, [
        "Please verify:",
        "  - Repository name is correct",
        "  - Path exists in repository",
        "  - You have access to the repository",
      ]);
    }
    if (error instanceof GitHubApiError) {
      throw new CliError(`Failed to list files: ${error.message}`);
    }
    throw error;
  }

  const { logger } = context;
  logger.plain(`Contents of ${logger.bold(describeAddress(address))}:`);
  for (const entry of entries) {
    logger.plain(formatEntry(context, entry));
  }
}
