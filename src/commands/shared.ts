import type { CommandContext } from "../context.js";
import { requireToken } from "../credentials.js";
import { CliError } from "../errors.js";
import { isNotFound } from "../github.js";
import type { GitHubApi, RepoAddress, RepoResponse } from "../types.js";

export const ADDRESS_EXAMPLES = [
  "Valid examples:",
  "  - user/myrepo",
  "  - user/myrepo:file.txt",
  "  - user/myrepo:folder/file.txt",
];

export async function connect(context: CommandContext): Promise<GitHubApi> {
  const token = await requireToken(context.settings);
  return context.createClient(token);
}

export async function ensureRepository(
  context: CommandContext,
  api: GitHubApi,
  address: RepoAddress
): Promise<RepoResponse> {
  try {
    return await context.withSpinner(`Connecting to ${address.fullName}...`, () =>
      api.getRepository(address.owner, address.repo)
    );
  } catch (error) {
    if (!isNotFound(error)) throw error;
    throw new CliError(`Repository not found: ${address.fullName}`, [
      "Please verify:",
      "  - Repository name is correct",
      "  - You have access to the repository",
      "  - Repository exists",
    ]);
  }
}
