import { localBaseName, parseRepoAddress, resolveUploadPath } from "../address.js";
import type { CommandContext } from "../context.js";
import { CliError } from "../errors.js";
import { GitHubApiError } from "../github.js";
import { readLocalFile, statKind } from "../io.js";
import { uploadFile } from "../transfer.js";
import type { GitHubApi, RepoAddress, WriteOptions } from "../types.js";
import { ADDRESS_EXAMPLES, connect, ensureRepository } from "./shared.js";

export type SendArguments = {
  file?: string;
  target?: string;
  options: WriteOptions;
};

const SEND_USAGE = [
  "Usage: gitup send <local_file> <user/repo[:path]>",
  "Example: gitup send myfile.txt user/myrepo:folder/file.txt",
];

/** Uploads one local file, creating or updating it, and reports the outcome. */
export async function sendLocalFile(
  context: CommandContext,
  api: GitHubApi,
  address: RepoAddress,
  localFile: string,
  options: WriteOptions
): Promise<void> {
  const remotePath = resolveUploadPath(address.path, localFile);
  const content = await readLocalFile(localFile);

  try {
    const result = await context.withSpinner(`Uploading ${remotePath}...`, () =>
      uploadFile(
        api,
        address,
        { remotePath, fileName: localBaseName(localFile), content },
        options
      )
    );
    const verb = result.outcome === "created" ? "Created" : "Updated";
    context.logger.success(`${verb} ${result.path} in ${address.fullName}`);
  } catch (error) {
    if (!(error instanceof GitHubApiError)) throw error;
    throw new CliError(`Upload failed: ${error.message}`, [
      "Possible causes:",
      "  - File too large (GitHub limit)",
      "  - No write permission",
      "  - Filename conflict",
    ]);
  }
}

export async function runSend(args: SendArguments, context: CommandContext): Promise<void> {
  if (!args.file) {
    throw new CliError("File not specified", SEND_USAGE);
  }
  if (!args.target) {
    throw new CliError("Repository not specified", SEND_USAGE);
  }

  const address = parseRepoAddress(args.target);
  if (!address) {
    throw new CliError("Invalid repository format", [
      "Expected format: user/repo[:path]",
      ...ADDRESS_EXAMPLES,
    ]);
  }

  if ((await statKind(args.file)) !== "file") {
    throw new CliError(`File not found: ${args.file}`, [
      "Please verify:",
      "  - File path is correct",
      "  - File exists",
      "  - You have read permissions",
    ]);
  }

  const api = await connect(context);
  await ensureRepository(context, api, address);
  await sendLocalFile(context, api, address, args.file, args.options);
}
