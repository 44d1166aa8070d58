import { isLocalLooking, parseRepoAddress } from "../address.js";
import type { CommandContext } from "../context.js";
import { CliError } from "../errors.js";
import { GitHubApiError } from "../github.js";
import { statKind } from "../io.js";
import { downloadPath, uploadDirectory } from "../transfer.js";
import type { GitHubApi, RepoAddress, WriteOptions } from "../types.js";
import { connect, ensureRepository } from "./shared.js";
import { sendLocalFile } from "./send.js";

export type CopyArguments = {
  source?: string;
  destination?: string;
  options: WriteOptions;
};

const COPY_USAGE = [
  "Usage: gitup copy <source> <destination>",
  "Examples:",
  "  Upload: gitup copy ./folder user/repo:remote_folder",
  "  Download: gitup copy user/repo:file.txt ./local/",
];

async function uploadTree(
  context: CommandContext,
  api: GitHubApi,
  address: RepoAddress,
  localDir: string,
  options: WriteOptions
): Promise<void> {
  const progress = context.createProgress();
  progress.start(0, "Uploading");
  try {
    const result = await uploadDirectory(api, address, localDir, address.path, {
      ...options,
      onProgress: (update) => progress.update(update),
    });
    progress.finish();
    if (result.total === 0) {
      context.logger.warn(`No files to upload in ${localDir}`);
      return;
    }
    context.logger.success(
      `Uploaded ${result.total} files to ${address.fullName} ` +
        `(${result.created} created, ${result.updated} updated)`
    );
  } catch (error) {
    progress.finish();
    throw error;
  }
}

async function runUpload(
  context: CommandContext,
  source: string,
  destination: string,
  options: WriteOptions
): Promise<void> {
  const address = parseRepoAddress(destination);
  if (!address) {
    throw new CliError("Invalid destination repository format", [
      "For upload, destination must be: user/repo[:path]",
      "Example: gitup copy ./myfile.txt user/myrepo:folder/",
    ]);
  }

  const api = await connect(context);
  await ensureRepository(context, api, address);

  const kind = await statKind(source);
  if (kind === "missing") {
    throw new CliError(`Source not found: ${source}`, [
      "Please verify the file or folder path",
    ]);
  }
  if (kind === "directory") {
    await uploadTree(context, api, address, source, options);
    return;
  }
  if (kind === "file") {
    await sendLocalFile(context, api, address, source, options);
    return;
  }
  throw new CliError(`Invalid source: ${source}`);
}

async function runDownload(
  context: CommandContext,
  source: string,
  destination: string,
  options: WriteOptions
): Promise<void> {
  const address = parseRepoAddress(source);
  if (!address) {
    throw new CliError("Invalid source repository format", [
      "For download, source must be: user/repo:path",
      "Example: gitup copy user/myrepo:file.txt ./local/",
    ]);
  }
  if (options.message !== undefined) {
    throw new CliError("Option --message does not apply to downloads", [
      "A download makes no commit",
    ]);
  }

  const api = await connect(context);
  await ensureRepository(context, api, address);

  const progress = context.createProgress();
  progress.start(0, "Downloading");
  try {
    const result = await downloadPath(api, address, address.path, destination, {
      branch: options.branch,
      onProgress: (update) => progress.update(update),
    });
    progress.finish();

    if (result.kind === "file") {
      context.logger.success(`Downloaded ${result.name} to ${result.localPath}`);
      return;
    }
    for (const path of result.skipped) {
      context.logger.warn(`Skipped ${path} (not a regular file)`);
    }
    context.logger.success(`Downloaded ${result.files.length} files to ${destination}`);
  } catch (error) {
    progress.finish();
    if (!(error instanceof GitHubApiError)) throw error;
    throw new CliError(`Download failed: ${error.message}`, [
      "Please verify:",
      "  - File/folder path is correct",
      "  - File/folder exists in repository",
      "  - You have access to the content",
    ]);
  }
}

export async function runCopy(args: CopyArguments, context: CommandContext): Promise<void> {
  if (!args.source) {
    throw new CliError("Source not specified", COPY_USAGE);
  }
  if (!args.destination) {
    throw new CliError("Destination not specified", COPY_USAGE);
  }

  if (isLocalLooking(args.source)) {
    await runUpload(context, args.source, args.destination, args.options);
  } else {
    await runDownload(context, args.source, args.destination, args.options);
  }
}
