import { join } from "node:path";
import { joinRemotePath, normalizeRemotePath } from "./address.js";
import { CliError, describeError } from "./errors.js";
import { isNotFound } from "./github.js";
import {
  decodeBase64ToBytes,
  ensureDirectory,
  listLocalFiles,
  readLocalFile,
  writeLocalFile,
} from "./io.js";
import type { TransferProgressCallback } from "./progress.js";
import type {
  ContentEntry,
  ContentListing,
  GitHubApi,
  RepoCoordinates,
  WriteOptions,
} from "./types.js";

export type UploadOutcome = "created" | "updated";

export type UploadRequest = {
  remotePath: string;
  /**
   * Name to use inside `remotePath` when that turns out to be a directory.
   * Without it an existing directory at `remotePath` is an error.
   */
  fileName?: string;
  content: Uint8Array;
};

export type UploadResult = {
  path: string;
  outcome: UploadOutcome;
};

export type DirectoryUploadResult = {
  created: number;
  updated: number;
  total: number;
};

export type DownloadResult =
  | { kind: "file"; name: string; localPath: string }
  | { kind: "directory"; files: string[]; skipped: string[] };

type TransferOptions = WriteOptions & {
  onProgress?: TransferProgressCallback;
};

/** Resolves to null on 404 so callers can branch on create vs. update. */
export async function findContent(
  api: GitHubApi,
  target: RepoCoordinates,
  path: string,
  ref?: string
): Promise<ContentListing | null> {
  try {
    return await api.getContents(target.owner, target.repo, path, ref);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

export function commitMessage(
  options: WriteOptions,
  verb: "Add" | "Update" | "Remove",
  path: string
): string {
  return options.message ?? `${verb} ${path}`;
}

export async function uploadFile(
  api: GitHubApi,
  target: RepoCoordinates,
  request: UploadRequest,
  options: WriteOptions = {}
): Promise<UploadResult> {
  let path = normalizeRemotePath(request.remotePath);
  let existing = await findContent(api, target, path, options.branch);

  if (Array.isArray(existing)) {
    if (request.fileName === undefined) {
      throw new CliError(`Cannot overwrite directory: ${path}`);
    }
    path = joinRemotePath(path, request.fileName);
    existing = await findContent(api, target, path, options.branch);
    if (Array.isArray(existing)) {
      throw new CliError(`Cannot overwrite directory: ${path}`);
    }
  }

  if (existing && existing.type !== "file") {
    throw new CliError(`Cannot overwrite ${existing.type}: ${path}`);
  }

  await api.putFile(target.owner, target.repo, path, {
    content: request.content,
    message: commitMessage(options, existing ? "Update" : "Add", path),
    sha: existing?.sha,
    branch: options.branch,
  });

  return { path, outcome: existing ? "updated" : "created" };
}

/**
 * Uploads every file below `localDir`, one request at a time. A failure
 * stops the walk and leaves the files already sent in place.
 */
export async function uploadDirectory(
  api: GitHubApi,
  target: RepoCoordinates,
  localDir: string,
  remoteDir: string,
  options: TransferOptions = {}
): Promise<DirectoryUploadResult> {
  const files = await listLocalFiles(localDir);
  const result: DirectoryUploadResult = { created: 0, updated: 0, total: files.length };

  for (const [index, relative] of files.entries()) {
    const remotePath = joinRemotePath(remoteDir, relative);
    const content = await readLocalFile(join(localDir, relative));
    let uploaded: UploadResult;
    try {
      uploaded = await uploadFile(api, target, { remotePath, content }, options);
    } catch (error) {
      throw new CliError(`Failed to upload ${remotePath}: ${describeError(error)}`);
    }

    result[uploaded.outcome] += 1;
    options.onProgress?.({
      processed: index + 1,
      total: files.length,
      path: uploaded.path,
      state: uploaded.outcome,
    });
  }

  return result;
}

async function readRemoteFile(
  api: GitHubApi,
  target: RepoCoordinates,
  entry: ContentEntry,
  ref?: string
): Promise<Uint8Array> {
  let file = entry;
  if (file.content === undefined) {
    const fetched = await api.getContents(target.owner, target.repo, entry.path, ref);
    if (Array.isArray(fetched) || fetched.type !== "file") {
      throw new CliError(`Expected a file at ${entry.path}`);
    }
    file = fetched;
  }

  if (file.encoding === "base64" && file.content !== undefined) {
    return decodeBase64ToBytes(file.content);
  }

  // Bodies over 1 MB come back with encoding "none"; the blob API serves them.
  const blob = await api.getBlob(target.owner, target.repo, file.sha);
  return decodeBase64ToBytes(blob.content);
}

export async function downloadPath(
  api: GitHubApi,
  target: RepoCoordinates,
  remotePath: string,
  localDest: string,
  options: TransferOptions = {}
): Promise<DownloadResult> {
  const path = normalizeRemotePath(remotePath);
  const listing = await api.getContents(target.owner, target.repo, path, options.branch);

  if (!Array.isArray(listing)) {
    if (listing.type !== "file") {
      throw new CliError(`Cannot download ${listing.type}: ${listing.path}`);
    }
    const localPath = join(localDest, listing.name);
    await writeLocalFile(localPath, await readRemoteFile(api, target, listing, options.branch));
    return { kind: "file", name: listing.name, localPath };
  }

  const files: string[] = [];
  const skipped: string[] = [];
  let discovered = 0;

  const walk = async (entries: ContentEntry[], localDir: string): Promise<void> => {
    await ensureDirectory(localDir);
    discovered += entries.filter((entry) => entry.type === "file").length;
    for (const entry of entries) {
      if (entry.type === "dir") {
        const children = await api.getContents(target.owner, target.repo, entry.path, options.branch);
        await walk(Array.isArray(children) ? children : [children], join(localDir, entry.name));
        continue;
      }
      if (entry.type !== "file") {
        skipped.push(entry.path);
        continue;
      }

      const localPath = join(localDir, entry.name);
      await writeLocalFile(localPath, await readRemoteFile(api, target, entry, options.branch));
      files.push(localPath);
      options.onProgress?.({
        processed: files.length,
        total: discovered,
        path: entry.path,
        state: "downloaded",
      });
    }
  };

  await walk(listing, localDest);
  return { kind: "directory", files, skipped };
}
