import { basename } from "node:path";
import { CliError } from "./errors.js";
import type { RepoAddress } from "./types.js";

/**
 * Parses `owner/repo[:path]`. Returns null when the identifier left of the
 * first `:` is not exactly `owner/repo`.
 */
export function parseRepoAddress(input: string): RepoAddress | null {
  const separator = input.indexOf(":");
  const identifier = separator === -1 ? input : input.slice(0, separator);
  const path = separator === -1 ? "" : input.slice(separator + 1);

  const segments = identifier.split("/");
  if (segments.length !== 2) return null;

  const [owner, repo] = segments;
  if (!owner.trim() || !repo.trim()) return null;

  return { owner, repo, fullName: `${owner}/${repo}`, path };
}

export function normalizeRemotePath(path: string): string {
  const segments = path
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");
  if (segments.includes("..")) {
    throw new CliError(`Remote paths cannot contain "..": ${path}`);
  }
  return segments.join("/");
}

export function joinRemotePath(...segments: string[]): string {
  return normalizeRemotePath(segments.join("/"));
}

export function localBaseName(localPath: string): string {
  return basename(localPath.replace(/[\\/]+$/, ""));
}

export function resolveUploadPath(rawPath: string, localFile: string): string {
  const normalized = normalizeRemotePath(rawPath);
  const fileName = localBaseName(localFile);
  if (!normalized) return fileName;
  if (rawPath.endsWith("/")) return joinRemotePath(normalized, fileName);
  return normalized;
}

/** `copy` treats a source as local unless it reads like `owner/repo:path`. */
export function isLocalLooking(source: string): boolean {
  return source.startsWith(".") || source.startsWith("/") || !source.includes(":");
}

export function describeAddress(address: RepoAddress): string {
  return `${address.fullName}:${normalizeRemotePath(address.path) || "/"}`;
}
