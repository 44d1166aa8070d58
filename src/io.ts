import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

export type LocalKind = "file" | "directory" | "other" | "missing";

export async function statKind(path: string): Promise<LocalKind> {
  try {
    const stats = await stat(path);
    if (stats.isFile()) return "file";
    if (stats.isDirectory()) return "directory";
    return "other";
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return "missing";
    }
    throw error;
  }
}

/**
 * Lists every regular file below `root` as a `/`-separated path relative
 * to it, sorted. Symlinks are followed to files but not to directories.
 */
export async function listLocalFiles(root: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(relative: string): Promise<void> {
    const entries = await readdir(join(root, relative), { withFileTypes: true });
    for (const entry of entries) {
      const child = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(child);
      } else if (entry.isFile()) {
        files.push(child);
      } else if (entry.isSymbolicLink() && (await statKind(join(root, child))) === "file") {
        files.push(child);
      }
    }
  }

  await walk("");
  return files.sort((a, b) => a.localeCompare(b));
}

export async function readLocalFile(path: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(path));
}

export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function writeLocalFile(path: string, bytes: Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, bytes);
}

export function decodeBase64ToBytes(base64: string): Uint8Array {
  const clean = base64.replace(/\n/g, "");
  return new Uint8Array(Buffer.from(clean, "base64"));
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}
