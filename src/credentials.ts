import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { CliError, describeError } from "./errors.js";
import type { RuntimeSettings } from "./env.js";

export async function readToken(tokenPath: string): Promise<string | null> {
  try {
    const token = (await readFile(tokenPath, "utf8")).trim();
    return token || null;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw new CliError(
      `Failed to read authentication token: ${describeError(error)}`
    );
  }
}

export async function saveToken(tokenPath: string, token: string): Promise<void> {
  await mkdir(dirname(tokenPath), { recursive: true });
  await writeFile(tokenPath, token, { encoding: "utf8", mode: 0o600 });
}

export async function requireToken(
  settings: Pick<RuntimeSettings, "tokenPath" | "envToken">
): Promise<string> {
  const token = (await readToken(settings.tokenPath)) ?? settings.envToken;
  if (!token) {
    throw new CliError("Authentication required", [
      "Run: gitup login",
      "Then provide your GitHub token when prompted",
    ]);
  }
  return token;
}
