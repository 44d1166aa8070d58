import { config as loadEnv } from "dotenv";
import { DEFAULT_TOKEN_PATH, GH_API } from "./config.js";

let envLoaded = false;

export type RuntimeSettings = {
  apiUrl: string;
  tokenPath: string;
  envToken: string | null;
  color: boolean;
  interactive: boolean;
};

export function ensureEnvironment(): void {
  if (!envLoaded) {
    loadEnv();
    envLoaded = true;
  }
}

function readSetting(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

export function resolveSettings(
  env: NodeJS.ProcessEnv = process.env,
  stdoutIsTTY = Boolean(process.stdout.isTTY),
  stderrIsTTY = Boolean(process.stderr.isTTY)
): RuntimeSettings {
  ensureEnvironment();
  const apiUrl = readSetting(env, "GITUP_API_URL") ?? GH_API;

  return {
    apiUrl: apiUrl.replace(/\/+$/, ""),
    tokenPath: readSetting(env, "GITUP_TOKEN_PATH") ?? DEFAULT_TOKEN_PATH,
    envToken: readSetting(env, "GITHUB_TOKEN"),
    color: stdoutIsTTY && env.NO_COLOR === undefined,
    interactive: stderrIsTTY,
  };
}
