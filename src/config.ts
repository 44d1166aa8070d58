import { homedir } from "node:os";
import { join } from "node:path";

export const VERSION = "1.0.0";
export const GH_API = "https://api.github.com";
export const USER_AGENT = "gitup";
export const MAX_RETRIES = 3;
export const RETRY_BASE_MS = 500;
export const REPOS_PER_PAGE = 100;
export const TOKEN_FILE_NAME = ".gitup_token";
export const DEFAULT_TOKEN_PATH = join(homedir(), TOKEN_FILE_NAME);
export const TOKEN_SETTINGS_URL = "https://github.com/settings/tokens";
export const PROGRESS_UPDATE_INTERVAL_MS = 100;
