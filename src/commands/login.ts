import { TOKEN_SETTINGS_URL } from "../config.js";
import type { CommandContext } from "../context.js";
import { saveToken } from "../credentials.js";
import { CliError } from "../errors.js";
import { GitHubApiError } from "../github.js";
import type { UserResponse } from "../types.js";

export async function runLogin(context: CommandContext): Promise<void> {
  const { logger } = context;
  logger.plain(logger.bold("GitHub Authentication"));
  logger.plain();
  logger.plain("To authenticate, you need a GitHub personal access token.");
  logger.plain("How to get a token:");
  logger.plain(`  1. Go to ${TOKEN_SETTINGS_URL}`);
  logger.plain("  2. Click 'Generate new token (classic)'");
  logger.plain("  3. Select required permissions (repo, user)");
  logger.plain("  4. Copy the generated token");
  logger.plain();

  const token = (await context.prompt("GitHub token: ")).trim();
  if (!token) {
    throw new CliError("Token cannot be empty");
  }

  const client = context.createClient(token);
  let user: UserResponse;
  try {
    user = await context.withSpinner("Verifying token...", () =>
      client.getAuthenticatedUser()
    );
  } catch (error) {
    if (!(error instanceof GitHubApiError)) throw error;
    throw new CliError("Authentication failed", [
      "Please verify:",
      "  - Token is correct",
      "  - Token has required permissions",
      "  - Internet connection is working",
    ]);
  }

  await saveToken(context.settings.tokenPath, token);
  logger.success(`Authenticated as ${user.login}`);
}
