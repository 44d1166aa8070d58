import type { RuntimeSettings } from "./env.js";
import { GitHubClient } from "./github.js";
import { Logger } from "./logger.js";
import { ProgressPrinter } from "./progress.js";
import { promptForInput, type Prompt } from "./prompt.js";
import { createSpinnerRunner, type SpinnerRunner } from "./spinner.js";
import type { GitHubApi } from "./types.js";

/** Everything a command handler touches outside its own arguments. */
export type CommandContext = {
  settings: RuntimeSettings;
  logger: Logger;
  withSpinner: SpinnerRunner;
  prompt: Prompt;
  createClient: (token: string) => GitHubApi;
  createProgress: () => ProgressPrinter;
};

export function createDefaultContext(settings: RuntimeSettings): CommandContext {
  return {
    settings,
    logger: new Logger({ color: settings.color }),
    withSpinner: createSpinnerRunner(settings.interactive),
    prompt: promptForInput,
    createClient: (token) => new GitHubClient(token, settings.apiUrl),
    createProgress: () => new ProgressPrinter(process.stderr),
  };
}
