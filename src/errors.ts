/**
 * An error meant for the person at the terminal. `details` are printed
 * verbatim underneath the message (usage lines, checklists).
 */
export class CliError extends Error {
  constructor(
    message: string,
    readonly details: readonly string[] = [],
    readonly exitCode = 1
  ) {
    super(message);
    this.name = "CliError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
