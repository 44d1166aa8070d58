import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline";
import { CliError } from "./errors.js";

export type Prompt = (question: string) => Promise<string>;

/** Reads one line. Ctrl-C or end of input rejects with an exit-0 `Cancelled`. */
export function promptForInput(
  question: string,
  input: NodeJS.ReadableStream = stdin,
  output: NodeJS.WritableStream = stdout
): Promise<string> {
  const rl = createInterface({ input, output });
  return new Promise<string>((resolve, reject) => {
    rl.once("SIGINT", () => rl.close());
    rl.once("close", () => reject(new CliError("Cancelled", [], 0)));
    rl.once("line", (line) => {
      resolve(line);
      rl.close();
    });
    rl.setPrompt(question);
    rl.prompt();
  });
}
