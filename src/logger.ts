import chalk from "chalk";

export type LogSink = (line: string) => void;

export type LoggerOptions = {
  color?: boolean;
  stdout?: LogSink;
  stderr?: LogSink;
};

const PREFIX = "gitup";

export class Logger {
  private readonly paint: chalk.Chalk;
  private readonly stdout: LogSink;
  private readonly stderr: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.paint = new chalk.Instance({ level: options.color ? 1 : 0 });
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  error(message: string, details: readonly string[] = []): void {
    this.stderr(this.paint.red(`${PREFIX} ERR! ${message}`));
    for (const line of details) {
      this.stderr(line);
    }
  }

  warn(message: string): void {
    this.stderr(this.paint.yellow(`${PREFIX} WARN ${message}`));
  }

  success(message: string): void {
    this.stdout(this.paint.green(message));
  }

  info(message: string): void {
    this.stdout(this.paint.cyan(message));
  }

  plain(message = ""): void {
    this.stdout(message);
  }

  bold(text: string): string {
    return this.paint.bold(text);
  }

  directory(name: string): string {
    return this.paint.blue(name);
  }

  file(name: string): string {
    return this.paint.white(name);
  }

  visibility(isPrivate: boolean): string {
    return isPrivate ? this.paint.yellow("private") : this.paint.green("public");
  }
}
