import { PROGRESS_UPDATE_INTERVAL_MS } from "./config.js";

export type TransferState = "created" | "updated" | "downloaded";

export type TransferUpdate = {
  processed: number;
  total: number;
  path: string;
  state: TransferState;
};

export type TransferProgressCallback = (update: TransferUpdate) => void;

export type ProgressStream = {
  write(chunk: string): unknown;
  isTTY?: boolean;
  columns?: number;
};

export class ProgressPrinter {
  private total = 0;
  private processed = 0;
  private lastRenderTimestamp = 0;
  private lastUpdate: TransferUpdate | null = null;
  private started = false;

  constructor(
    private readonly stream: ProgressStream = process.stderr,
    private readonly now: () => number = Date.now,
    private label = "Transferring"
  ) {}

  start(total: number, label = this.label): void {
    this.label = label;
    this.total = Math.max(total, 0);
    this.processed = 0;
    this.lastUpdate = null;
    this.started = true;
  }

  update(update: TransferUpdate): void {
    if (!this.started) return;
    this.processed = update.processed;
    this.total = Math.max(update.total, this.processed);
    this.lastUpdate = update;

    if (!this.stream.isTTY) {
      this.stream.write(
        `${update.state} ${update.path} (${update.processed}/${update.total})\n`
      );
      return;
    }

    const now = this.now();
    if (
      update.processed < update.total &&
      now - this.lastRenderTimestamp < PROGRESS_UPDATE_INTERVAL_MS
    ) {
      return;
    }

    this.render();
    this.lastRenderTimestamp = now;
  }

  finish(): void {
    if (!this.started) return;
    if (this.stream.isTTY && this.lastUpdate) {
      // Clear the bar so the summary line starts on a clean row.
      this.stream.write(`\r${"".padEnd(this.stream.columns ?? 80)}\r`);
    }
    this.started = false;
  }

  private render(): void {
    const percent = this.total === 0 ? 100 : Math.floor((this.processed / this.total) * 100);
    const barLength = 24;
    const filledLength = Math.round((percent / 100) * barLength);
    const bar = `${"#".repeat(filledLength)}${"-".repeat(barLength - filledLength)}`;
    const latest = this.lastUpdate ? `${this.lastUpdate.state}: ${this.lastUpdate.path}` : "";
    const line = `${this.label} [${bar}] ${this.processed}/${this.total} (${percent}%) ${latest}`;

    const width = this.stream.columns ?? line.length;
    this.stream.write(`\r${line.slice(0, width).padEnd(width)}`);
  }
}
