import type { ProgressSnapshot } from '../core/types.js';

const SPINNER_FRAMES = ['⣾', '⣽', '⣻', '⢿', '⡿', '⣟', '⣯', '⣷'];

export interface ProgressStream {
  write(chunk: string): boolean;
}

export interface ProgressReporterOptions {
  /** Read-only snapshot accessor */
  snapshot: () => Promise<ProgressSnapshot>;
  stream: ProgressStream;
  intervalMs: number;
}

export function formatProgressLine(snapshot: ProgressSnapshot, frame: number): string {
  const spinner = SPINNER_FRAMES[frame % SPINNER_FRAMES.length];
  return `\r${spinner} Crawled: ${snapshot.crawled} | Queued: ${snapshot.queued} | Depth: ${snapshot.depth}`
    + ` | HTML: ${snapshot.htmlCount} | Backend: ${snapshot.backendCount} | Functions: ${snapshot.functionCount}`;
}

/**
 * Periodic progress line. Reads snapshots only; never touches crawl state.
 * `stop()` resolves after the last tick has finished, so nothing is written
 * once it returns.
 */
export class ProgressReporter {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private frame = 0;
  private stopped = false;

  constructor(private readonly options: ProgressReporterOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer || this.stopped) return;
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
    if (this.frame > 0) this.options.stream.write('\n');
  }

  private tick(): void {
    // skip a beat rather than pile up renders
    if (this.inFlight) return;
    this.inFlight = this.render().finally(() => {
      this.inFlight = null;
    });
  }

  private async render(): Promise<void> {
    const snapshot = await this.options.snapshot();
    if (this.stopped && !this.timer) return;
    this.options.stream.write(formatProgressLine(snapshot, this.frame));
    this.frame += 1;
  }
}
