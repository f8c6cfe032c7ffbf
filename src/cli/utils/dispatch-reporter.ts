import type { DispatchProgress } from '../../core/types.js';

/**
 * Single-line progress display for an upload run. Nothing is printed
 * until the first chunk reports, so interactive prompts come first.
 */
export class DispatchReporter {
  private spinnerFrames = ['⣾', '⣽', '⣻', '⢿', '⡿', '⣟', '⣯', '⣷'];
  private spinnerIdx = 0;
  private startTime = Date.now();
  private last: DispatchProgress | null = null;

  constructor(
    private readonly headerMsg: string,
    private readonly write: (text: string) => void = (text) => process.stdout.write(text)
  ) {}

  public onProgress(progress: DispatchProgress): void {
    if (this.last === null) {
      this.startTime = Date.now();
      this.write(this.headerMsg);
    }
    this.last = progress;
    this.write(`\r\x1b[K${this.render(progress)} ${this.getFrame()}`);
  }

  public finish(): void {
    if (this.last === null) return;
    const duration = Date.now() - this.startTime;
    this.write(`\r\x1b[K${this.render(this.last)}...done [${duration}ms]\n`);
  }

  public render(progress: DispatchProgress): string {
    const pct = progress.total > 0 ? Math.round((progress.processed / progress.total) * 100) : 0;
    return (
      `Chunk ${progress.chunk}/${progress.totalChunks}: ${progress.processed}/${progress.total} records ` +
      `(${progress.succeeded} ok, ${progress.failed} failed) [${pct}%]`
    );
  }

  private getFrame(): string {
    return this.spinnerFrames[this.spinnerIdx++ % this.spinnerFrames.length];
  }
}
