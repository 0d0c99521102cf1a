export class ProgressTracker {
  private startTime: number | null = null;
  private written = 0;
  private skipped = 0;

  constructor(private readonly label: string) {}

  public start(): void {
    this.startTime = Date.now();
    this.written = 0;
    this.skipped = 0;
  }

  /** Records one processed page: cells written and records that did not make it. */
  public record(written: number, skipped: number): void {
    this.written += written;
    this.skipped += skipped;
  }

  public getRecordsPerSecond(): number {
    if (!this.startTime) return 0;

    const elapsedMs = Date.now() - this.startTime;
    if (elapsedMs === 0) return 0;

    return Math.floor(((this.written + this.skipped) / elapsedMs) * 1000);
  }

  public getETA(total: number): number {
    const rps = this.getRecordsPerSecond();
    const seen = this.written + this.skipped;
    if (rps === 0 || seen >= total) return 0;

    return Math.ceil((total - seen) / rps);
  }

  public getSummary(total?: number): string {
    const formatNumber = (n: number) => n.toLocaleString('en-US');

    let summary = `[${this.label}] Written: ${formatNumber(this.written)} | ` +
                  `Skipped: ${formatNumber(this.skipped)} | ` +
                  `Throughput: ${formatNumber(this.getRecordsPerSecond())} records/sec`;

    if (total) {
      summary += ` | ETA: ${this.getETA(total)}s`;
    }

    return summary;
  }
}
