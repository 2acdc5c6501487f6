/** Running key-handling latencies, in milliseconds. */
export class LatencyStats {
  private readonly samples: number[] = [];

  get count(): number {
    return this.samples.length;
  }

  record(milliseconds: number): void {
    this.samples.push(milliseconds);
  }

  average(): number | null {
    if (this.samples.length === 0) {
      return null;
    }
    return this.samples.reduce((sum, sample) => sum + sample, 0) / this.samples.length;
  }

  /** Times `run` and records how long it took. */
  measure<T>(run: () => T, now: () => number = () => performance.now()): T {
    const started = now();
    try {
      return run();
    } finally {
      this.record(now() - started);
    }
  }
}
