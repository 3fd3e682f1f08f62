/**
 * Time-windowed (timestamp, value) buffer for sustained-load detection
 */

export interface Sample {
  timestamp: number;
  value: number;
}

export interface SustainedAverageOptions {
  /** Samples required in the whole history before any average is reported */
  minSamples?: number;
  longWindowMs?: number;
  shortWindowMs?: number;
  /** Samples required in the long window to prefer its average */
  minLongWindowSamples?: number;
}

const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

export class SampleHistory {
  private samples: Sample[] = [];
  private retentionMs: number;

  constructor(retentionMs: number = DEFAULT_RETENTION_MS) {
    this.retentionMs = retentionMs;
  }

  /**
   * Append a sample and drop everything older than the retention window
   */
  record(timestamp: number, value: number): void {
    this.samples.push({ timestamp, value });
    this.prune(timestamp);
  }

  prune(now: number): void {
    const cutoff = now - this.retentionMs;
    let firstKept = 0;
    while (firstKept < this.samples.length && this.samples[firstKept].timestamp < cutoff) {
      firstKept++;
    }
    if (firstKept > 0) {
      this.samples.splice(0, firstKept);
    }
  }

  /**
   * Samples with `timestamp >= now - windowMs`
   */
  window(now: number, windowMs: number): Sample[] {
    const cutoff = now - windowMs;
    return this.samples.filter(sample => sample.timestamp >= cutoff);
  }

  average(now: number, windowMs: number): number | null {
    const samples = this.window(now, windowMs);
    if (samples.length === 0) {
      return null;
    }
    return samples.reduce((sum, sample) => sum + sample.value, 0) / samples.length;
  }

  /**
   * Mean over the last 10 minutes when that window holds at least 10 samples,
   * otherwise over the last 5 minutes. Null until the history has `minSamples`,
   * and null when the 5 minute window is empty.
   */
  sustainedAverage(now: number, options: SustainedAverageOptions = {}): number | null {
    const minSamples = options.minSamples ?? 10;
    const longWindowMs = options.longWindowMs ?? 10 * 60 * 1000;
    const shortWindowMs = options.shortWindowMs ?? 5 * 60 * 1000;
    const minLongWindowSamples = options.minLongWindowSamples ?? 10;

    if (this.samples.length < minSamples) {
      return null;
    }

    const longWindow = this.window(now, longWindowMs);
    if (longWindow.length >= minLongWindowSamples) {
      return longWindow.reduce((sum, sample) => sum + sample.value, 0) / longWindow.length;
    }

    return this.average(now, shortWindowMs);
  }

  get length(): number {
    return this.samples.length;
  }

  clear(): void {
    this.samples = [];
  }
}
