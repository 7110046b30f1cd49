export interface ChunkLatencySample {
  /** Length of the audio sent in the request. */
  audioMs: number;
  /** Time from dispatch until the provider answered. */
  requestMs: number;
  ok: boolean;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  chunks: number;
  failed: number;
  audioMs: PercentileSummary;
  requestMs: PercentileSummary;
  realtimeFactor: number;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

export class LatencyTracker {
  private samples: ChunkLatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public push(sample: ChunkLatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): LatencySummary {
    const succeeded = this.samples.filter((sample) => sample.ok);
    const totalAudioMs = succeeded.reduce((sum, sample) => sum + sample.audioMs, 0);
    const totalRequestMs = succeeded.reduce((sum, sample) => sum + sample.requestMs, 0);

    return {
      chunks: this.samples.length,
      failed: this.samples.length - succeeded.length,
      audioMs: asSummary(this.samples.map((sample) => sample.audioMs)),
      requestMs: asSummary(this.samples.map((sample) => sample.requestMs)),
      realtimeFactor: totalAudioMs > 0 ? Number((totalRequestMs / totalAudioMs).toFixed(3)) : 0
    };
  }
}
