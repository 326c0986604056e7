export interface Sample {
  timestamp: number;
  value: number;
}

/**
 * Fixed-capacity ring of samples. Pushing into a full buffer evicts the oldest.
 */
export class TrendBuffer {
  private readonly slots: Array<Sample | undefined>;
  private head = 0;
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`TrendBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Sample | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  push(timestamp: number, value: number): void {
    this.slots[(this.head + this.count) % this.capacity] = { timestamp, value };
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** Samples oldest first */
  samples(): Sample[] {
    const out: Sample[] = [];
    for (let i = 0; i < this.count; i++) {
      const sample = this.slots[(this.head + i) % this.capacity];
      if (sample) out.push(sample);
    }
    return out;
  }

  values(): number[] {
    return this.samples().map(s => s.value);
  }

  latest(): Sample | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  peak(): number {
    return this.values().reduce((max, v) => Math.max(max, v), 0);
  }

  /** Mean of the newest `n` samples (all when omitted) */
  average(n = this.count): number {
    const values = this.values().slice(-n);
    if (values.length === 0) return 0;
    return values.reduce((a, b) => a + b, 0) / values.length;
  }
}
