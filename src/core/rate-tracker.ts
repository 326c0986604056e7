/**
 * Per-second rates from monotonically increasing counters, keyed by id.
 * The first observation of a key yields 0; a counter that goes backwards
 * (stats reset) also yields 0 and rebases.
 */
export class RateTracker {
  private readonly previous = new Map<string, { value: number; at: number }>();
  private readonly rates = new Map<string, number>();

  observe(key: string, value: number, now: number): number {
    const prior = this.previous.get(key);
    this.previous.set(key, { value, at: now });
    let rate = 0;
    if (prior && now > prior.at && value >= prior.value) {
      rate = ((value - prior.value) * 1000) / (now - prior.at);
    }
    this.rates.set(key, rate);
    return rate;
  }

  rate(key: string): number {
    return this.rates.get(key) ?? 0;
  }

  has(key: string): boolean {
    return this.previous.has(key);
  }
}
