export type CounterName =
  | "requests_total"
  | "words_inserted_total"
  | "words_rejected_total"
  | "prefix_hits_total"
  | "prefix_misses_total"
  | "corrections_total";

/** Process-local counters rendered in Prometheus text format. */
export class Metrics {
  private readonly counters = new Map<CounterName, number>();

  inc(name: CounterName, by = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  get(name: CounterName): number {
    return this.counters.get(name) ?? 0;
  }

  render(prefix = "word_suggest"): string {
    const names = Array.from(this.counters.keys()).sort();
    let out = "";
    for (const name of names) {
      out += `# TYPE ${prefix}_${name} counter\n${prefix}_${name} ${this.get(name)}\n`;
    }
    return out;
  }
}
