// src/monitoring/metric-families.ts
//
// Minimal counter / gauge / histogram families rendered in the Prometheus
// text exposition format (version 0.0.4).

export type Labels = Readonly<Record<string, string>>;
export type MetricType = 'counter' | 'gauge' | 'histogram';

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const DEFAULT_LATENCY_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

export abstract class MetricFamily {
  abstract readonly type: MetricType;

  constructor(
    readonly name: string,
    readonly help: string,
    readonly labelNames: readonly string[] = [],
  ) {
    if (!METRIC_NAME.test(name)) {
      throw new Error(`Invalid metric name: ${name}`);
    }
    for (const l of labelNames) {
      if (!LABEL_NAME.test(l) || l.startsWith('__')) {
        throw new Error(`Invalid label name: ${l}`);
      }
    }
    if (new Set(labelNames).size !== labelNames.length) {
      throw new Error(`Duplicate label names on ${name}`);
    }
  }

  /** HELP/TYPE header plus one line per series, series sorted by label key */
  render(): string[] {
    const lines = [
      `# HELP ${this.name} ${escapeHelp(this.help)}`,
      `# TYPE ${this.name} ${this.type}`,
    ];
    return lines.concat(this.renderSeries());
  }

  protected abstract renderSeries(): string[];

  /**
   * Canonical series key. Rejects labels the family doesn't declare and
   * fills undeclared-but-missing ones with "" so every series has the same
   * label set.
   */
  protected keyOf(labels: Labels): string {
    for (const k of Object.keys(labels)) {
      if (!this.labelNames.includes(k)) {
        throw new Error(`Unknown label "${k}" for metric ${this.name}`);
      }
    }
    const key = this.labelNames
      .map((l) => `${l}="${escapeLabel(labels[l] ?? '')}"`)
      .join(',');
    if (!this.labelsByKey.has(key)) {
      const filled = this.labelNames.map(
        (l): [string, string] => [l, labels[l] ?? ''],
      );
      this.labelsByKey.set(key, Object.freeze(Object.fromEntries(filled)));
    }
    return key;
  }

  /** One `name{labels} value` line per series */
  protected renderValues(series: Map<string, number>): string[] {
    return sortedEntries(series).map(
      ([key, v]) => `${this.name}${braces(key)} ${formatValue(v)}`,
    );
  }

  protected labelsOf(key: string): Labels {
    return this.labelsByKey.get(key) ?? {};
  }

  private readonly labelsByKey = new Map<string, Labels>();
}

/* -------------------------------- Counter -------------------------------- */

export class Counter extends MetricFamily {
  readonly type = 'counter' as const;
  private readonly series = new Map<string, number>();

  inc(labels: Labels = {}, value = 1): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Counter ${this.name} can only increase (got ${value})`);
    }
    const key = this.keyOf(labels);
    this.series.set(key, (this.series.get(key) ?? 0) + value);
  }

  get(labels: Labels = {}): number {
    return this.series.get(this.keyOf(labels)) ?? 0;
  }

  /** Sum over every series */
  total(): number {
    let sum = 0;
    for (const v of this.series.values()) sum += v;
    return sum;
  }

  /** Value per distinct value of one label, summed over the others */
  byLabel(labelName: string): Map<string, number> {
    const out = new Map<string, number>();
    for (const [key, v] of sortedEntries(this.series)) {
      const labelValue = this.labelsOf(key)[labelName] ?? '';
      out.set(labelValue, (out.get(labelValue) ?? 0) + v);
    }
    return out;
  }

  /** Pre-create a series at 0 so scrapers see it before the first event */
  init(labels: Labels): void {
    const key = this.keyOf(labels);
    if (!this.series.has(key)) this.series.set(key, 0);
  }

  protected renderSeries(): string[] {
    return this.renderValues(this.series);
  }
}

/* --------------------------------- Gauge --------------------------------- */

export class Gauge extends MetricFamily {
  readonly type = 'gauge' as const;
  private readonly series = new Map<string, number>();

  set(labels: Labels, value: number): void {
    this.series.set(this.keyOf(labels), value);
  }

  get(labels: Labels = {}): number {
    return this.series.get(this.keyOf(labels)) ?? 0;
  }

  protected renderSeries(): string[] {
    return this.renderValues(this.series);
  }
}

/* ------------------------------- Histogram ------------------------------- */

interface HistogramSeries {
  counts: number[]; // per bucket, non-cumulative; last slot is +Inf
  sum: number;
  count: number;
}

export class Histogram extends MetricFamily {
  readonly type = 'histogram' as const;
  readonly buckets: readonly number[];
  private readonly series = new Map<string, HistogramSeries>();

  constructor(
    name: string,
    help: string,
    labelNames: readonly string[],
    buckets: readonly number[],
  ) {
    super(name, help, labelNames);
    if (labelNames.includes('le')) {
      throw new Error('"le" is reserved for histogram buckets');
    }
    const sorted = [...new Set(buckets)]
      .filter(Number.isFinite)
      .sort((a, b) => a - b);
    if (!sorted.length) {
      throw new Error(`Histogram ${name} needs at least one bucket`);
    }
    this.buckets = Object.freeze(sorted);
  }

  observe(labels: Labels, value: number): void {
    if (Number.isNaN(value)) {
      throw new Error(`Histogram ${this.name} cannot observe NaN`);
    }
    const key = this.keyOf(labels);
    let s = this.series.get(key);
    if (!s) {
      const counts = new Array<number>(this.buckets.length + 1).fill(0);
      s = { counts, sum: 0, count: 0 };
      this.series.set(key, s);
    }
    const idx = this.buckets.findIndex((b) => value <= b);
    s.counts[idx < 0 ? this.buckets.length : idx] += 1;
    s.sum += value;
    s.count += 1;
  }

  count(labels: Labels = {}): number {
    return this.series.get(this.keyOf(labels))?.count ?? 0;
  }

  sum(labels: Labels = {}): number {
    return this.series.get(this.keyOf(labels))?.sum ?? 0;
  }

  protected renderSeries(): string[] {
    const lines: string[] = [];
    for (const [key, s] of sortedEntries(this.series)) {
      let cumulative = 0;
      const bounds = [...this.buckets.map(formatValue), '+Inf'];
      bounds.forEach((le, i) => {
        cumulative += s.counts[i];
        const labels = key ? `${key},le="${le}"` : `le="${le}"`;
        lines.push(`${this.name}_bucket{${labels}} ${cumulative}`);
      });
      lines.push(`${this.name}_sum${braces(key)} ${formatValue(s.sum)}`);
      lines.push(`${this.name}_count${braces(key)} ${s.count}`);
    }
    return lines;
  }
}

/* ------------------------------- Helpers ------------------------------ */

function sortedEntries<V>(m: Map<string, V>): Array<[string, V]> {
  return [...m.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function braces(key: string): string {
  return key ? `{${key}}` : '';
}

export function formatValue(v: number): string {
  if (Number.isNaN(v)) return 'NaN';
  if (v === Infinity) return '+Inf';
  if (v === -Infinity) return '-Inf';
  return String(v);
}

function escapeLabel(v: string): string {
  return v.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapeHelp(v: string): string {
  return v.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}
