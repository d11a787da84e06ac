export type StatusCategory = '2xx' | '3xx' | '4xx' | '5xx' | 'other';

export type TelemetrySnapshot = {
  total: number;
  categories: Record<StatusCategory, number>;
  statusCodes: Record<string, number>;
  rateLimited: number;
  serviceUnavailable: number;
  retryExhausted: number;
  retryReasons: Record<string, number>;
};

export function categorize(statusCode: number): StatusCategory {
  if (statusCode >= 200 && statusCode < 300) return '2xx';
  if (statusCode >= 300 && statusCode < 400) return '3xx';
  if (statusCode >= 400 && statusCode < 500) return '4xx';
  if (statusCode >= 500 && statusCode < 600) return '5xx';
  return 'other';
}

/** Counters for every response the fetcher sees, plus why retries ran out. */
export class ResponseTelemetry {
  private categories: Record<StatusCategory, number> = { '2xx': 0, '3xx': 0, '4xx': 0, '5xx': 0, other: 0 };
  private statusCodes = new Map<number, number>();
  private retryReasons = new Map<string, number>();
  private exhausted = 0;

  recordResponse(statusCode: number): StatusCategory {
    const category = categorize(statusCode);
    this.categories[category] += 1;
    this.statusCodes.set(statusCode, (this.statusCodes.get(statusCode) ?? 0) + 1);
    return category;
  }

  recordRetryExhausted(reason: string) {
    this.exhausted += 1;
    this.retryReasons.set(reason, (this.retryReasons.get(reason) ?? 0) + 1);
  }

  count(statusCode: number): number {
    return this.statusCodes.get(statusCode) ?? 0;
  }

  snapshot(): TelemetrySnapshot {
    const total = Object.values(this.categories).reduce((a, b) => a + b, 0);
    const statusCodes: Record<string, number> = {};
    for (const [code, n] of [...this.statusCodes.entries()].sort((a, b) => a[0] - b[0])) {
      statusCodes[String(code)] = n;
    }
    return {
      total,
      categories: { ...this.categories },
      statusCodes,
      rateLimited: this.count(429),
      serviceUnavailable: this.count(503),
      retryExhausted: this.exhausted,
      retryReasons: Object.fromEntries(this.retryReasons)
    };
  }

  summaryLines(): string[] {
    const s = this.snapshot();
    const lines = [
      `responses: ${s.total}`,
      `  2xx: ${s.categories['2xx']}`,
      `  3xx: ${s.categories['3xx']}`,
      `  4xx: ${s.categories['4xx']}`,
      `  5xx: ${s.categories['5xx']}`
    ];
    if (s.categories.other > 0) lines.push(`  other: ${s.categories.other}`);
    if (s.rateLimited > 0) lines.push(`  rate limited (429): ${s.rateLimited}`);
    if (s.serviceUnavailable > 0) lines.push(`  service unavailable (503): ${s.serviceUnavailable}`);
    if (s.retryExhausted > 0) {
      lines.push(`retries exhausted: ${s.retryExhausted}`);
      for (const [reason, n] of Object.entries(s.retryReasons)) {
        lines.push(`  ${reason}: ${n}`);
      }
    }
    return lines;
  }
}
