import { SenderCount, UNKNOWN_SENDER } from '../types.js';

export function normalizeSender(address: string | undefined): string {
  const trimmed = address?.trim();
  return trimmed ? trimmed.toLowerCase() : UNKNOWN_SENDER;
}

/** Counts emails per sender address, case-insensitively. */
export class SenderTally {
  // Map keeps insertion order, which is the tie-break order for top()
  private counts = new Map<string, number>();

  add(address: string | undefined): void {
    const key = normalizeSender(address);
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  addAll(emails: Iterable<{ from: string }>): this {
    for (const email of emails) this.add(email.from);
    return this;
  }

  get uniqueSenders(): number {
    return this.counts.size;
  }

  top(limit: number): SenderCount[] {
    return Array.from(this.counts, ([address, count]) => ({ address, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, Math.max(0, limit));
  }
}
