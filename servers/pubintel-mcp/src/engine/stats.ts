import type { ResultMeta } from '@pubintel/core';

/**
 * Per-request accumulator for cache and network accounting.
 *
 * One instance is created for each analysis call and threaded through the
 * orchestrator, so concurrent requests never share counters.
 */
export class FetchStats {
  cachedResponses = 0;
  liveResponses = 0;
  lastApiCallAt: string | null = null;
  readonly warnings: string[] = [];

  recordHit(): void {
    this.cachedResponses++;
  }

  recordLive(at: Date): void {
    this.liveResponses++;
    this.lastApiCallAt = at.toISOString();
  }

  warn(message: string): void {
    if (!this.warnings.includes(message)) {
      this.warnings.push(message);
    }
  }

  toMeta(now: Date = new Date()): ResultMeta {
    return {
      generatedAt: now.toISOString(),
      cachedResponses: this.cachedResponses,
      liveResponses: this.liveResponses,
      lastApiCallAt: this.lastApiCallAt,
      warnings: [...this.warnings]
    };
  }
}
