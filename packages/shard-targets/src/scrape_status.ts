// packages/shard-targets/src/scrape_status.ts
import { TargetState } from './types.js';

export type ScrapeHealth = 'unknown' | 'up' | 'down';

export type ScrapeResult = {
  start: Date;
  durationSeconds: number;
  error?: Error | null;
  series?: number;
};

/**
 * Runtime bookkeeping for one target hash.
 * The same instance is carried across reconciliations while the hash stays assigned.
 */
export class ScrapeStatus {
  state: TargetState = TargetState.Normal;
  attemptCount = 0;
  series: number;

  health: ScrapeHealth = 'unknown';
  lastError = '';
  lastScrape: Date | null = null;
  lastScrapeDurationSeconds = 0;

  constructor(series: number) {
    this.series = series;
  }

  /** Called by the scraper after every attempt. */
  recordScrape(res: ScrapeResult): void {
    this.attemptCount += 1;
    this.lastScrape = res.start;
    this.lastScrapeDurationSeconds = res.durationSeconds;

    if (res.error) {
      this.health = 'down';
      this.lastError = res.error.message;
    } else {
      this.health = 'up';
      this.lastError = '';
    }

    if (typeof res.series === 'number') this.series = res.series;
  }

  toJSON() {
    return {
      state: this.state,
      attemptCount: this.attemptCount,
      series: this.series,
      health: this.health,
      lastError: this.lastError,
      lastScrape: this.lastScrape ? this.lastScrape.toISOString() : null,
      lastScrapeDurationSeconds: this.lastScrapeDurationSeconds,
    };
  }
}
