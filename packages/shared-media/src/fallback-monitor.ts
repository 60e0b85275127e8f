/**
 * FILE PURPOSE: Track degraded per-item outcomes to detect silent breakage
 *
 * WHY: Every stage that degrades instead of failing (download drop, missing
 *      perceptual hash, assume-safe score) hides errors from the run summary.
 *      A run where half the images fail to decode still "succeeds".
 * HOW: Counter per stage of primary vs fallback outcomes. Alert levels at
 *      10% (warn), 30% (page), 50% (broken).
 */

// ============================================================================
// Types
// ============================================================================

/** Pipeline stages that degrade rather than abort. */
export type DegradableStage = 'download' | 'phash' | 'nsfw-classifier';

export interface FallbackEvent {
  stage: DegradableStage;
  reason: string;
  timestamp: number;
}

export interface FallbackStats {
  stage: DegradableStage;
  primaryCount: number;
  fallbackCount: number;
  fallbackRate: number;
  recentFallbacks: FallbackEvent[];
}

export type AlertLevel = 'ok' | 'warn' | 'page' | 'broken';

// ============================================================================
// FallbackMonitor
// ============================================================================

/**
 * Monitor fallback rates per pipeline stage.
 *
 * EXAMPLE:
 * ```typescript
 * const monitor = new FallbackMonitor();
 * const outcome = await downloadImage(url);
 * if (outcome.ok) monitor.recordPrimary('download');
 * else monitor.recordFallback('download', outcome.reason);
 *
 * monitor.getAlertLevel('download'); // 'ok' | 'warn' | 'page' | 'broken'
 * ```
 */
export class FallbackMonitor {
  private counters: Map<DegradableStage, { primary: number; fallback: number }> = new Map();
  private recentFallbacks: Map<DegradableStage, FallbackEvent[]> = new Map();
  private readonly maxRecentEvents: number;

  constructor(maxRecentEvents = 50) {
    this.maxRecentEvents = maxRecentEvents;
  }

  recordPrimary(stage: DegradableStage): void {
    const c = this.counters.get(stage) ?? { primary: 0, fallback: 0 };
    c.primary++;
    this.counters.set(stage, c);
  }

  recordFallback(stage: DegradableStage, reason: string): void {
    const c = this.counters.get(stage) ?? { primary: 0, fallback: 0 };
    c.fallback++;
    this.counters.set(stage, c);

    const events = this.recentFallbacks.get(stage) ?? [];
    events.push({ stage, reason, timestamp: Date.now() });
    if (events.length > this.maxRecentEvents) events.shift();
    this.recentFallbacks.set(stage, events);
  }

  /** Returns 0 when the stage has not run. */
  getFallbackRate(stage: DegradableStage): number {
    const c = this.counters.get(stage);
    if (!c || (c.primary + c.fallback) === 0) return 0;
    return c.fallback / (c.primary + c.fallback);
  }

  getStats(stage: DegradableStage): FallbackStats {
    const c = this.counters.get(stage) ?? { primary: 0, fallback: 0 };
    const total = c.primary + c.fallback;
    return {
      stage,
      primaryCount: c.primary,
      fallbackCount: c.fallback,
      fallbackRate: total > 0 ? c.fallback / total : 0,
      recentFallbacks: this.recentFallbacks.get(stage) ?? [],
    };
  }

  /**
   * - ok:     < 10%
   * - warn:   10-30% (a few bad sources)
   * - page:   30-50% (a dependency is degraded)
   * - broken: >= 50% (the primary path is not working)
   */
  getAlertLevel(stage: DegradableStage): AlertLevel {
    const rate = this.getFallbackRate(stage);
    if (rate >= 0.50) return 'broken';
    if (rate >= 0.30) return 'page';
    if (rate >= 0.10) return 'warn';
    return 'ok';
  }

  /** Stages seen so far, highest fallback rate first. */
  getAllStats(): FallbackStats[] {
    const stats: FallbackStats[] = [];
    for (const stage of this.counters.keys()) {
      stats.push(this.getStats(stage));
    }
    return stats.sort((a, b) => b.fallbackRate - a.fallbackRate);
  }

  /** One line per stage, e.g. `download: 1/10 degraded (warn)`. */
  summarize(): string[] {
    return this.getAllStats().map((s) =>
      `${s.stage}: ${s.fallbackCount}/${s.primaryCount + s.fallbackCount} degraded (${this.getAlertLevel(s.stage)})`,
    );
  }

  /** Reset all counters between runs. */
  reset(): void {
    this.counters.clear();
    this.recentFallbacks.clear();
  }
}
