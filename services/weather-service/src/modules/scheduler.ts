import { componentLogger } from '../logger';
import { RefreshResult } from '../interfaces/stats';
import { toIso } from '../utils/time';
import { RefreshOptions } from './coordinator';

const log = componentLogger('scheduler');

export interface Refresher {
  refresh(cities: readonly string[], options?: RefreshOptions): Promise<RefreshResult>;
}

export type SchedulerState = 'stopped' | 'running';

export interface SchedulerOptions {
  intervalMs: number;
  cities: readonly string[];
  refreshTimeoutMs: number;
}

export interface SchedulerStatus {
  state: SchedulerState;
  intervalMs: number;
  cities: string[];
  cycleInFlight: boolean;
  lastRun: number | null;
  nextRun: number | null;
}

/**
 * Drives periodic refresh cycles. Ticks that land while a scheduled cycle
 * is still running are dropped rather than queued. A restart less than one
 * interval after the last cycle started waits for the next tick.
 */
export class RefreshScheduler {
  private timer: NodeJS.Timeout | null = null;
  private cities: string[];
  private fetchInProgress = false;
  private lastRun: number | null = null;
  private nextRun: number | null = null;

  constructor(
    private readonly refresher: Refresher,
    private readonly options: SchedulerOptions
  ) {
    this.cities = [...options.cities];
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    log.info(
      { intervalMs: this.options.intervalMs, cities: this.cities },
      'Scheduler started'
    );
    this.tick(true);
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.nextRun = null;
    log.info('Scheduler stopped');
  }

  /** Runs a cycle immediately, ignoring the overlap policy. */
  async triggerNow(cities: readonly string[] = this.cities): Promise<RefreshResult> {
    log.info({ cities }, 'Manual refresh triggered');
    return this.refresher.refresh(cities, { timeoutMs: this.options.refreshTimeoutMs });
  }

  updateCities(cities: readonly string[]): void {
    this.cities = [...cities];
    log.info({ cities: this.cities }, 'Tracked cities updated');
  }

  status(): SchedulerStatus {
    return {
      state: this.timer ? 'running' : 'stopped',
      intervalMs: this.options.intervalMs,
      cities: [...this.cities],
      cycleInFlight: this.fetchInProgress,
      lastRun: this.lastRun,
      nextRun: this.nextRun,
    };
  }

  // Interval ticks skip the recency check: timer callbacks can fire a few
  // milliseconds before a full interval has passed on the wall clock.
  private tick(onStart = false): void {
    const now = Date.now();
    this.nextRun = now + this.options.intervalMs;

    if (this.fetchInProgress) {
      log.info('Refresh cycle already running, skipping tick');
      return;
    }

    if (onStart && this.lastRun !== null && now - this.lastRun < this.options.intervalMs) {
      log.debug({ lastRun: toIso(this.lastRun) }, 'Last cycle too recent, skipping tick');
      return;
    }

    this.runScheduled().catch((err: unknown) => {
      log.error({ err }, 'Scheduled refresh crashed');
    });
  }

  private async runScheduled(): Promise<void> {
    this.fetchInProgress = true;
    this.lastRun = Date.now();

    try {
      const result = await this.refresher.refresh(this.cities, {
        timeoutMs: this.options.refreshTimeoutMs,
      });
      log.info(
        { status: result.status, failed: result.failed.length, durationMs: result.durationMs },
        'Scheduled refresh finished'
      );
    } catch (err) {
      log.error({ err }, 'Scheduled refresh failed');
    } finally {
      this.fetchInProgress = false;
    }
  }
}
