/**
 * Scheduler - wall-clock aligned poll loop
 *
 * IDLE -> WAITING(nextRun) -> RUNNING -> IDLE ...
 *
 * The next run is always computed from the current time after a cycle
 * completes, so a slow cycle skips to the nearest future slot instead of
 * queuing the missed ones. Cycles never overlap.
 */

import { errorMessage } from "../../errors.js";
import { schedulerLogger } from "../../logger.js";
import { sleep as defaultSleep } from "../../utils/sleep.js";

import type { PersistResult, SyncEngine } from "./engine.js";
import type { RawPayload } from "../../types/index.js";
import type { RetryOutcome, SleepFn } from "../../utils/retry.js";

// ============================================================================
// Types
// ============================================================================

export type SchedulerState = "idle" | "waiting" | "running" | "stopped";

export type ReadingSource = (
  signal?: AbortSignal
) => Promise<RetryOutcome<RawPayload>>;

export interface CycleResult {
  startedAt: Date;
  fetched: boolean;
  persist: PersistResult | null;
  /** Message of an unexpected exception, if the cycle threw */
  error?: string;
}

export interface SchedulerOptions {
  intervalMs?: number;
  clock?: () => Date;
  sleep?: SleepFn;
  onCycle?: (result: CycleResult) => void;
}

export interface RunOptions {
  /** Stop after this many cycles; runs until stopped when omitted */
  maxCycles?: number;
}

export const DEFAULT_INTERVAL_MS = 5 * 60 * 1000;

/**
 * First instant after `now` that is a whole multiple of `intervalMs` since
 * the Unix epoch.
 */
export function nextRunAt(now: Date, intervalMs = DEFAULT_INTERVAL_MS): Date {
  const slot = Math.floor(now.getTime() / intervalMs) * intervalMs;
  return new Date(slot + intervalMs);
}

// ============================================================================
// Scheduler
// ============================================================================

export class Scheduler {
  private intervalMs: number;
  private clock: () => Date;
  private sleep: SleepFn;
  private onCycle?: (result: CycleResult) => void;
  private controller = new AbortController();

  state: SchedulerState = "idle";
  nextRun: Date | null = null;

  constructor(
    private fetchReading: ReadingSource,
    private engine: SyncEngine,
    options: SchedulerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.onCycle = options.onCycle;
  }

  /**
   * One fetch + persist. Failures are logged and reported, never thrown.
   */
  async runCycle(): Promise<CycleResult> {
    const startedAt = this.clock();
    schedulerLogger.info({ time: startedAt.toISOString() }, "Poll cycle started");

    try {
      const fetched = await this.fetchReading(this.controller.signal);
      if (!fetched.ok) {
        schedulerLogger.error(
          { attempts: fetched.attempts, error: fetched.error },
          "API request resulted in empty values"
        );
      }

      const persist = await this.engine.persist(fetched.ok ? fetched.value : "");
      if (!persist.ok) {
        schedulerLogger.error(
          { reason: persist.reason, period: persist.period },
          "Reading not persisted this cycle"
        );
      }
      return { startedAt, fetched: fetched.ok, persist };
    } catch (error) {
      const message = errorMessage(error);
      schedulerLogger.error({ error: message }, "Poll cycle failed");
      return { startedAt, fetched: false, persist: null, error: message };
    }
  }

  async run(options: RunOptions = {}): Promise<void> {
    if (this.state === "stopped") {
      this.controller = new AbortController();
    }

    let cycles = 0;
    while (!this.controller.signal.aborted) {
      if (options.maxCycles !== undefined && cycles >= options.maxCycles) {
        break;
      }

      const now = this.clock();
      const next = nextRunAt(now, this.intervalMs);
      this.nextRun = next;
      this.state = "waiting";
      schedulerLogger.info(
        { nextRun: next.toISOString() },
        "Next API call scheduled"
      );

      await this.sleep(next.getTime() - now.getTime(), this.controller.signal);
      if (this.controller.signal.aborted) break;

      this.state = "running";
      const result = await this.runCycle();
      cycles++;
      this.onCycle?.(result);
      this.state = "idle";
    }

    this.nextRun = null;
    this.state = "stopped";
    schedulerLogger.info({ cycles }, "Scheduler stopped");
  }

  /**
   * End the loop. An in-progress sleep returns at once; a running cycle
   * finishes first.
   */
  stop(): void {
    this.controller.abort();
  }
}
