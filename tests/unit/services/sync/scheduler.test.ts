import { beforeEach, describe, it, expect, vi } from "vitest";

import { SensorCatalog } from "../../../../src/services/catalog/sensors.js";
import { TabularStore } from "../../../../src/services/sheets/store.js";
import { SyncEngine } from "../../../../src/services/sync/engine.js";
import {
  DEFAULT_INTERVAL_MS,
  Scheduler,
  nextRunAt,
  type CycleResult,
  type ReadingSource,
} from "../../../../src/services/sync/scheduler.js";
import { STORE_RETRY_POLICY, withStep } from "../../../../src/utils/retry.js";
import { InMemoryBackend } from "../../../mocks/tabular-backend.js";

import type { SleepFn } from "../../../../src/utils/retry.js";

describe("services/sync/scheduler", () => {
  // ============================================================================
  // nextRunAt()
  // ============================================================================

  describe("nextRunAt", () => {
    it.each([
      ["2024-08-12T16:53:20.000Z", "2024-08-12T16:55:00.000Z"],
      ["2024-08-12T16:55:00.000Z", "2024-08-12T17:00:00.000Z"],
      ["2024-08-12T16:59:59.999Z", "2024-08-12T17:00:00.000Z"],
      ["2024-12-31T23:58:00.000Z", "2025-01-01T00:00:00.000Z"],
    ])("should schedule %s at %s", (now, expected) => {
      expect(nextRunAt(new Date(now)).toISOString()).toBe(expected);
    });

    it("should always return a future slot boundary", () => {
      const now = new Date("2024-08-12T16:53:20.123Z");
      const next = nextRunAt(now);

      expect(next.getTime()).toBeGreaterThan(now.getTime());
      expect(next.getTime() % DEFAULT_INTERVAL_MS).toBe(0);
    });

    it("should honour a custom interval", () => {
      expect(
        nextRunAt(new Date("2024-08-12T16:53:20.000Z"), 60_000).toISOString()
      ).toBe("2024-08-12T16:54:00.000Z");
    });
  });

  // ============================================================================
  // Scheduler
  // ============================================================================

  describe("Scheduler", () => {
    let backend: InMemoryBackend;
    let engine: SyncEngine;
    let now: Date;
    let waits: number[];
    const clock = (): Date => now;

    const sleep: SleepFn = async (ms) => {
      waits.push(ms);
      now = new Date(now.getTime() + ms);
    };

    const reading =
      (payload: string): ReadingSource =>
      async () => ({ ok: true, value: payload, attempts: 1 });

    const failing: ReadingSource = async () => ({
      ok: false,
      error: "fetch failed",
      attempts: 4,
    });

    beforeEach(() => {
      now = new Date("2024-08-12T16:53:20.000Z");
      waits = [];
      backend = new InMemoryBackend();
      engine = new SyncEngine(
        new TabularStore(backend, { policy: withStep(STORE_RETRY_POLICY, 0) }),
        SensorCatalog.parse("T1, A, Temp"),
        { clock }
      );
    });

    describe("runCycle", () => {
      it("should fetch and persist a reading", async () => {
        const scheduler = new Scheduler(reading('"T1":"68.5"'), engine, {
          clock,
          sleep,
        });

        const result = await scheduler.runCycle();

        expect(result).toEqual({
          startedAt: new Date("2024-08-12T16:53:20.000Z"),
          fetched: true,
          persist: {
            ok: true,
            period: "2024",
            row: 2,
            fieldsWritten: 1,
            skipped: [],
          },
        });
      });

      it("should hand an empty payload to the engine after a failed fetch", async () => {
        const scheduler = new Scheduler(failing, engine, { clock, sleep });

        const result = await scheduler.runCycle();

        expect(result.fetched).toBe(false);
        expect(result.persist).toEqual({ ok: false, reason: "empty-payload" });
        expect(backend.calls).toEqual([]);
      });

      it("should report an exception instead of throwing", async () => {
        const source: ReadingSource = async () => {
          throw new Error("boom");
        };
        const scheduler = new Scheduler(source, engine, { clock, sleep });

        const result = await scheduler.runCycle();

        expect(result).toMatchObject({
          fetched: false,
          persist: null,
          error: "boom",
        });
      });
    });

    describe("run", () => {
      it("should wait for each slot boundary before a cycle", async () => {
        const cycles: CycleResult[] = [];
        const scheduler = new Scheduler(reading('"T1":"68.5"'), engine, {
          clock,
          sleep,
          onCycle: (result) => cycles.push(result),
        });

        await scheduler.run({ maxCycles: 2 });

        expect(waits).toEqual([100_000, 300_000]);
        expect(cycles.map((cycle) => cycle.startedAt.toISOString())).toEqual([
          "2024-08-12T16:55:00.000Z",
          "2024-08-12T17:00:00.000Z",
        ]);
        expect(backend.sheet("2024")?.rows).toEqual([
          ["Temp"],
          ["68.5"],
          ["68.5"],
        ]);
        expect(scheduler.state).toBe("stopped");
        expect(scheduler.nextRun).toBeNull();
      });

      it("should skip slots missed by a slow cycle", async () => {
        const slow: ReadingSource = async () => {
          now = new Date(now.getTime() + 7 * 60_000);
          return { ok: true, value: '"T1":"1"', attempts: 1 };
        };
        const scheduler = new Scheduler(slow, engine, { clock, sleep });

        await scheduler.run({ maxCycles: 2 });

        // 16:55 cycle ends at 17:02, next slot is 17:05
        expect(waits).toEqual([100_000, 180_000]);
      });

      it("should keep running after failed cycles", async () => {
        const onCycle = vi.fn();
        const scheduler = new Scheduler(failing, engine, {
          clock,
          sleep,
          onCycle,
        });

        await scheduler.run({ maxCycles: 3 });

        expect(onCycle).toHaveBeenCalledTimes(3);
      });

      it("should end the loop when stopped", async () => {
        const scheduler = new Scheduler(reading('"T1":"1"'), engine, {
          clock,
          sleep,
          onCycle: () => scheduler.stop(),
        });

        await scheduler.run();

        expect(waits).toEqual([100_000]);
        expect(scheduler.state).toBe("stopped");
      });

      it("should abort a pending sleep", async () => {
        const pending: SleepFn = (_ms, signal) =>
          new Promise<void>((resolve) => {
            signal?.addEventListener("abort", () => resolve(), { once: true });
          });
        const onCycle = vi.fn();
        const scheduler = new Scheduler(reading('"T1":"1"'), engine, {
          clock,
          sleep: pending,
          onCycle,
        });

        const running = scheduler.run();
        expect(scheduler.state).toBe("waiting");
        scheduler.stop();
        await running;

        expect(onCycle).not.toHaveBeenCalled();
        expect(scheduler.state).toBe("stopped");
      });
    });
  });
});
