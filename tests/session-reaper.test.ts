import { afterEach, describe, expect, it, vi } from "vitest";
import { createIncidentEngine } from "../src/core/incident-engine";
import { asSessionId } from "../src/core/types";
import { SessionReaper } from "../src/runtime/session-reaper";
import { FIXED_NOW, createFakeAdapters, silentLogger } from "./fixtures/adapters";

afterEach(() => {
  vi.useRealTimers();
});

describe("SessionReaper", () => {
  it("sweeps once and reports what it cancelled", () => {
    const sweepIdle = vi.fn(() => [asSessionId("inc-idle0001")]);
    const onSweep = vi.fn();
    const reaper = new SessionReaper({ sweepIdle }, 1_000, silentLogger, onSweep);

    const now = new Date("2026-03-01T10:30:00.000Z");
    const report = reaper.runOnce(now);

    expect(sweepIdle).toHaveBeenCalledWith(now);
    expect(report).toEqual({
      at: "2026-03-01T10:30:00.000Z",
      swept: ["inc-idle0001"],
    });
    expect(onSweep).toHaveBeenCalledWith(report);
    expect(reaper.getState()).toEqual({
      running: false,
      sweptTotal: 1,
      lastSweep: report,
    });
  });

  it("starts once, sweeps on its interval and stops", () => {
    vi.useFakeTimers();
    const sweepIdle = vi.fn(() => []);
    const reaper = new SessionReaper({ sweepIdle }, 1_000, silentLogger);

    reaper.start();
    reaper.start();
    vi.advanceTimersByTime(3_000);
    expect(sweepIdle).toHaveBeenCalledTimes(3);
    expect(reaper.getState().running).toBe(true);

    reaper.stop();
    reaper.stop();
    vi.advanceTimersByTime(3_000);
    expect(sweepIdle).toHaveBeenCalledTimes(3);
    expect(reaper.getState().running).toBe(false);
  });

  it("runs on the engine's configured interval", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(FIXED_NOW));
    const engine = createIncidentEngine({
      adapters: createFakeAdapters().adapters,
      config: { reaperIntervalMs: 2_000, idleTimeoutMs: 1_000 },
      logger: silentLogger,
    });
    const waiting = await engine.start();
    if (waiting.status !== "waiting") {
      throw new Error(`expected waiting, got ${waiting.status}`);
    }
    const reaper = engine.createReaper();

    reaper.start();
    vi.advanceTimersByTime(1_999);
    expect(engine.get(waiting.sessionId)).not.toBeNull();

    vi.advanceTimersByTime(1);
    expect(engine.list()).toEqual([]);
    expect(reaper.getState()).toEqual({
      running: true,
      sweptTotal: 1,
      lastSweep: {
        at: "2026-03-01T10:00:02.000Z",
        swept: [waiting.sessionId],
      },
    });
    reaper.stop();
  });
});
