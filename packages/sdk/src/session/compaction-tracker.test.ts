import pino from "pino";
import { describe, expect, test } from "vitest";
import { CompactionTracker, type CompactionState } from "./compaction-tracker.js";
import type { InfiniteSessionConfig } from "./session-config.js";

const logger = pino({ level: "silent" });

const enabled: InfiniteSessionConfig = {
  enabled: true,
  backgroundCompactionThreshold: 0.8,
  bufferExhaustionThreshold: 0.95,
};

function usage(utilization: number) {
  return { type: "session.usage_info", data: { utilization } };
}

const complete = { type: "session.compaction_complete", data: { success: true } };

describe("CompactionTracker", () => {
  test("walks normal, background and back to normal from server events", () => {
    const tracker = new CompactionTracker(enabled, logger);
    const states: CompactionState[] = [];
    tracker.onStateChange((state) => states.push(state));

    tracker.handleEvent(usage(0.5));
    tracker.handleEvent(usage(0.85));
    tracker.handleEvent(usage(0.9));
    tracker.handleEvent(complete);

    expect(states).toEqual(["background-compacting", "normal"]);
    expect(tracker.utilization).toBe(0.9);
  });

  test("goes straight to blocked when one report crosses both thresholds", () => {
    const tracker = new CompactionTracker(enabled, logger);

    tracker.handleEvent(usage(0.97));

    expect(tracker.state).toBe("blocked-compacting");
  });

  test("escalates a background compaction to blocked", () => {
    const tracker = new CompactionTracker(enabled, logger);
    const states: CompactionState[] = [];
    tracker.onStateChange((state) => states.push(state));

    tracker.handleEvent({ type: "session.compaction_start", data: { blocking: false } });
    tracker.handleEvent({ type: "session.compaction_start", data: { blocking: true } });
    tracker.handleEvent(complete);

    expect(states).toEqual(["background-compacting", "blocked-compacting", "normal"]);
  });

  test("holds admission while blocked and releases it on completion", async () => {
    const tracker = new CompactionTracker(enabled, logger);
    tracker.handleEvent(usage(0.99));

    let admitted = false;
    const admission = tracker.waitForAdmission().then(() => {
      admitted = true;
    });
    await Promise.resolve();
    expect(admitted).toBe(false);
    expect(tracker.waitingSends).toBe(1);

    tracker.handleEvent(usage(0.99));
    await Promise.resolve();
    expect(admitted).toBe(false);

    tracker.handleEvent(complete);
    await admission;
    expect(admitted).toBe(true);
    expect(tracker.waitingSends).toBe(0);
  });

  test("admits immediately outside the blocked state", async () => {
    const tracker = new CompactionTracker(enabled, logger);
    tracker.handleEvent(usage(0.85));

    await expect(tracker.waitForAdmission()).resolves.toBeUndefined();
  });

  test("rejects held sends when failed", async () => {
    const tracker = new CompactionTracker(enabled, logger);
    tracker.handleEvent(usage(0.99));
    const admission = tracker.waitForAdmission();

    tracker.failWaiters(new Error("session destroyed"));

    await expect(admission).rejects.toThrow("session destroyed");
  });

  test("drops a held send when its signal aborts", async () => {
    const tracker = new CompactionTracker(enabled, logger);
    tracker.handleEvent(usage(0.99));
    const controller = new AbortController();
    const admission = tracker.waitForAdmission(controller.signal);
    expect(tracker.waitingSends).toBe(1);

    controller.abort("user gave up");

    await expect(admission).rejects.toThrow("Request session.send cancelled: user gave up");
    expect(tracker.waitingSends).toBe(0);
  });

  test("reset returns to normal and releases held sends", async () => {
    const tracker = new CompactionTracker(enabled, logger);
    tracker.handleEvent({ type: "session.compaction_start", data: { blocking: true, utilization: 0.97 } });
    const admission = tracker.waitForAdmission();

    tracker.reset();

    await expect(admission).resolves.toBeUndefined();
    expect(tracker.state).toBe("normal");
    expect(tracker.utilization).toBeNull();
    expect(tracker.waitingSends).toBe(0);
  });

  test("stays normal when infinite sessions are disabled", () => {
    const tracker = new CompactionTracker({ ...enabled, enabled: false }, logger);

    tracker.handleEvent(usage(0.99));
    tracker.handleEvent({ type: "session.compaction_start", data: { blocking: true } });

    expect(tracker.state).toBe("normal");
  });
});
