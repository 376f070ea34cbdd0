/**
 * Unit tests for CorrelationTracker (verdict matching, ordering, timeouts, eviction).
 */

import { CorrelationTracker } from "../../../src/pipeline/correlation-tracker";
import type { AudioPacket, ResolvedVerdict } from "../../../src/pipeline/types";

function packet(id: number): AudioPacket {
  return { correlationId: id, samples: new Int16Array(4).fill(id), timestampMs: (id - 1) * 100 };
}

function summary(verdicts: ResolvedVerdict[]): Array<[number, boolean, string]> {
  return verdicts.map((v) => [v.packet.correlationId, v.isSpeech, v.source]);
}

function released(outcome: ReturnType<CorrelationTracker["resolve"]>): ResolvedVerdict[] {
  if (outcome.status !== "accepted") throw new Error(`expected accepted, got ${outcome.status}`);
  return outcome.released;
}

describe("CorrelationTracker", () => {
  it("releases verdicts in packet order regardless of arrival order", () => {
    const tracker = new CorrelationTracker({ maxOutstanding: 8, timeoutMs: 500 });
    tracker.register(packet(1), 0);
    tracker.register(packet(2), 0);
    tracker.register(packet(3), 0);
    expect(summary(released(tracker.resolve(2, true)))).toEqual([]);
    expect(summary(released(tracker.resolve(1, false)))).toEqual([
      [1, false, "gateway"],
      [2, true, "gateway"],
    ]);
    expect(summary(released(tracker.resolve(3, true)))).toEqual([[3, true, "gateway"]]);
    expect(tracker.size).toBe(0);
  });

  it("reports a second verdict for a held entry as duplicate", () => {
    const tracker = new CorrelationTracker({ maxOutstanding: 8, timeoutMs: 500 });
    tracker.register(packet(1), 0);
    tracker.register(packet(2), 0);
    tracker.resolve(2, true);
    expect(tracker.resolve(2, false)).toEqual({ status: "duplicate" });
  });

  it("reports a verdict for a released id as stale and a never-issued id as unknown", () => {
    const tracker = new CorrelationTracker({ maxOutstanding: 8, timeoutMs: 500 });
    tracker.register(packet(1), 0);
    tracker.register(packet(2), 0);
    tracker.resolve(1, true);
    expect(tracker.resolve(1, true)).toEqual({ status: "stale" });
    expect(tracker.resolve(99, true)).toEqual({ status: "unknown" });
    expect(tracker.resolve(0, true)).toEqual({ status: "unknown" });
  });

  it("resolves requests older than the timeout as lost non-speech", () => {
    const tracker = new CorrelationTracker({ maxOutstanding: 8, timeoutMs: 500 });
    tracker.register(packet(1), 0);
    tracker.register(packet(2), 300);
    expect(tracker.expire(499)).toEqual({ expired: 0, released: [] });
    const result = tracker.expire(500);
    expect(result.expired).toBe(1);
    expect(summary(result.released)).toEqual([[1, false, "lost"]]);
    expect(tracker.outstanding).toBe(1);
    expect(tracker.resolve(1, true)).toEqual({ status: "stale" });
  });

  it("forces the oldest unresolved packet to non-speech past the outstanding bound", () => {
    const tracker = new CorrelationTracker({ maxOutstanding: 2, timeoutMs: 500 });
    expect(tracker.register(packet(1), 0)).toEqual([]);
    expect(tracker.register(packet(2), 0)).toEqual([]);
    expect(summary(tracker.register(packet(3), 0))).toEqual([[1, false, "evicted"]]);
    expect(tracker.outstanding).toBe(2);
  });

  it("cancelAll drops everything without releasing", () => {
    const tracker = new CorrelationTracker({ maxOutstanding: 8, timeoutMs: 500 });
    tracker.register(packet(1), 0);
    tracker.register(packet(2), 0);
    tracker.cancelAll();
    expect(tracker.size).toBe(0);
    expect(tracker.outstanding).toBe(0);
    expect(tracker.expire(10_000)).toEqual({ expired: 0, released: [] });
  });
});
