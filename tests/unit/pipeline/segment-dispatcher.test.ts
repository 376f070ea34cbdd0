/**
 * Unit tests for SegmentDispatcher (recognition requests, ordered release, gaps).
 */

import { SegmentDispatcher, type DispatchRelease, type ReplyOutcome } from "../../../src/pipeline/segment-dispatcher";
import type { RecognitionResponse } from "../../../src/adapters/asr/types";
import type { SpeechSegment } from "../../../src/pipeline/types";

function dispatcher(options: { speakerId?: string; diarization?: boolean } = { speakerId: "alice" }): SegmentDispatcher {
  return new SegmentDispatcher({
    streamId: "s1",
    generation: 1,
    sampleRate: 16000,
    diarization: options.diarization ?? false,
    speakerId: options.speakerId,
    replyTimeoutMs: 1000,
  });
}

function segment(startMs: number, endMs: number): SpeechSegment {
  return { samples: Int16Array.from([1, 2]), startMs, endMs, trigger: "silence" };
}

function reply(correlationId: number, extra: Partial<RecognitionResponse> = {}): RecognitionResponse {
  return { streamId: "s1", generation: 1, correlationId, text: `hello ${correlationId}`, ...extra };
}

function released(outcome: ReplyOutcome): DispatchRelease[] {
  if (outcome.status !== "accepted") throw new Error(`expected accepted, got ${outcome.status}`);
  return outcome.released;
}

function sequences(releases: DispatchRelease[]): Array<string> {
  return releases.map((r) => {
    if (r.kind === "transcript") return `t${r.segment.sequence}`;
    if (r.kind === "gap") return `g${r.gap.sequence}`;
    return `e${r.sequence}`;
  });
}

describe("SegmentDispatcher", () => {
  it("builds a recognition request with the next sequence number", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 100), 0);
    const req = d.dispatch(segment(100, 200), 0);
    expect(req).toEqual({
      streamId: "s1",
      generation: 1,
      correlationId: 2,
      pcm: Buffer.from([1, 0, 2, 0]),
      sampleRate: 16000,
      startMs: 100,
      endMs: 200,
      diarization: false,
      speakerId: "alice",
    });
    expect(d.pending).toBe(2);
  });

  it("releases out-of-order replies strictly in dispatch order", () => {
    const d = dispatcher();
    for (let i = 0; i < 3; i++) d.dispatch(segment(i * 100, i * 100 + 100), 0);
    expect(sequences(released(d.onReply(reply(3), 10)))).toEqual([]);
    expect(sequences(released(d.onReply(reply(1), 20)))).toEqual(["t1"]);
    expect(sequences(released(d.onReply(reply(2), 30)))).toEqual(["t2", "t3"]);
    expect(d.pending).toBe(0);
  });

  it("fills a transcript from the reply, falling back to the stream speaker and segment times", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 600), 100);
    const [first] = released(d.onReply(reply(1, { text: "  hi there  ", confidence: 0.9 }), 350));
    expect(first).toEqual({
      kind: "transcript",
      latencyMs: 250,
      segment: { streamId: "s1", text: "hi there", speakerId: "alice", confidence: 0.9, startMs: 0, endMs: 600, sequence: 1 },
    });

    d.dispatch(segment(600, 1200), 400);
    const [second] = released(d.onReply(reply(2, { speakerId: "bob", startMs: 650 }), 500));
    expect(second.kind === "transcript" && second.segment.speakerId).toBe("bob");
    expect(second.kind === "transcript" && second.segment.startMs).toBe(650);
    expect(second.kind === "transcript" && second.segment.endMs).toBe(1200);
  });

  it("leaves the speaker unset in mixed mode when the recognizer reports none", () => {
    const d = dispatcher({ diarization: true });
    const request = d.dispatch(segment(0, 100), 0);
    expect(request.speakerId).toBeUndefined();
    expect(request.diarization).toBe(true);
    const [r] = released(d.onReply(reply(1), 0));
    expect(r.kind === "transcript" && r.segment.speakerId).toBeUndefined();
  });

  it("advances past empty text without a transcript", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 100), 0);
    d.dispatch(segment(100, 200), 0);
    expect(sequences(released(d.onReply(reply(2), 0)))).toEqual([]);
    expect(sequences(released(d.onReply(reply(1, { text: "   " }), 0)))).toEqual(["e1", "t2"]);
  });

  it("releases a gap for a gateway error", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 100), 0);
    const [gap] = released(d.onReply(reply(1, { text: "", error: "boom" }), 5));
    expect(gap).toEqual({
      kind: "gap",
      gap: { streamId: "s1", speakerId: "alice", sequence: 1, reason: "error", startMs: 0, endMs: 100 },
    });
  });

  it("releases a gap when the head waits past the reply timeout", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 100), 0);
    d.dispatch(segment(100, 200), 0);
    released(d.onReply(reply(2), 10));
    expect(d.expire(999)).toEqual([]);
    expect(sequences(d.expire(1000))).toEqual(["g1", "t2"]);
    expect(d.pending).toBe(0);
  });

  it("times out consecutive heads in one sweep", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 100), 0);
    d.dispatch(segment(100, 200), 500);
    d.dispatch(segment(200, 300), 2000);
    expect(sequences(d.expire(1500))).toEqual(["g1", "g2"]);
    expect(d.pending).toBe(1);
  });

  it("drops unmatched, duplicate and malformed replies", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 100), 0);
    d.dispatch(segment(100, 200), 0);
    expect(d.onReply(reply(42), 0)).toEqual({ status: "unmatched" });
    released(d.onReply(reply(2), 0));
    expect(d.onReply(reply(2), 0)).toEqual({ status: "duplicate" });
    expect(d.onReply(reply(1, { confidence: Number.NaN }), 0)).toEqual({ status: "malformed" });
    expect(d.pending).toBe(2);
    expect(sequences(released(d.onReply(reply(1), 0)))).toEqual(["t1", "t2"]);
  });

  it("cancelAll drops in-flight segments", () => {
    const d = dispatcher();
    d.dispatch(segment(0, 100), 0);
    d.cancelAll();
    expect(d.pending).toBe(0);
    expect(d.onReply(reply(1), 0)).toEqual({ status: "unmatched" });
    expect(d.expire(10_000)).toEqual([]);
  });
});
