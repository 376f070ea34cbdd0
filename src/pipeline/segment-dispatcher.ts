/**
 * Segment dispatcher: turns finalized segments into recognition requests and releases replies
 * strictly in dispatch order.
 *
 * More than one segment per stream may be in flight. Replies are held in a reorder buffer until
 * every lower sequence has been released. A head that waits longer than replyTimeoutMs, or a reply
 * that carries a gateway error, is released as a gap marker so the buffer never blocks indefinitely.
 */

import type { RecognitionRequest, RecognitionResponse } from "../adapters/asr/types";
import type { SpeechSegment, TranscriptionGap, TranscriptionSegment } from "./types";
import { samplesToPcm16 } from "./audio-utils";

export interface SegmentDispatcherConfig {
  streamId: string;
  generation: number;
  sampleRate: number;
  diarization: boolean;
  /** Speaker id for individual-mode streams; undefined in mixed mode. */
  speakerId?: string;
  replyTimeoutMs: number;
}

/** One released item, in dispatch order. */
export type DispatchRelease =
  | { kind: "transcript"; segment: TranscriptionSegment; latencyMs: number }
  | { kind: "gap"; gap: TranscriptionGap }
  | { kind: "empty"; sequence: number };

export type ReplyOutcome =
  | { status: "accepted"; released: DispatchRelease[] }
  | { status: "unmatched" | "duplicate" | "malformed" };

interface InFlight {
  sequence: number;
  startMs: number;
  endMs: number;
  dispatchedAt: number;
  reply?: RecognitionResponse;
  failed?: "timeout" | "error";
}

function isWellFormed(reply: RecognitionResponse): boolean {
  if (typeof reply.text !== "string") return false;
  if (reply.confidence !== undefined && !Number.isFinite(reply.confidence)) return false;
  if (reply.startMs !== undefined && !Number.isFinite(reply.startMs)) return false;
  if (reply.endMs !== undefined && !Number.isFinite(reply.endMs)) return false;
  return true;
}

export class SegmentDispatcher {
  private nextSequence = 1;
  /** Insertion order == dispatch order. */
  private readonly inFlight = new Map<number, InFlight>();

  constructor(private readonly config: SegmentDispatcherConfig) {}

  /** Segments dispatched and not yet released. */
  get pending(): number {
    return this.inFlight.size;
  }

  /** Build the recognition request for a segment and start tracking it. */
  dispatch(segment: SpeechSegment, now: number): RecognitionRequest {
    const sequence = this.nextSequence++;
    this.inFlight.set(sequence, {
      sequence,
      startMs: segment.startMs,
      endMs: segment.endMs,
      dispatchedAt: now,
    });
    return {
      streamId: this.config.streamId,
      generation: this.config.generation,
      correlationId: sequence,
      pcm: samplesToPcm16(segment.samples),
      sampleRate: this.config.sampleRate,
      startMs: segment.startMs,
      endMs: segment.endMs,
      diarization: this.config.diarization,
      speakerId: this.config.speakerId,
    };
  }

  /** Match a recognition reply; returns whatever became releasable. */
  onReply(reply: RecognitionResponse, now: number): ReplyOutcome {
    const entry = this.inFlight.get(reply.correlationId);
    if (!entry) return { status: "unmatched" };
    if (entry.reply || entry.failed) return { status: "duplicate" };
    if (reply.error !== undefined) {
      entry.failed = "error";
    } else if (!isWellFormed(reply)) {
      return { status: "malformed" };
    } else {
      entry.reply = reply;
    }
    return { status: "accepted", released: this.releaseReady(now) };
  }

  /** Force a gap for each head that has waited past replyTimeoutMs, releasing what follows it. */
  expire(now: number): DispatchRelease[] {
    const released: DispatchRelease[] = [];
    for (;;) {
      const head = this.inFlight.values().next();
      if (head.done) break;
      const entry = head.value;
      if (!entry.reply && !entry.failed) {
        if (now - entry.dispatchedAt < this.config.replyTimeoutMs) break;
        entry.failed = "timeout";
      }
      released.push(...this.releaseReady(now));
    }
    return released;
  }

  /** Drop in-flight state; nothing further is released (stream release). */
  cancelAll(): void {
    this.inFlight.clear();
  }

  private releaseReady(now: number): DispatchRelease[] {
    const released: DispatchRelease[] = [];
    for (const [sequence, entry] of this.inFlight) {
      if (entry.failed) {
        released.push({
          kind: "gap",
          gap: {
            streamId: this.config.streamId,
            speakerId: this.config.speakerId,
            sequence,
            reason: entry.failed,
            startMs: entry.startMs,
            endMs: entry.endMs,
          },
        });
      } else if (entry.reply) {
        released.push(this.toRelease(entry, entry.reply, now));
      } else {
        break;
      }
      this.inFlight.delete(sequence);
    }
    return released;
  }

  private toRelease(entry: InFlight, reply: RecognitionResponse, now: number): DispatchRelease {
    const text = reply.text.trim();
    if (!text) return { kind: "empty", sequence: entry.sequence };
    return {
      kind: "transcript",
      latencyMs: now - entry.dispatchedAt,
      segment: {
        streamId: this.config.streamId,
        text,
        speakerId: reply.speakerId ?? this.config.speakerId,
        confidence: reply.confidence,
        startMs: reply.startMs ?? entry.startMs,
        endMs: reply.endMs ?? entry.endMs,
        sequence: entry.sequence,
      },
    };
  }
}
