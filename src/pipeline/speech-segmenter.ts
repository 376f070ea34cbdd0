/**
 * Speech segment state machine (IDLE / ACCUMULATING), driven by verdicts in packet order.
 *
 * - Speech appends the packet; a buffer at or past the segment target emits exactly the target
 *   length and keeps the excess as the start of the next segment.
 * - Non-speech is never appended. After silenceTimeoutMs without speech the utterance is finalized:
 *   emitted when at least minSpeechSamples long, otherwise discarded.
 * - Reaching the overflow bound force-emits whatever is held, regardless of minimum duration.
 *
 * Times: `now` is the engine clock (silence timing); packet timestamps are stream-relative (segment bounds).
 */

import type { ResolvedVerdict, SegmentTrigger, SpeechSegment } from "./types";
import type { SampleBuffer } from "./sample-buffer";
import { durationMs } from "./audio-utils";

export type SegmenterState = "IDLE" | "ACCUMULATING";

export interface SpeechSegmenterConfig {
  sampleRate: number;
  segmentSamples: number;
  minSpeechSamples: number;
  silenceTimeoutMs: number;
}

export interface SegmentationStep {
  segments: SpeechSegment[];
  /** Samples dropped by the minimum-duration filter in this step. */
  discardedSamples: number;
}

const EMPTY_STEP: SegmentationStep = { segments: [], discardedSamples: 0 };

export class SpeechSegmentStateMachine {
  private state: SegmenterState = "IDLE";
  /** Engine-clock time of the last speech verdict. */
  private lastSpeechAt = 0;
  /** Stream-relative time of the first buffered sample. */
  private headStartMs = 0;
  /** Stream-relative end of the last appended sample. */
  private tailEndMs = 0;

  /** `buffer.capacity` is the overflow bound. */
  constructor(
    private readonly buffer: SampleBuffer,
    private readonly config: SpeechSegmenterConfig
  ) {}

  get current(): SegmenterState {
    return this.state;
  }

  get bufferedSamples(): number {
    return this.buffer.length;
  }

  onVerdict(verdict: ResolvedVerdict, now: number): SegmentationStep {
    if (verdict.isSpeech) return this.onSpeech(verdict.packet.samples, verdict.packet.timestampMs, now);
    return this.checkSilence(now);
  }

  /** Silence check without a verdict (periodic sweep). */
  tick(now: number): SegmentationStep {
    return this.checkSilence(now);
  }

  /** Discard any in-progress utterance and return to IDLE. */
  reset(): void {
    this.buffer.clear();
    this.state = "IDLE";
  }

  private onSpeech(samples: Int16Array, timestampMs: number, now: number): SegmentationStep {
    if (this.state === "IDLE") {
      this.state = "ACCUMULATING";
      this.buffer.clear();
    }
    this.lastSpeechAt = now;

    const segments: SpeechSegment[] = [];
    let offset = 0;
    while (offset < samples.length) {
      if (this.buffer.length === 0) {
        this.headStartMs = timestampMs + this.ms(offset);
      }
      offset += this.buffer.append(samples, offset);
      this.tailEndMs = timestampMs + this.ms(offset);

      if (this.buffer.isFull()) {
        segments.push(this.emit(this.buffer.length, "overflow"));
        continue;
      }
      while (this.buffer.length >= this.config.segmentSamples) {
        segments.push(this.emit(this.config.segmentSamples, "target"));
      }
    }
    return { segments, discardedSamples: 0 };
  }

  private checkSilence(now: number): SegmentationStep {
    if (this.state !== "ACCUMULATING") return EMPTY_STEP;
    if (now - this.lastSpeechAt < this.config.silenceTimeoutMs) return EMPTY_STEP;

    this.state = "IDLE";
    const held = this.buffer.length;
    if (held > 0 && held >= this.config.minSpeechSamples) {
      return { segments: [this.emit(held, "silence")], discardedSamples: 0 };
    }
    this.buffer.clear();
    return { segments: [], discardedSamples: held };
  }

  /** Cut `count` samples off the head; the remainder is assumed contiguous with the last packet. */
  private emit(count: number, trigger: SegmentTrigger): SpeechSegment {
    const samples = this.buffer.take(count);
    const startMs = this.headStartMs;
    const rest = this.buffer.length;
    const endMs = rest > 0 ? this.tailEndMs - this.ms(rest) : this.tailEndMs;
    this.headStartMs = endMs;
    return { samples, startMs, endMs, trigger };
  }

  private ms(samples: number): number {
    return durationMs(samples, this.config.sampleRate);
  }
}
