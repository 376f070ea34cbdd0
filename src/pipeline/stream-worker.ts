/**
 * Stream worker: the single writer for one audio stream.
 *
 * Frames, VAD verdicts, recognition replies and sweep ticks are posted as messages into a bounded
 * mailbox and processed one at a time on a microtask, so callers never block and stream state is
 * never mutated concurrently. Once closed, the worker drops every message and emits nothing.
 */

import type pino from "pino";
import type { IVoiceActivityGateway, VadResponse } from "../adapters/vad/types";
import type { IRecognitionGateway, RecognitionRequest, RecognitionResponse } from "../adapters/asr/types";
import type { AudioFrame, Clock, OrchestratorCallbacks, ResolvedVerdict, SegmentTrigger } from "./types";
import { PacketAccumulator } from "./packet-accumulator";
import { CorrelationTracker } from "./correlation-tracker";
import { SpeechSegmentStateMachine, type SegmentationStep, type SegmenterState } from "./speech-segmenter";
import { SegmentDispatcher, type DispatchRelease } from "./segment-dispatcher";
import type { SampleBuffer, SampleBufferPool } from "./sample-buffer";
import { downmixToMono, pcm16ToSamples, samplesToPcm16, durationMs } from "./audio-utils";
import { recordCounter, type CounterName } from "../metrics";
import { logSegmentDispatched, logTranscript } from "../logging";

export type StreamMessage =
  | { type: "frame"; frame: AudioFrame }
  | { type: "verdict"; response: VadResponse }
  | { type: "recognition"; response: RecognitionResponse }
  | { type: "tick" };

/** Sample-domain settings shared by every stream of an orchestrator. */
export interface StreamWorkerConfig {
  sampleRate: number;
  /** Interleaved channels in incoming frames; downmixed to mono. */
  channels: number;
  packetSamples: number;
  segmentSamples: number;
  minSpeechSamples: number;
  overflowSamples: number;
  silenceTimeoutMs: number;
  maxOutstandingVerdicts: number;
  verdictTimeoutMs: number;
  replyTimeoutMs: number;
  diarization: boolean;
  mailboxCapacity: number;
}

export interface StreamWorkerDeps {
  streamId: string;
  generation: number;
  speakerId?: string;
  config: StreamWorkerConfig;
  vad: IVoiceActivityGateway;
  asr: IRecognitionGateway;
  callbacks: OrchestratorCallbacks;
  pool: SampleBufferPool;
  clock: Clock;
  /** Elapsed session time (ms); read once, when the first frame is posted. Defaults to 0. */
  sessionClock?: Clock;
  log: pino.Logger;
}

const TRIGGER_COUNTERS: Record<SegmentTrigger, CounterName> = {
  target: "segmentsTarget",
  silence: "segmentsSilence",
  overflow: "segmentsOverflow",
};

export class StreamWorker {
  readonly streamId: string;
  readonly generation: number;
  private readonly deps: StreamWorkerDeps;
  private readonly packetBuffer: SampleBuffer;
  private readonly speechBuffer: SampleBuffer;
  private readonly accumulator: PacketAccumulator;
  private readonly tracker: CorrelationTracker;
  private readonly segmenter: SpeechSegmentStateMachine;
  private readonly dispatcher: SegmentDispatcher;
  private readonly log: pino.Logger;

  private mailbox: StreamMessage[] = [];
  private scheduled = false;
  private draining = false;
  private closed = false;
  private buffersReturned = false;
  private idleWaiters: Array<() => void> = [];
  /** Capture timestamp of the first frame; stream-relative times are measured from it. */
  private originMs: number | undefined;
  /** Session time at which the first frame arrived. */
  private sessionOffsetMs: number | undefined;
  private lastSequence: number | undefined;

  constructor(deps: StreamWorkerDeps) {
    this.deps = deps;
    this.streamId = deps.streamId;
    this.generation = deps.generation;
    this.log = deps.log;
    const { config, pool } = deps;

    this.packetBuffer = pool.acquire(config.packetSamples);
    this.speechBuffer = pool.acquire(config.overflowSamples);
    this.accumulator = new PacketAccumulator(this.packetBuffer, { sampleRate: config.sampleRate });
    this.tracker = new CorrelationTracker({
      maxOutstanding: config.maxOutstandingVerdicts,
      timeoutMs: config.verdictTimeoutMs,
    });
    this.segmenter = new SpeechSegmentStateMachine(this.speechBuffer, {
      sampleRate: config.sampleRate,
      segmentSamples: config.segmentSamples,
      minSpeechSamples: config.minSpeechSamples,
      silenceTimeoutMs: config.silenceTimeoutMs,
    });
    this.dispatcher = new SegmentDispatcher({
      streamId: deps.streamId,
      generation: deps.generation,
      sampleRate: config.sampleRate,
      diarization: config.diarization,
      speakerId: deps.speakerId,
      replyTimeoutMs: config.replyTimeoutMs,
    });
  }

  get state(): SegmenterState {
    return this.segmenter.current;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Verdicts outstanding at the gateway. */
  get outstandingVerdicts(): number {
    return this.tracker.outstanding;
  }

  /** Segments awaiting release in dispatch order. */
  get pendingSegments(): number {
    return this.dispatcher.pending;
  }

  /** Fire-and-forget. Returns false when the message was dropped (closed or mailbox full). */
  post(message: StreamMessage): boolean {
    if (this.closed) return false;
    if (this.mailbox.length >= this.deps.config.mailboxCapacity) {
      recordCounter("mailboxOverflows");
      if (message.type === "frame") recordCounter("framesDropped");
      this.log.warn(
        { event: "MAILBOX_FULL", messageType: message.type, capacity: this.deps.config.mailboxCapacity },
        "Stream mailbox full; message dropped"
      );
      return false;
    }
    if (message.type === "frame" && this.sessionOffsetMs === undefined) {
      this.sessionOffsetMs = Math.max(0, Math.round(this.deps.sessionClock?.() ?? 0));
    }
    this.mailbox.push(message);
    this.schedule();
    return true;
  }

  /** Resolves once the mailbox has been drained. */
  whenIdle(): Promise<void> {
    if (!this.scheduled && !this.draining && this.mailbox.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Tear down: cancel pending correlations and in-flight recognition, discard the unfinalized
   * utterance and the packet remainder. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const discarded = this.segmenter.bufferedSamples;
    this.mailbox = [];
    this.tracker.cancelAll();
    this.dispatcher.cancelAll();
    this.segmenter.reset();
    this.accumulator.reset();
    if (discarded > 0) {
      this.log.debug({ event: "STREAM_UTTERANCE_DISCARDED", samples: discarded }, "Unfinalized speech discarded on release");
    }
    if (!this.draining) this.returnBuffers();
    this.resolveIdle();
  }

  private schedule(): void {
    if (this.scheduled || this.draining) return;
    this.scheduled = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    this.draining = true;
    try {
      while (!this.closed && this.mailbox.length > 0) {
        const message = this.mailbox.shift();
        if (!message) break;
        try {
          this.handle(message);
        } catch (err) {
          this.log.error(
            { event: "STREAM_MESSAGE_FAILED", messageType: message.type, err: (err as Error).message, stack: (err as Error).stack },
            "Stream message handler failed"
          );
        }
      }
    } finally {
      this.draining = false;
      if (this.closed) this.returnBuffers();
      this.resolveIdle();
    }
  }

  private handle(message: StreamMessage): void {
    switch (message.type) {
      case "frame":
        this.onFrame(message.frame);
        return;
      case "verdict":
        this.onVerdict(message.response);
        return;
      case "recognition":
        this.onRecognition(message.response);
        return;
      case "tick":
        this.onTick();
        return;
    }
  }

  private onFrame(frame: AudioFrame): void {
    if (this.originMs === undefined) this.originMs = frame.timestampMs;
    if (this.lastSequence !== undefined && frame.sequence <= this.lastSequence) {
      this.log.debug(
        { event: "FRAME_OUT_OF_SEQUENCE", sequence: frame.sequence, lastSequence: this.lastSequence },
        "Frame sequence went backwards; processing in arrival order"
      );
    }
    this.lastSequence = frame.sequence;

    const samples = downmixToMono(pcm16ToSamples(frame.pcm), this.deps.config.channels);
    if (samples.length === 0) {
      this.log.debug({ event: "FRAME_EMPTY", bytes: frame.pcm.length }, "Frame carried no whole samples");
      return;
    }

    const now = this.deps.clock();
    const packets = this.accumulator.push(samples, frame.timestampMs - this.originMs);
    for (const packet of packets) {
      if (this.closed) return;
      const evicted = this.tracker.register(packet, now);
      recordCounter("packetsDispatched");
      try {
        this.deps.vad.submit({
          streamId: this.streamId,
          generation: this.generation,
          correlationId: packet.correlationId,
          pcm: samplesToPcm16(packet.samples),
          sampleRate: this.deps.config.sampleRate,
          timestampMs: packet.timestampMs,
        });
      } catch (err) {
        // The verdict timeout resolves this packet as non-speech.
        this.log.warn(
          { event: "VAD_SUBMIT_FAILED", correlationId: packet.correlationId, err: (err as Error).message },
          "VAD gateway rejected packet"
        );
      }
      if (evicted.length > 0) {
        this.log.debug(
          { event: "VERDICT_EVICTED", outstanding: this.tracker.outstanding },
          "Outstanding VAD bound exceeded; oldest packet forced to non-speech"
        );
        this.applyVerdicts(evicted);
      }
    }
  }

  private onVerdict(response: VadResponse): void {
    const outcome = this.tracker.resolve(response.correlationId, response.isSpeech);
    if (outcome.status !== "accepted") {
      recordCounter("verdictsDiscarded");
      this.log.debug(
        { event: "VERDICT_DISCARDED", correlationId: response.correlationId, reason: outcome.status },
        "VAD verdict did not match a pending packet"
      );
      return;
    }
    recordCounter("verdictsResolved");
    this.applyVerdicts(outcome.released);
  }

  private onRecognition(response: RecognitionResponse): void {
    const outcome = this.dispatcher.onReply(response, this.deps.clock());
    if (outcome.status !== "accepted") {
      recordCounter("recognitionRepliesDropped");
      this.log.warn(
        { event: "RECOGNITION_REPLY_DROPPED", correlationId: response.correlationId, reason: outcome.status },
        "Recognition reply dropped"
      );
      return;
    }
    if (response.error !== undefined) {
      this.log.warn(
        { event: "RECOGNITION_FAILED", correlationId: response.correlationId, err: response.error },
        "Recognition gateway reported failure; releasing gap"
      );
    }
    this.deliver(outcome.released);
  }

  private onTick(): void {
    const now = this.deps.clock();
    const { expired, released } = this.tracker.expire(now);
    if (expired > 0) {
      recordCounter("verdictsTimedOut", expired);
      this.log.debug({ event: "VERDICT_TIMEOUT", expired }, "VAD verdicts lost; resolved as non-speech");
    }
    this.applyVerdicts(released);
    if (this.closed) return;
    this.applyStep(this.segmenter.tick(now));
    if (this.closed) return;
    this.deliver(this.dispatcher.expire(now));
  }

  private applyVerdicts(verdicts: ResolvedVerdict[]): void {
    for (const verdict of verdicts) {
      if (this.closed) return;
      if (verdict.source === "evicted") recordCounter("verdictsEvicted");
      this.applyStep(this.segmenter.onVerdict(verdict, this.deps.clock()));
    }
  }

  private applyStep(step: SegmentationStep): void {
    if (step.discardedSamples > 0) {
      recordCounter("segmentsDiscardedShort");
      this.log.debug(
        { event: "SEGMENT_TOO_SHORT", samples: step.discardedSamples, durationMs: this.ms(step.discardedSamples) },
        "Speech below minimum duration discarded"
      );
    }
    for (const segment of step.segments) {
      if (this.closed) return;
      recordCounter(TRIGGER_COUNTERS[segment.trigger]);
      const request = this.dispatcher.dispatch(segment, this.deps.clock());
      logSegmentDispatched(this.log, request.correlationId, segment.samples.length, segment.trigger, this.ms(segment.samples.length));
      this.submitRecognition(request);
    }
  }

  private submitRecognition(request: RecognitionRequest): void {
    try {
      this.deps.asr.submit(request);
    } catch (err) {
      this.onRecognition({
        streamId: request.streamId,
        generation: request.generation,
        correlationId: request.correlationId,
        text: "",
        error: (err as Error).message,
      });
    }
  }

  private deliver(releases: DispatchRelease[]): void {
    const { callbacks } = this.deps;
    for (const release of releases) {
      if (this.closed) return;
      try {
        if (release.kind === "transcript") {
          recordCounter("transcriptsReleased");
          logTranscript(this.log, release.segment.sequence, release.segment.text.length, release.latencyMs);
          callbacks.onTranscript?.({ ...release.segment, sessionOffsetMs: this.sessionOffsetMs ?? 0 });
        } else if (release.kind === "gap") {
          recordCounter("gapsReleased");
          this.log.warn(
            { event: "TRANSCRIPT_GAP", sequence: release.gap.sequence, reason: release.gap.reason },
            "Recognition reply missing; gap released in order"
          );
          callbacks.onGap?.({ ...release.gap, sessionOffsetMs: this.sessionOffsetMs ?? 0 });
        } else {
          this.log.debug({ event: "TRANSCRIPT_EMPTY", sequence: release.sequence }, "Recognition returned no text");
        }
      } catch (err) {
        this.log.error(
          { event: "OUTPUT_CALLBACK_FAILED", err: (err as Error).message, stack: (err as Error).stack },
          "Output callback threw"
        );
      }
    }
  }

  private returnBuffers(): void {
    if (this.buffersReturned) return;
    this.buffersReturned = true;
    this.deps.pool.release(this.packetBuffer);
    this.deps.pool.release(this.speechBuffer);
  }

  private resolveIdle(): void {
    if (this.scheduled || this.draining) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private ms(samples: number): number {
    return Math.round(durationMs(samples, this.deps.config.sampleRate));
  }
}
