/**
 * Orchestrator: routes frames into per-stream workers and gateway replies back to them.
 * Frames -> StreamWorker (packets -> VAD -> segmenter -> recognition) -> ordered transcripts via callback.
 */

import type pino from "pino";
import type { AppConfig, StreamMode } from "../config";
import type { IVoiceActivityGateway, VadResponse } from "../adapters/vad/types";
import type { IRecognitionGateway, RecognitionResponse } from "../adapters/asr/types";
import { MIXED_STREAM_ID, type AudioFrame, type Clock, type OrchestratorCallbacks } from "./types";
import { StreamWorker, type StreamWorkerConfig } from "./stream-worker";
import { StreamRegistry } from "./stream-registry";
import { SampleBufferPool } from "./sample-buffer";
import { samplesForDuration } from "./audio-utils";
import { recordCounter } from "../metrics";
import { logger, streamLogger } from "../logging";

export interface OrchestratorConfig {
  sampleRate: number;
  channels: number;
  streamMode: StreamMode;
  packetMs: number;
  segmentMs: number;
  minSpeechMs: number;
  silenceTimeoutMs: number;
  /** Overflow bound on accumulated speech. */
  maxSpeechMs: number;
  maxOutstandingVerdicts: number;
  verdictTimeoutMs: number;
  replyTimeoutMs: number;
  /** Period of the silence/timeout sweep; 0 disables the timer (drive with tick()). */
  sweepIntervalMs: number;
  diarization: boolean;
  mailboxCapacity: number;
  /** 0 = no cap. */
  maxStreams: number;
}

export interface OrchestratorOptions {
  clock?: Clock;
  logger?: pino.Logger;
}

/** Engine settings from the env-driven app config. */
export function orchestratorConfigFrom(config: AppConfig): OrchestratorConfig {
  return {
    sampleRate: config.audio.sampleRate,
    channels: config.audio.channels,
    streamMode: config.audio.streamMode,
    packetMs: config.vad.packetMs,
    segmentMs: config.segmenter.segmentMs,
    minSpeechMs: config.segmenter.minSpeechMs,
    silenceTimeoutMs: config.segmenter.silenceTimeoutMs,
    maxSpeechMs: config.segmenter.maxSpeechMs,
    maxOutstandingVerdicts: config.vad.maxOutstanding,
    verdictTimeoutMs: config.vad.timeoutMs,
    replyTimeoutMs: config.asr.replyTimeoutMs,
    sweepIntervalMs: config.segmenter.sweepIntervalMs,
    diarization: config.segmenter.diarization,
    mailboxCapacity: config.segmenter.mailboxCapacity,
    maxStreams: config.segmenter.maxStreams,
  };
}

export class Orchestrator {
  private readonly registry: StreamRegistry;
  private readonly pool = new SampleBufferPool();
  private readonly workerConfig: StreamWorkerConfig;
  private readonly clock: Clock;
  private readonly log: pino.Logger;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private sessionId: string | null = null;
  private sessionStartedAt = 0;

  constructor(
    private readonly vad: IVoiceActivityGateway,
    private readonly asr: IRecognitionGateway,
    private readonly config: OrchestratorConfig,
    private readonly callbacks: OrchestratorCallbacks = {},
    options: OrchestratorOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? logger;
    const rate = config.sampleRate;
    this.workerConfig = {
      sampleRate: rate,
      channels: Math.max(1, config.channels),
      packetSamples: Math.max(1, samplesForDuration(config.packetMs, rate)),
      segmentSamples: Math.max(1, samplesForDuration(config.segmentMs, rate)),
      minSpeechSamples: samplesForDuration(config.minSpeechMs, rate),
      overflowSamples: Math.max(1, samplesForDuration(config.maxSpeechMs, rate)),
      silenceTimeoutMs: config.silenceTimeoutMs,
      maxOutstandingVerdicts: Math.max(1, config.maxOutstandingVerdicts),
      verdictTimeoutMs: config.verdictTimeoutMs,
      replyTimeoutMs: config.replyTimeoutMs,
      diarization: config.diarization,
      mailboxCapacity: Math.max(1, config.mailboxCapacity),
    };
    this.registry = new StreamRegistry((streamId, generation) => this.createWorker(streamId, generation), {
      maxStreams: config.maxStreams,
    });
    vad.onVerdict((response) => this.routeVerdict(response));
    asr.onResult((response) => this.routeRecognition(response));
  }

  get isRunning(): boolean {
    return this.sessionId !== null;
  }

  get currentSessionId(): string | null {
    return this.sessionId;
  }

  /** Wall-clock ms since the session started (0 when idle). */
  get sessionElapsedMs(): number {
    return this.sessionId === null ? 0 : this.clock() - this.sessionStartedAt;
  }

  activeStreams(): string[] {
    return this.registry.ids();
  }

  /** The live worker for a stream (diagnostics and tests). */
  stream(streamId: string): StreamWorker | undefined {
    return this.registry.get(streamId);
  }

  /** Begin accepting frames. Mixed mode creates the single synthetic stream now. */
  startSession(sessionId: string = new Date(this.clock()).toISOString()): void {
    if (this.sessionId !== null) {
      this.log.warn({ event: "SESSION_ALREADY_STARTED", sessionId: this.sessionId }, "Session already running");
      return;
    }
    this.sessionId = sessionId;
    this.sessionStartedAt = this.clock();
    if (this.config.streamMode === "mixed") this.createStream(MIXED_STREAM_ID);
    if (this.config.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.tick(), this.config.sweepIntervalMs);
      this.sweepTimer.unref();
    }
    this.log.info(
      { event: "SESSION_STARTED", sessionId, streamMode: this.config.streamMode, ...this.workerConfig },
      "Segmentation session started"
    );
  }

  /** Stop the sweep and release every stream; unfinalized speech is discarded. */
  endSession(): void {
    if (this.sessionId === null) return;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const id of this.registry.ids()) this.destroyStream(id);
    this.log.info({ event: "SESSION_ENDED", sessionId: this.sessionId }, "Segmentation session ended");
    this.sessionId = null;
  }

  /**
   * Non-blocking ingestion. Returns false when the frame was dropped
   * (no session, stream cap reached, or a full mailbox).
   */
  ingest(frame: AudioFrame): boolean {
    if (this.sessionId === null) {
      recordCounter("framesDropped");
      this.log.debug({ event: "FRAME_WITHOUT_SESSION", streamId: frame.streamId }, "Frame dropped; no session running");
      return false;
    }
    const streamId = this.config.streamMode === "mixed" ? MIXED_STREAM_ID : frame.streamId;
    if (!streamId) {
      recordCounter("framesDropped");
      this.log.warn({ event: "FRAME_WITHOUT_STREAM", sequence: frame.sequence }, "Frame has no stream id; dropped");
      return false;
    }
    const worker = this.acquire(streamId);
    if (!worker) {
      recordCounter("framesDropped");
      return false;
    }
    recordCounter("framesIngested");
    return worker.post({ type: "frame", frame });
  }

  /** Create a stream ahead of its first frame (participant join). Idempotent. */
  createStream(streamId: string): boolean {
    return this.acquire(streamId) !== undefined;
  }

  /** Release a stream (participant leave). No further output for it. Unknown ids are a no-op. */
  destroyStream(streamId: string): void {
    if (!this.registry.release(streamId)) return;
    this.asr.releaseStream?.(streamId);
    recordCounter("streamsReleased");
    this.log.info({ event: "STREAM_RELEASED", streamId }, "Stream released");
    try {
      this.callbacks.onStreamReleased?.(streamId);
    } catch (err) {
      this.log.error({ event: "OUTPUT_CALLBACK_FAILED", err: (err as Error).message }, "onStreamReleased threw");
    }
  }

  /** One sweep: verdict timeouts, silence finalization and recognition reply timeouts on every stream. */
  tick(): void {
    for (const worker of this.registry.all()) worker.post({ type: "tick" });
  }

  /** Resolves when every live stream's mailbox is empty. */
  async whenIdle(): Promise<void> {
    await Promise.all(this.registry.all().map((worker) => worker.whenIdle()));
  }

  private acquire(streamId: string): StreamWorker | undefined {
    const acquired = this.registry.acquire(streamId);
    if (!acquired) {
      this.log.warn(
        { event: "STREAM_LIMIT_REACHED", streamId, maxStreams: this.config.maxStreams },
        "Stream cap reached; frame dropped"
      );
      return undefined;
    }
    if (acquired.created) {
      recordCounter("streamsCreated");
      this.log.info({ event: "STREAM_CREATED", streamId, generation: acquired.worker.generation }, "Stream created");
      try {
        this.callbacks.onStreamStarted?.(streamId);
      } catch (err) {
        this.log.error({ event: "OUTPUT_CALLBACK_FAILED", err: (err as Error).message }, "onStreamStarted threw");
      }
    }
    return acquired.worker;
  }

  private createWorker(streamId: string, generation: number): StreamWorker {
    return new StreamWorker({
      streamId,
      generation,
      speakerId: streamId === MIXED_STREAM_ID ? undefined : streamId,
      config: this.workerConfig,
      vad: this.vad,
      asr: this.asr,
      callbacks: this.callbacks,
      pool: this.pool,
      clock: this.clock,
      sessionClock: () => this.sessionElapsedMs,
      log: streamLogger(this.log, streamId, generation),
    });
  }

  /** Replies for a released (or re-created) stream are dropped silently. */
  private routeVerdict(response: VadResponse): void {
    const worker = this.registry.get(response.streamId);
    if (!worker || worker.generation !== response.generation) return;
    worker.post({ type: "verdict", response });
  }

  private routeRecognition(response: RecognitionResponse): void {
    const worker = this.registry.get(response.streamId);
    if (!worker || worker.generation !== response.generation) return;
    worker.post({ type: "recognition", response });
  }
}
