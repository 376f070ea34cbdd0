/**
 * Shared types for the segmentation pipeline: frames, packets, segments and the output contract.
 */

/** Stream id used for the single synthetic stream in mixed mode. */
export const MIXED_STREAM_ID = "__mixed__";

/** One raw frame from the ingestion collaborator. */
export interface AudioFrame {
  /** Speaker id in individual mode; ignored in mixed mode. */
  streamId: string;
  /** 16-bit little-endian PCM, channels interleaved. */
  pcm: Buffer;
  /** Capture timestamp (ms). */
  timestampMs: number;
  /** Arrival sequence number assigned by the source. */
  sequence: number;
}

/** Fixed-length packet cut by the accumulator. */
export interface AudioPacket {
  correlationId: number;
  samples: Int16Array;
  /** Capture timestamp of the packet's first sample (ms). */
  timestampMs: number;
}

/** A voice-activity verdict released in packet order. */
export interface ResolvedVerdict {
  packet: AudioPacket;
  isSpeech: boolean;
  /** lost = timed out; evicted = forced out by the outstanding bound. */
  source: "gateway" | "lost" | "evicted";
}

/** Why a segment was emitted. Downstream metadata is identical for all triggers. */
export type SegmentTrigger = "target" | "silence" | "overflow";

/** Finalized speech audio ready for recognition. */
export interface SpeechSegment {
  samples: Int16Array;
  /** Stream-relative start/end (ms). */
  startMs: number;
  endMs: number;
  trigger: SegmentTrigger;
}

/** Ordered recognition result delivered to the output collaborator. */
export interface TranscriptionSegment {
  streamId: string;
  text: string;
  speakerId?: string;
  confidence?: number;
  /** Stream-relative start/end (ms). */
  startMs: number;
  endMs: number;
  /** Dispatch sequence number within the stream. */
  sequence: number;
  /** Session time (ms) of the stream's first frame; add to startMs/endMs for session-relative times. */
  sessionOffsetMs?: number;
}

/** Released in dispatch order when a recognition reply never came or failed. */
export interface TranscriptionGap {
  streamId: string;
  speakerId?: string;
  sequence: number;
  reason: "timeout" | "error";
  startMs: number;
  endMs: number;
  sessionOffsetMs?: number;
}

/** Output interface: ordered per stream. */
export interface OrchestratorCallbacks {
  onTranscript?(segment: TranscriptionSegment): void;
  onGap?(gap: TranscriptionGap): void;
  /** Stream created (first frame in individual mode, session start in mixed mode). */
  onStreamStarted?(streamId: string): void;
  onStreamReleased?(streamId: string): void;
}

/** Clock in ms; injectable for tests. */
export type Clock = () => number;
