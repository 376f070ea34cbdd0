/**
 * Mock meeting for local runs: no meeting service connection.
 * Feeds a WAV file (16kHz mono 16-bit), or synthetic silence, as irregular 20/40 ms frames
 * for one or more participants, and reports participant join/leave.
 */

import * as fs from "fs";
import type { AudioFrame } from "../pipeline/types";
import { wavPcmData, samplesForDuration } from "../pipeline/audio-utils";

/** Frame durations cycled through to mimic a real meeting feed. */
const FRAME_PATTERN_MS = [20, 40, 20, 20, 40] as const;
const BYTES_PER_SAMPLE = 2;

export interface MockParticipant {
  id: string;
  name: string;
}

export interface MockMeetingConfig {
  /** Optional path to WAV file to use as simulated meeting audio. */
  inputWavPath?: string;
  participants?: MockParticipant[];
  sampleRate?: number;
  /** Seconds of silence to feed when no WAV is given. */
  silenceSeconds?: number;
  /** Deliver frames at capture pace instead of as fast as possible. */
  realTime?: boolean;
}

export interface MockMeetingCallbacks {
  onFrame?(frame: AudioFrame): void;
  onParticipantJoined?(participant: MockParticipant): void;
  onParticipantLeft?(participantId: string): void;
}

const DEFAULT_PARTICIPANTS: MockParticipant[] = [{ id: "mock-speaker", name: "Mock Speaker" }];

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Cut PCM into frames following the 20/40 ms pattern. Timestamps are capture times
 * starting at `startMs`; the last frame may be short.
 */
export function splitIntoFrames(pcm: Buffer, sampleRate: number, startMs = 0): Array<{ pcm: Buffer; timestampMs: number }> {
  const frames: Array<{ pcm: Buffer; timestampMs: number }> = [];
  let offset = 0;
  let elapsedMs = startMs;
  let i = 0;
  while (offset < pcm.length) {
    const frameMs = FRAME_PATTERN_MS[i % FRAME_PATTERN_MS.length];
    const bytes = samplesForDuration(frameMs, sampleRate) * BYTES_PER_SAMPLE;
    const end = Math.min(pcm.length, offset + bytes);
    frames.push({ pcm: pcm.subarray(offset, end), timestampMs: elapsedMs });
    elapsedMs += frameMs;
    offset = end;
    i++;
  }
  return frames;
}

export class MockMeeting {
  private callbacks: MockMeetingCallbacks = {};
  private readonly participants: MockParticipant[];
  private readonly sampleRate: number;
  private sequence = 0;
  private stopped = false;

  constructor(private readonly config: MockMeetingConfig = {}) {
    this.participants = config.participants ?? DEFAULT_PARTICIPANTS;
    this.sampleRate = config.sampleRate ?? 16000;
  }

  setCallbacks(callbacks: MockMeetingCallbacks): void {
    this.callbacks = callbacks;
  }

  /** Simulate joining: announce every participant. */
  async join(): Promise<{ meetingId: string; participants: MockParticipant[] }> {
    this.stopped = false;
    for (const p of this.participants) this.callbacks.onParticipantJoined?.(p);
    return { meetingId: "mock-meeting", participants: [...this.participants] };
  }

  /**
   * Feed the configured audio. With several participants, frames are interleaved
   * frame by frame, each participant speaking the same audio.
   */
  async play(): Promise<number> {
    const pcm = this.loadPcm();
    const frames = splitIntoFrames(pcm, this.sampleRate);
    let sent = 0;
    for (const f of frames) {
      if (this.stopped) break;
      for (const p of this.participants) {
        this.callbacks.onFrame?.({ streamId: p.id, pcm: f.pcm, timestampMs: f.timestampMs, sequence: ++this.sequence });
        sent++;
      }
      if (this.config.realTime) await sleep(Math.round((f.pcm.length / BYTES_PER_SAMPLE / this.sampleRate) * 1000));
    }
    return sent;
  }

  /** Simulate leaving: every participant leaves. */
  async leave(): Promise<void> {
    this.stopped = true;
    for (const p of this.participants) this.callbacks.onParticipantLeft?.(p.id);
  }

  private loadPcm(): Buffer {
    const p = this.config.inputWavPath;
    if (p && fs.existsSync(p)) return wavPcmData(fs.readFileSync(p));
    const seconds = this.config.silenceSeconds ?? 2;
    return Buffer.alloc(samplesForDuration(seconds * 1000, this.sampleRate) * BYTES_PER_SAMPLE);
  }
}
