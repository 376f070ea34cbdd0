/**
 * Transcript writer: the output collaborator for ordered transcription segments.
 * Keeps the session transcript, prints each segment as it is released (json | text | srt)
 * and saves the whole session to OUTPUT_DIR.
 */

import * as fs from "fs";
import * as path from "path";
import type { OutputFormat } from "../config";
import type { Clock, TranscriptionGap, TranscriptionSegment } from "../pipeline/types";
import { logger } from "../logging";

export interface TranscriptWriterConfig {
  format: OutputFormat;
  outputDir?: string;
  enableTimestamps: boolean;
  enableSpeakerLabels: boolean;
  realTimeOutput: boolean;
}

export interface TranscriptWriterOptions {
  /** Real-time output sink; defaults to stdout. */
  sink?: (text: string) => void;
  clock?: Clock;
}

/** One stored transcript line. */
export interface TranscriptEntry {
  streamId: string;
  sequence: number;
  text: string;
  speakerId?: string;
  /** Wall-clock time the segment was released (ISO). */
  timestamp: string;
  confidence?: number;
  /** Session-relative start/end (ms), comparable across streams. */
  startMs: number;
  endMs: number;
}

export interface TranscriptStatistics {
  totalSegments: number;
  uniqueSpeakers: number;
  totalWords: number;
  gaps: number;
  sessionDurationMs: number;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** HH:MM:SS,mmm */
export function formatSrtTime(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const secs = Math.floor((total % 60_000) / 1000);
  const millis = total % 1000;
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(millis, 3)}`;
}

/** HH:MM:SS (UTC) */
export function formatClockTime(iso: string): string {
  const d = new Date(iso);
  return `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

/** YYYYMMDD_HHMMSS (UTC), used in saved file names. */
function fileStamp(d: Date): string {
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

export class TranscriptWriter {
  private entries: TranscriptEntry[] = [];
  private gaps: TranscriptionGap[] = [];
  private readonly speakerNames = new Map<string, string>();
  private sessionId: string | null = null;
  private sessionStart: number | null = null;
  private readonly sink: (text: string) => void;
  private readonly clock: Clock;

  constructor(
    private readonly config: TranscriptWriterConfig,
    options: TranscriptWriterOptions = {}
  ) {
    this.sink = options.sink ?? ((text) => process.stdout.write(`${text}\n`));
    this.clock = options.clock ?? Date.now;
  }

  startSession(sessionId: string): void {
    this.sessionId = sessionId;
    this.sessionStart = this.clock();
    this.entries = [];
    this.gaps = [];
    logger.info(
      { event: "TRANSCRIPT_SESSION_STARTED", sessionId, startTime: new Date(this.sessionStart).toISOString() },
      "Transcript session started"
    );
  }

  /** Map a speaker id to a display name (participant join). */
  setSpeakerName(speakerId: string, name: string): void {
    this.speakerNames.set(speakerId, name);
    logger.debug({ event: "SPEAKER_NAME_UPDATED", speakerId, name }, "Speaker name updated");
  }

  speakerLabel(speakerId?: string): string {
    if (!speakerId) return "Unknown";
    return this.speakerNames.get(speakerId) ?? `Speaker ${speakerId}`;
  }

  add(segment: TranscriptionSegment): TranscriptEntry {
    const offset = segment.sessionOffsetMs ?? 0;
    const entry: TranscriptEntry = {
      streamId: segment.streamId,
      sequence: segment.sequence,
      text: segment.text,
      speakerId: segment.speakerId,
      timestamp: new Date(this.clock()).toISOString(),
      confidence: segment.confidence,
      startMs: segment.startMs + offset,
      endMs: segment.endMs + offset,
    };
    this.entries.push(entry);
    logger.debug(
      { event: "TRANSCRIPT_ADDED", speaker: this.speakerLabel(entry.speakerId), textLength: entry.text.length },
      "Transcript added"
    );
    if (this.config.realTimeOutput) this.sink(this.formatEntry(entry, this.entries.length));
    return entry;
  }

  /** Gaps are counted, not printed. */
  recordGap(gap: TranscriptionGap): void {
    this.gaps.push(gap);
  }

  get segments(): readonly TranscriptEntry[] {
    return this.entries;
  }

  /** One entry in the configured format; `index` is its 1-based position (SRT numbering). */
  formatEntry(entry: TranscriptEntry, index: number): string {
    switch (this.config.format) {
      case "json":
        return JSON.stringify(entry, null, 2);
      case "srt":
        return `${index}\n${formatSrtTime(entry.startMs)} --> ${formatSrtTime(entry.endMs)}\n${entry.text}\n`;
      case "text": {
        const { enableSpeakerLabels, enableTimestamps } = this.config;
        const label = this.speakerLabel(entry.speakerId);
        const stamp = `[${formatClockTime(entry.timestamp)}]`;
        if (enableSpeakerLabels && enableTimestamps) return `${stamp} ${label}: ${entry.text}`;
        if (enableSpeakerLabels) return `${label}: ${entry.text}`;
        if (enableTimestamps) return `${stamp} ${entry.text}`;
        return entry.text;
      }
    }
  }

  /** Whole-session document in the configured format. */
  render(): string {
    if (this.config.format === "json") {
      return JSON.stringify(
        {
          sessionId: this.sessionId,
          startTime: this.sessionStart === null ? null : new Date(this.sessionStart).toISOString(),
          speakers: Object.fromEntries(this.speakerNames),
          transcriptions: this.entries,
          gaps: this.gaps,
        },
        null,
        2
      );
    }
    return this.entries.map((entry, i) => this.formatEntry(entry, i + 1)).join("\n");
  }

  /**
   * Write the session to OUTPUT_DIR. Returns the path, or null when no directory is configured
   * or the write failed.
   */
  async save(filename?: string): Promise<string | null> {
    const dir = this.config.outputDir;
    if (!dir) {
      logger.warn({ event: "TRANSCRIPT_NO_OUTPUT_DIR" }, "No output directory configured; transcript not saved");
      return null;
    }
    const name = filename ?? `transcription_${this.sessionId ?? "session"}_${fileStamp(new Date(this.clock()))}.${this.config.format}`;
    const outPath = path.join(dir, name);
    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(outPath, this.render());
      logger.info({ event: "TRANSCRIPT_SAVED", path: outPath, segments: this.entries.length }, "Transcript saved");
      return outPath;
    } catch (err) {
      logger.error({ event: "TRANSCRIPT_SAVE_FAILED", path: outPath, err: (err as Error).message }, "Transcript save failed");
      return null;
    }
  }

  fullText(): string {
    return this.entries.map((e) => e.text).join(" ");
  }

  statistics(): TranscriptStatistics {
    const speakers = new Set(this.entries.map((e) => e.speakerId).filter((id): id is string => !!id));
    return {
      totalSegments: this.entries.length,
      uniqueSpeakers: speakers.size,
      totalWords: this.entries.reduce((n, e) => n + e.text.split(/\s+/).filter(Boolean).length, 0),
      gaps: this.gaps.length,
      sessionDurationMs: this.sessionStart === null ? 0 : this.clock() - this.sessionStart,
    };
  }
}
