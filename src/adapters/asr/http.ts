/**
 * HTTP recognition gateway for a self-hosted inference server (KServe / FastAPI style).
 *
 * POST {url} with {audio_base64, sample_rate, speaker_id, diarization, correlation_id, prompt, recog_sent_history}.
 * Reply: {text?, speaker_id?, confidence?, segments?: [{text, words: [{start, end, text}], no_speech_prob}]}.
 * Word times are seconds from the start of the posted audio.
 */

import type { RecognitionRequest, TranscriptResult } from "./types";
import { TranscriptionGateway } from "./gateway";
import { logger } from "../../logging";

export interface HttpRecognitionConfig {
  url: string;
  timeoutMs?: number;
  /** Recent committed sentences per stream sent as context. */
  historySize?: number;
}

const DEFAULT_HISTORY_SIZE = 3;

interface ParsedWord {
  start: number;
  end: number;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function finite(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

/**
 * Map a server reply to a transcript, with times shifted onto the stream timeline.
 * Throws on a body that is not an object.
 */
export function parseRecognitionReply(body: unknown, segmentStartMs: number): TranscriptResult {
  if (!isRecord(body)) throw new Error("ASR reply is not a JSON object");
  const segments = Array.isArray(body.segments) ? body.segments.filter(isRecord) : [];
  const words: ParsedWord[] = [];
  for (const seg of segments) {
    if (!Array.isArray(seg.words)) continue;
    for (const w of seg.words) {
      if (!isRecord(w)) continue;
      const start = finite(w.start);
      const end = finite(w.end);
      if (start !== undefined && end !== undefined) words.push({ start, end });
    }
  }
  const text =
    typeof body.text === "string"
      ? body.text.trim()
      : segments
          .map((s) => (typeof s.text === "string" ? s.text.trim() : ""))
          .filter((t) => t.length > 0)
          .join(" ");
  const first = words[0];
  const last = words[words.length - 1];
  return {
    text,
    speakerId: typeof body.speaker_id === "string" ? body.speaker_id : undefined,
    confidence: finite(body.confidence),
    startMs: first ? segmentStartMs + Math.round(first.start * 1000) : undefined,
    endMs: last ? segmentStartMs + Math.round(last.end * 1000) : undefined,
  };
}

export class HttpRecognitionGateway extends TranscriptionGateway {
  private readonly url: string;
  private readonly historySize: number;
  private readonly history = new Map<string, string[]>();

  constructor(config: HttpRecognitionConfig) {
    super(config.timeoutMs);
    this.url = config.url;
    this.historySize = config.historySize ?? DEFAULT_HISTORY_SIZE;
  }

  protected async transcribe(request: RecognitionRequest): Promise<TranscriptResult> {
    let history = this.history.get(request.streamId);
    if (!history) {
      history = [];
      this.history.set(request.streamId, history);
    }
    const recent = [...history];
    const body = {
      audio_base64: request.pcm.toString("base64"),
      sample_rate: request.sampleRate,
      speaker_id: request.speakerId ?? null,
      diarization: request.diarization,
      correlation_id: request.correlationId,
      prompt: recent.join(" "),
      recog_sent_history: recent,
    };
    logger.debug(
      { event: "ASR_REQUEST_SENDING", streamId: request.streamId, correlationId: request.correlationId, bytes: request.pcm.length },
      "Posting segment to ASR server"
    );
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      throw new Error(`ASR server returned ${res.status}`);
    }
    const result = parseRecognitionReply(await res.json(), request.startMs);
    // A stream released (or re-created) while this request was in flight no longer owns `history`.
    if (result.text && this.history.get(request.streamId) === history) this.remember(history, result.text);
    return result;
  }

  releaseStream(streamId: string): void {
    this.history.delete(streamId);
  }

  private remember(history: string[], text: string): void {
    if (this.historySize <= 0) return;
    history.push(text);
    while (history.length > this.historySize) history.shift();
  }
}
