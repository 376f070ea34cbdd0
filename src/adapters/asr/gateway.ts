/**
 * Base for request/response recognizers: runs one transcription per submitted segment with a timeout
 * and reports the outcome (text or error) through the result listeners with the request's correlation id.
 */

import type { IRecognitionGateway, RecognitionListener, RecognitionRequest, RecognitionResponse, TranscriptResult } from "./types";
import { logger } from "../../logging";

const DEFAULT_TIMEOUT_MS = 30_000;

export function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    p.then((v) => { clearTimeout(timer); resolve(v); }, (e) => { clearTimeout(timer); reject(e); });
  });
}

export abstract class TranscriptionGateway implements IRecognitionGateway {
  private listeners: RecognitionListener[] = [];
  private closed = false;
  protected readonly timeoutMs: number;

  protected constructor(timeoutMs?: number) {
    this.timeoutMs = timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Transcribe one segment. Rejections become error replies. */
  protected abstract transcribe(request: RecognitionRequest): Promise<TranscriptResult>;

  onResult(listener: RecognitionListener): void {
    this.listeners.push(listener);
  }

  submit(request: RecognitionRequest): void {
    void this.run(request);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async run(request: RecognitionRequest): Promise<void> {
    const started = Date.now();
    let response: RecognitionResponse;
    try {
      const result = await withTimeout(this.transcribe(request), this.timeoutMs, "ASR");
      response = {
        streamId: request.streamId,
        generation: request.generation,
        correlationId: request.correlationId,
        text: result.text,
        speakerId: result.speakerId,
        confidence: result.confidence,
        startMs: result.startMs,
        endMs: result.endMs,
      };
      logger.debug(
        { event: "ASR_RESULT", streamId: request.streamId, correlationId: request.correlationId, latencyMs: Date.now() - started },
        "Recognition result"
      );
    } catch (err) {
      logger.warn(
        { event: "ASR_FAILED", streamId: request.streamId, correlationId: request.correlationId, err: (err as Error).message },
        "ASR failed"
      );
      response = {
        streamId: request.streamId,
        generation: request.generation,
        correlationId: request.correlationId,
        text: "",
        error: (err as Error).message,
      };
    }
    if (this.closed) return;
    for (const listener of this.listeners) {
      try {
        listener(response);
      } catch (err) {
        logger.error({ event: "ASR_LISTENER_FAILED", err: (err as Error).message }, "Recognition listener threw");
      }
    }
  }
}
