/**
 * WebSocket voice-activity gateway.
 * Out: {stream_id, generation, correlation_id, sample_rate, timestamp_ms, audio_base64} per packet.
 * In:  {stream_id, generation, correlation_id, is_speech, confidence?} per verdict, in any order.
 *
 * Packets submitted while disconnected are skipped; the engine's verdict timeout resolves them.
 */

import WebSocket from "ws";
import type { IVoiceActivityGateway, VadRequest, VadResponse, VerdictListener } from "./types";
import { logger } from "../../logging";

export interface WebSocketVadConfig {
  url: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Validate one inbound verdict message; null when malformed. */
export function parseVerdictMessage(raw: string): VadResponse | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;
  const { stream_id, generation, correlation_id, is_speech, confidence } = data;
  if (typeof stream_id !== "string") return null;
  if (typeof generation !== "number" || !Number.isInteger(generation)) return null;
  if (typeof correlation_id !== "number" || !Number.isInteger(correlation_id)) return null;
  if (typeof is_speech !== "boolean") return null;
  return {
    streamId: stream_id,
    generation,
    correlationId: correlation_id,
    isSpeech: is_speech,
    confidence: typeof confidence === "number" && Number.isFinite(confidence) ? confidence : undefined,
  };
}

export class WebSocketVoiceActivityGateway implements IVoiceActivityGateway {
  private ws: WebSocket | null = null;
  private listeners: VerdictListener[] = [];

  constructor(private readonly config: WebSocketVadConfig) {}

  onVerdict(listener: VerdictListener): void {
    this.listeners.push(listener);
  }

  connect(): Promise<void> {
    if (!this.config.url) {
      return Promise.reject(new Error("VAD WebSocket: url is missing. Set VAD_WS_URL in .env.local."));
    }
    this.disconnect();
    logger.debug({ event: "VAD_WS_CONNECT", url: this.config.url }, "VAD WebSocket connecting");
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.config.url);
      this.ws = ws;
      // isHealthy() turns false; the watchdog reconnects.
      const triggerDisconnected = (): void => {
        if (this.ws === ws) this.ws = null;
      };
      ws.on("open", () => {
        ws.on("close", (code, reason) => {
          logger.warn({ event: "VAD_WS_CLOSED", code, reason: reason.toString() }, "VAD WebSocket closed");
          triggerDisconnected();
        });
        ws.on("error", (err) => {
          logger.warn({ event: "VAD_WS_ERROR", err: err.message }, "VAD WebSocket error");
          triggerDisconnected();
        });
        logger.info({ event: "VAD_WS_CONNECTED", url: this.config.url }, "VAD WebSocket connected");
        resolve();
      });
      ws.on("error", (err) => {
        if (this.ws === ws && ws.readyState !== WebSocket.OPEN) {
          this.ws = null;
          reject(err);
        }
      });
      ws.on("message", (data) => this.handleMessage(data.toString()));
    });
  }

  submit(request: VadRequest): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      logger.debug(
        { event: "VAD_WS_SEND_SKIP", streamId: request.streamId, correlationId: request.correlationId },
        "VAD packet skipped (not connected)"
      );
      return;
    }
    ws.send(
      JSON.stringify({
        stream_id: request.streamId,
        generation: request.generation,
        correlation_id: request.correlationId,
        sample_rate: request.sampleRate,
        timestamp_ms: request.timestampMs,
        audio_base64: request.pcm.toString("base64"),
      })
    );
  }

  /** True if the socket is open (for watchdog). */
  isHealthy(): boolean {
    return this.ws != null && this.ws.readyState === WebSocket.OPEN;
  }

  async close(): Promise<void> {
    this.disconnect();
  }

  private disconnect(): void {
    if (this.ws) {
      const ws = this.ws;
      this.ws = null;
      ws.removeAllListeners();
      // A socket still connecting would emit an unhandled error on close.
      ws.on("error", () => undefined);
      ws.close();
    }
  }

  private handleMessage(raw: string): void {
    const verdict = parseVerdictMessage(raw);
    if (!verdict) {
      logger.warn({ event: "VAD_WS_BAD_JSON", length: raw.length }, "Malformed VAD verdict dropped");
      return;
    }
    for (const listener of this.listeners) listener(verdict);
  }
}
