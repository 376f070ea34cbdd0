/**
 * Env-based configuration for the segmentation engine and its collaborators.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type StreamMode = "mixed" | "individual";
export type VadProvider = "local" | "websocket" | "stub";
export type AsrProvider = "openai" | "http" | "stub";
export type OutputFormat = "json" | "text" | "srt";

export interface AppConfig {
  /** Ingested audio format and stream layout. */
  audio: {
    sampleRate: number;
    channels: number;
    /** mixed = one synthetic stream for the meeting; individual = one stream per speaker. */
    streamMode: StreamMode;
  };

  /** Voice-activity gateway and packet framing. */
  vad: {
    provider: VadProvider;
    wsUrl?: string;
    /** Packet duration sent to the gateway (ms). */
    packetMs: number;
    /** RMS threshold for the local energy classifier (16-bit PCM). */
    energyThreshold: number;
    /** Max unresolved verdicts per stream before the oldest is forced to non-speech. */
    maxOutstanding: number;
    /** Age (ms) after which a pending verdict is treated as lost. */
    timeoutMs: number;
  };

  /** Speech segmentation policy. */
  segmenter: {
    segmentMs: number;
    minSpeechMs: number;
    silenceTimeoutMs: number;
    /** Overflow bound on accumulated speech (ms). */
    maxSpeechMs: number;
    /** Period of the silence/timeout sweep (ms). */
    sweepIntervalMs: number;
    /** Ask the recognizer to diarize (defaults to true in mixed mode). */
    diarization: boolean;
    /** Per-stream mailbox bound (messages). */
    mailboxCapacity: number;
    /** Max concurrent streams; 0 = no cap. */
    maxStreams: number;
  };

  /** Recognition gateway. */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    url?: string;
    /** HTTP timeout for one recognition request (ms). */
    timeoutMs: number;
    /** Reorder-buffer head timeout before a gap marker is released (ms). */
    replyTimeoutMs: number;
  };

  /** Transcript output collaborator. */
  output: {
    format: OutputFormat;
    outputDir?: string;
    enableTimestamps: boolean;
    enableSpeakerLabels: boolean;
    realTimeOutput: boolean;
  };

  runtime: {
    healthPort: number;
    /** Optional 16kHz mono WAV fed by the mock meeting source. */
    mockInputWav?: string;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getPositiveInt(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n <= 0 ? defaultValue : n;
}

function getNonNegativeInt(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < 0 ? defaultValue : n;
}

function getBool(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  return v === "true" || v === "1";
}

function pick<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const v = getEnv(key)?.toLowerCase();
  return allowed.find((a) => a === v) ?? defaultValue;
}

/**
 * Build config from environment variables.
 * VAD_PROVIDER and ASR_PROVIDER select gateway clients (local, websocket, openai, http, stub).
 */
export function loadConfig(): AppConfig {
  const streamMode = pick<StreamMode>("STREAM_MODE", ["mixed", "individual"], "mixed");
  const packetMs = getPositiveInt("VAD_PACKET_MS", 100);

  return {
    audio: {
      sampleRate: getPositiveInt("AUDIO_SAMPLE_RATE", 16000),
      channels: getPositiveInt("AUDIO_CHANNELS", 1),
      streamMode,
    },
    vad: {
      provider: pick<VadProvider>("VAD_PROVIDER", ["local", "websocket", "stub"], "local"),
      wsUrl: getEnv("VAD_WS_URL"),
      packetMs,
      energyThreshold: getPositiveInt("VAD_ENERGY_THRESHOLD", 500),
      maxOutstanding: getPositiveInt("VAD_MAX_OUTSTANDING", 8),
      timeoutMs: getPositiveInt("VAD_TIMEOUT_MS", packetMs * 5),
    },
    segmenter: {
      segmentMs: getPositiveInt("SEGMENT_MS", 2500),
      minSpeechMs: getNonNegativeInt("MIN_SPEECH_MS", 500),
      silenceTimeoutMs: getPositiveInt("SILENCE_TIMEOUT_MS", 1000),
      maxSpeechMs: getPositiveInt("MAX_SPEECH_MS", 5000),
      sweepIntervalMs: getPositiveInt("SWEEP_INTERVAL_MS", 100),
      diarization: getBool("DIARIZATION", streamMode === "mixed"),
      mailboxCapacity: getPositiveInt("MAILBOX_CAPACITY", 1024),
      maxStreams: getNonNegativeInt("MAX_STREAMS", 0),
    },
    asr: {
      provider: pick<AsrProvider>("ASR_PROVIDER", ["openai", "http", "stub"], "openai"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_ASR_MODEL") || "whisper-1",
      url: getEnv("ASR_URL"),
      timeoutMs: getPositiveInt("ASR_TIMEOUT_MS", 30_000),
      replyTimeoutMs: getPositiveInt("ASR_REPLY_TIMEOUT_MS", 15_000),
    },
    output: {
      format: pick<OutputFormat>("OUTPUT_FORMAT", ["json", "text", "srt"], "json"),
      outputDir: getEnv("OUTPUT_DIR"),
      enableTimestamps: getBool("OUTPUT_TIMESTAMPS", true),
      enableSpeakerLabels: getBool("OUTPUT_SPEAKER_LABELS", true),
      realTimeOutput: getBool("OUTPUT_REALTIME", true),
    },
    runtime: {
      healthPort: getPositiveInt("HEALTH_PORT", 8080),
      mockInputWav: getEnv("MOCK_INPUT_WAV"),
    },
  };
}
