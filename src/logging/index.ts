/**
 * Structured logging for the segmentation engine.
 * Logs packet/verdict diagnostics, segment dispatch, transcripts and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - silent | debug | info | warn | error (default: info; silent under Jest)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const v = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? fallback;
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL, isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Child logger bound to one audio stream. */
export function streamLogger(log: pino.Logger, streamId: string, generation: number): pino.Logger {
  return log.child({ streamId, generation });
}

/** Log a segment handed to recognition (sizes only; audio is never logged). */
export function logSegmentDispatched(
  log: pino.Logger,
  sequence: number,
  samples: number,
  trigger: string,
  durationMs: number
): void {
  log.info({ event: "SEGMENT_DISPATCHED", sequence, samples, trigger, durationMs }, "Segment sent to recognition");
}

/** Log a released transcript (avoid logging full text in production if PII). */
export function logTranscript(log: pino.Logger, sequence: number, textLength: number, latencyMs?: number): void {
  log.info({ event: "TRANSCRIPT_RELEASED", sequence, textLength, latencyMs }, "Transcript released");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
