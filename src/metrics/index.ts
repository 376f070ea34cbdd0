/**
 * High-signal counters and watchdogs for production.
 * Counters are process-wide and logged on demand; watchdogs can trigger restarts.
 */

import { logger } from "../logging";

export type CounterName =
  | "framesIngested"
  | "framesDropped"
  | "packetsDispatched"
  | "verdictsResolved"
  | "verdictsTimedOut"
  | "verdictsEvicted"
  | "verdictsDiscarded"
  | "segmentsTarget"
  | "segmentsSilence"
  | "segmentsOverflow"
  | "segmentsDiscardedShort"
  | "transcriptsReleased"
  | "gapsReleased"
  | "recognitionRepliesDropped"
  | "mailboxOverflows"
  | "streamsCreated"
  | "streamsReleased";

export type Counters = Record<CounterName, number>;

function emptyCounters(): Counters {
  return {
    framesIngested: 0,
    framesDropped: 0,
    packetsDispatched: 0,
    verdictsResolved: 0,
    verdictsTimedOut: 0,
    verdictsEvicted: 0,
    verdictsDiscarded: 0,
    segmentsTarget: 0,
    segmentsSilence: 0,
    segmentsOverflow: 0,
    segmentsDiscardedShort: 0,
    transcriptsReleased: 0,
    gapsReleased: 0,
    recognitionRepliesDropped: 0,
    mailboxOverflows: 0,
    streamsCreated: 0,
    streamsReleased: 0,
  };
}

let counters: Counters = emptyCounters();

export function recordCounter(name: CounterName, by = 1): void {
  counters[name] += by;
}

export function getCounters(): Counters {
  return { ...counters };
}

export function resetCounters(): void {
  counters = emptyCounters();
}

/** Log all counters in one record (e.g. at session end). */
export function logMetricsSummary(context?: Record<string, unknown>): void {
  logger.info({ event: "METRICS_SUMMARY", ...context, ...counters }, "Pipeline counters");
}

/** Watchdog: check the VAD gateway connection. Returns true if healthy. */
export type GatewayHealthCheck = () => boolean;

/** Watchdog: check that ingestion is advancing. Returns true if healthy. */
export type IngestHealthCheck = () => boolean;

export interface WatchdogConfig {
  /** Interval in ms. */
  intervalMs: number;
  /** Reconnect the VAD gateway if check fails this many times in a row. */
  gatewayFailCountBeforeRestart?: number;
  /** Report stalled ingestion if check fails this many times in a row. */
  ingestFailCountBeforeRestart?: number;
}

export interface WatchdogCallbacks {
  onGatewayUnhealthy?: () => void | Promise<void>;
  onIngestStalled?: () => void | Promise<void>;
}

/** Consecutive-failure counts; one instance per watchdog. */
export interface WatchdogState {
  gatewayFailCount: number;
  ingestFailCount: number;
}

export function createWatchdogState(): WatchdogState {
  return { gatewayFailCount: 0, ingestFailCount: 0 };
}

/**
 * Run one watchdog tick: run health checks and call restart callbacks if thresholds exceeded.
 */
export function runWatchdogTick(
  state: WatchdogState,
  config: WatchdogConfig,
  callbacks: WatchdogCallbacks,
  checks: { gateway: GatewayHealthCheck; ingest?: IngestHealthCheck }
): void {
  if (!checks.gateway()) {
    state.gatewayFailCount++;
    if (config.gatewayFailCountBeforeRestart != null && state.gatewayFailCount >= config.gatewayFailCountBeforeRestart) {
      logger.warn({ event: "WATCHDOG_GATEWAY_UNHEALTHY", failCount: state.gatewayFailCount }, "VAD gateway unhealthy; triggering restart");
      state.gatewayFailCount = 0;
      void Promise.resolve(callbacks.onGatewayUnhealthy?.()).catch((e) => logger.warn({ err: e }, "onGatewayUnhealthy error"));
    }
  } else {
    state.gatewayFailCount = 0;
  }

  if (checks.ingest) {
    if (!checks.ingest()) {
      state.ingestFailCount++;
      if (config.ingestFailCountBeforeRestart != null && state.ingestFailCount >= config.ingestFailCountBeforeRestart) {
        logger.warn({ event: "WATCHDOG_INGEST_STALLED", failCount: state.ingestFailCount }, "Ingestion stalled");
        state.ingestFailCount = 0;
        void Promise.resolve(callbacks.onIngestStalled?.()).catch((e) => logger.warn({ err: e }, "onIngestStalled error"));
      }
    } else {
      state.ingestFailCount = 0;
    }
  }
}
