/**
 * Correlation tracker: matches asynchronous VAD verdicts back to the packets that produced them.
 *
 * Verdicts are released strictly in packet order: a resolved entry waits until every older
 * entry has resolved, timed out or been evicted. Lost requests (older than timeoutMs) resolve
 * as non-speech so silence detection is never starved by a missing response.
 */

import type { AudioPacket, ResolvedVerdict } from "./types";

export interface CorrelationTrackerConfig {
  /** Max unresolved requests; registering past it evicts the oldest unresolved as non-speech. */
  maxOutstanding: number;
  /** Age after which a pending request is treated as lost (ms). */
  timeoutMs: number;
}

interface PendingVerdict {
  packet: AudioPacket;
  dispatchedAt: number;
  verdict?: { isSpeech: boolean; source: ResolvedVerdict["source"] };
}

/** Outcome of matching a gateway response. */
export type ResolveOutcome =
  | { status: "accepted"; released: ResolvedVerdict[] }
  | { status: "duplicate" | "stale" | "unknown" };

export class CorrelationTracker {
  /** Insertion order == correlation id order. */
  private readonly pending = new Map<number, PendingVerdict>();
  private unresolved = 0;
  private highestRegistered = 0;

  constructor(private readonly config: CorrelationTrackerConfig) {}

  /** Requests dispatched and not yet released. */
  get size(): number {
    return this.pending.size;
  }

  /** Requests still waiting for a verdict. */
  get outstanding(): number {
    return this.unresolved;
  }

  /**
   * Track a dispatched packet. When the outstanding bound is exceeded, the oldest
   * unresolved entry is forced to non-speech; any verdicts that unblocks are returned.
   */
  register(packet: AudioPacket, now: number): ResolvedVerdict[] {
    this.pending.set(packet.correlationId, { packet, dispatchedAt: now });
    this.highestRegistered = Math.max(this.highestRegistered, packet.correlationId);
    this.unresolved++;
    if (this.unresolved <= this.config.maxOutstanding) return [];
    for (const entry of this.pending.values()) {
      if (!entry.verdict) {
        entry.verdict = { isSpeech: false, source: "evicted" };
        this.unresolved--;
        break;
      }
    }
    return this.releaseReady();
  }

  /** Match a gateway verdict by correlation id. */
  resolve(correlationId: number, isSpeech: boolean): ResolveOutcome {
    const entry = this.pending.get(correlationId);
    if (!entry) {
      // Ids are never reused: an id at or below the highest issued is a duplicate or post-timeout arrival.
      return { status: correlationId > 0 && correlationId <= this.highestRegistered ? "stale" : "unknown" };
    }
    if (entry.verdict) return { status: "duplicate" };
    entry.verdict = { isSpeech, source: "gateway" };
    this.unresolved--;
    return { status: "accepted", released: this.releaseReady() };
  }

  /** Resolve every request older than timeoutMs as lost (non-speech). */
  expire(now: number): { expired: number; released: ResolvedVerdict[] } {
    let expired = 0;
    for (const entry of this.pending.values()) {
      if (!entry.verdict && now - entry.dispatchedAt >= this.config.timeoutMs) {
        entry.verdict = { isSpeech: false, source: "lost" };
        this.unresolved--;
        expired++;
      }
    }
    return { expired, released: expired > 0 ? this.releaseReady() : [] };
  }

  /** Drop everything without releasing (stream release). */
  cancelAll(): void {
    this.pending.clear();
    this.unresolved = 0;
  }

  private releaseReady(): ResolvedVerdict[] {
    const released: ResolvedVerdict[] = [];
    for (const [id, entry] of this.pending) {
      if (!entry.verdict) break;
      released.push({ packet: entry.packet, isSpeech: entry.verdict.isSpeech, source: entry.verdict.source });
      this.pending.delete(id);
    }
    return released;
  }
}
