/**
 * Stream registry: owns the live stream workers, keyed by stream id.
 * Every creation gets a fresh generation so replies addressed to a released stream never
 * match a later stream that reuses its id.
 */

import type { StreamWorker } from "./stream-worker";

export type StreamFactory = (streamId: string, generation: number) => StreamWorker;

export interface StreamRegistryOptions {
  /** Cap on concurrently live streams; 0 means unbounded. */
  maxStreams?: number;
}

export class StreamRegistry {
  private readonly workers = new Map<string, StreamWorker>();
  private generation = 0;

  constructor(
    private readonly factory: StreamFactory,
    private readonly options: StreamRegistryOptions = {}
  ) {}

  get size(): number {
    return this.workers.size;
  }

  has(streamId: string): boolean {
    return this.workers.has(streamId);
  }

  get(streamId: string): StreamWorker | undefined {
    return this.workers.get(streamId);
  }

  ids(): string[] {
    return [...this.workers.keys()];
  }

  all(): StreamWorker[] {
    return [...this.workers.values()];
  }

  /**
   * Existing worker for the id, or a new one. Returns `created` so the caller can announce the stream;
   * undefined when the stream cap is reached.
   */
  acquire(streamId: string): { worker: StreamWorker; created: boolean } | undefined {
    const existing = this.workers.get(streamId);
    if (existing) return { worker: existing, created: false };
    const max = this.options.maxStreams ?? 0;
    if (max > 0 && this.workers.size >= max) return undefined;
    const worker = this.factory(streamId, ++this.generation);
    this.workers.set(streamId, worker);
    return { worker, created: true };
  }

  /** Close and forget a stream. Returns false when it was not live (double release is a no-op). */
  release(streamId: string): boolean {
    const worker = this.workers.get(streamId);
    if (!worker) return false;
    this.workers.delete(streamId);
    worker.close();
    return true;
  }

  /** Release every stream; returns the released ids. */
  releaseAll(): string[] {
    const ids = this.ids();
    for (const id of ids) this.release(id);
    return ids;
  }
}
