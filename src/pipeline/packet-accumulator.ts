/**
 * Packet accumulator: reshapes irregular frames into fixed-length packets for the VAD gateway.
 * Frames are split across packet boundaries as needed; no samples are dropped or duplicated.
 */

import type { AudioPacket } from "./types";
import type { SampleBuffer } from "./sample-buffer";
import { durationMs } from "./audio-utils";

export interface PacketAccumulatorConfig {
  sampleRate: number;
}

export class PacketAccumulator {
  private nextCorrelationId = 1;
  /** Capture timestamp of the first buffered sample. */
  private headTimestampMs = 0;

  /** `buffer.capacity` is the packet target length. */
  constructor(
    private readonly buffer: SampleBuffer,
    private readonly config: PacketAccumulatorConfig
  ) {}

  get packetSamples(): number {
    return this.buffer.capacity;
  }

  /** Samples waiting for the next packet. */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Append one frame; returns every packet completed by it, in order.
   * Each packet gets the next correlation id for this stream.
   */
  push(samples: Int16Array, timestampMs: number): AudioPacket[] {
    const packets: AudioPacket[] = [];
    let offset = 0;
    while (offset < samples.length) {
      if (this.buffer.length === 0) {
        this.headTimestampMs = timestampMs + durationMs(offset, this.config.sampleRate);
      }
      offset += this.buffer.append(samples, offset);
      if (this.buffer.isFull()) {
        packets.push({
          correlationId: this.nextCorrelationId++,
          samples: this.buffer.drain(),
          timestampMs: this.headTimestampMs,
        });
      }
    }
    return packets;
  }

  /** Unfilled tail (discarded on release). */
  remainder(): Int16Array {
    return this.buffer.view().slice();
  }

  reset(): void {
    this.buffer.clear();
  }
}
