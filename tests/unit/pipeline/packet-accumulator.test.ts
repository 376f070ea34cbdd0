/**
 * Unit tests for PacketAccumulator (fixed-size packets from irregular frames).
 */

import { PacketAccumulator } from "../../../src/pipeline/packet-accumulator";
import { SampleBuffer } from "../../../src/pipeline/sample-buffer";

/** 1 sample = 1 ms at this rate. */
const RATE = 1000;

function accumulator(packetSamples: number): PacketAccumulator {
  return new PacketAccumulator(new SampleBuffer(packetSamples), { sampleRate: RATE });
}

describe("PacketAccumulator", () => {
  it("holds samples until a packet is full", () => {
    const acc = accumulator(4);
    expect(acc.push(Int16Array.from([1, 2, 3]), 0)).toEqual([]);
    expect(acc.pending).toBe(3);
  });

  it("splits frames across packet boundaries with first-sample timestamps", () => {
    const acc = accumulator(4);
    acc.push(Int16Array.from([1, 2, 3]), 0);
    const packets = acc.push(Int16Array.from([4, 5, 6, 7, 8, 9]), 3);
    expect(packets.map((p) => p.correlationId)).toEqual([1, 2]);
    expect(packets.map((p) => Array.from(p.samples))).toEqual([
      [1, 2, 3, 4],
      [5, 6, 7, 8],
    ]);
    expect(packets.map((p) => p.timestampMs)).toEqual([0, 4]);
    expect(Array.from(acc.remainder())).toEqual([9]);
  });

  it("emits several packets from one large frame", () => {
    const acc = accumulator(2);
    const packets = acc.push(Int16Array.from([1, 2, 3, 4, 5]), 10);
    expect(packets.map((p) => p.timestampMs)).toEqual([10, 12]);
    expect(acc.pending).toBe(1);
  });

  it("concatenated packets equal the input minus the remainder", () => {
    const acc = accumulator(5);
    const sizes = [3, 7, 1, 10, 5, 2, 4];
    const input: number[] = [];
    const output: number[] = [];
    let next = 1;
    let ts = 0;
    for (const size of sizes) {
      const frame = new Int16Array(size);
      for (let i = 0; i < size; i++) {
        frame[i] = next;
        input.push(next++);
      }
      for (const p of acc.push(frame, ts)) {
        expect(p.samples.length).toBe(5);
        output.push(...Array.from(p.samples));
      }
      ts += size;
    }
    const remainder = Array.from(acc.remainder());
    expect(input.length).toBe(32);
    expect(output.length).toBe(30);
    expect([...output, ...remainder]).toEqual(input);
  });

  it("reset discards the remainder", () => {
    const acc = accumulator(4);
    acc.push(Int16Array.from([1, 2]), 0);
    acc.reset();
    expect(acc.pending).toBe(0);
    expect(acc.remainder().length).toBe(0);
  });
});
