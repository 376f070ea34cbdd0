/**
 * Audio format helpers: PCM16 <-> sample arrays, durations, and PCM to WAV for recognition input.
 */

/** Number of samples covering durationMs at sampleRate (floored). */
export function samplesForDuration(durationMs: number, sampleRate: number): number {
  return Math.floor((durationMs / 1000) * sampleRate);
}

/** Duration in ms of a sample count at sampleRate. */
export function durationMs(samples: number, sampleRate: number): number {
  return (samples / sampleRate) * 1000;
}

/**
 * Decode 16-bit little-endian PCM into samples.
 * A trailing odd byte (half a sample) is ignored.
 */
export function pcm16ToSamples(pcm: Buffer): Int16Array {
  const count = pcm.length >> 1;
  const out = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = pcm.readInt16LE(i * 2);
  }
  return out;
}

/** Encode samples as 16-bit little-endian PCM. */
export function samplesToPcm16(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    out.writeInt16LE(samples[i], i * 2);
  }
  return out;
}

/**
 * Average interleaved channels into mono. A trailing partial frame is ignored;
 * mono input is returned as is.
 */
export function downmixToMono(samples: Int16Array, channels: number): Int16Array {
  if (channels <= 1) return samples;
  const count = Math.floor(samples.length / channels);
  const out = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    let sum = 0;
    for (let c = 0; c < channels; c++) sum += samples[i * channels + c];
    out[i] = Math.round(sum / channels);
  }
  return out;
}

/** Root-mean-square level of 16-bit samples (0 for empty input). */
export function rms(samples: Int16Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 * Sample rate typically 16000 for segment output.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize;
  const header = Buffer.alloc(headerSize);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/**
 * Locate the PCM payload of a RIFF/WAVE file by walking its chunks.
 * Falls back to the canonical 44-byte offset when no "data" chunk is found.
 */
export function wavPcmData(wav: Buffer): Buffer {
  if (wav.length < 12 || wav.toString("ascii", 0, 4) !== "RIFF" || wav.toString("ascii", 8, 12) !== "WAVE") {
    return wav.subarray(Math.min(44, wav.length));
  }
  let offset = 12;
  while (offset + 8 <= wav.length) {
    const id = wav.toString("ascii", offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    if (id === "data") {
      return wav.subarray(offset + 8, Math.min(wav.length, offset + 8 + size));
    }
    offset += 8 + size + (size % 2);
  }
  return wav.subarray(Math.min(44, wav.length));
}
