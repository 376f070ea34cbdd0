/**
 * Complete AppConfig for factory tests.
 */

import type { AppConfig } from "../../src/config";

export function testConfig(overrides: {
  vad?: Partial<AppConfig["vad"]>;
  asr?: Partial<AppConfig["asr"]>;
} = {}): AppConfig {
  return {
    audio: { sampleRate: 16000, channels: 1, streamMode: "mixed" },
    vad: { provider: "local", packetMs: 100, energyThreshold: 500, maxOutstanding: 8, timeoutMs: 500, ...overrides.vad },
    segmenter: {
      segmentMs: 2500,
      minSpeechMs: 500,
      silenceTimeoutMs: 1000,
      maxSpeechMs: 5000,
      sweepIntervalMs: 100,
      diarization: true,
      mailboxCapacity: 1024,
      maxStreams: 0,
    },
    asr: { provider: "stub", timeoutMs: 30000, replyTimeoutMs: 15000, ...overrides.asr },
    output: { format: "text", enableTimestamps: true, enableSpeakerLabels: true, realTimeOutput: true },
    runtime: { healthPort: 0 },
  };
}
