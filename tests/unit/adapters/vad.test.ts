/**
 * Unit tests for VAD gateways (local energy, stub, WebSocket message parsing) and the factory.
 */

import {
  LocalVoiceActivityGateway,
  StubVoiceActivityGateway,
  WebSocketVoiceActivityGateway,
  createVoiceActivityGateway,
  isVoiceEnergy,
  parseVerdictMessage,
} from "../../../src/adapters/vad";
import type { VadRequest, VadResponse } from "../../../src/adapters/vad/types";
import { samplesToPcm16 } from "../../../src/pipeline/audio-utils";
import { testConfig } from "../../helpers/config";

function request(value: number): VadRequest {
  return {
    streamId: "s",
    generation: 2,
    correlationId: 7,
    pcm: samplesToPcm16(new Int16Array(1600).fill(value)),
    sampleRate: 16000,
    timestampMs: 700,
  };
}

function nextImmediate(): Promise<void> {
  return new Promise((r) => setImmediate(r));
}

describe("isVoiceEnergy", () => {
  it("classifies by RMS strictly above the threshold", () => {
    expect(isVoiceEnergy(request(600).pcm)).toBe(true);
    expect(isVoiceEnergy(request(500).pcm)).toBe(false);
    expect(isVoiceEnergy(request(300).pcm, 200)).toBe(true);
    expect(isVoiceEnergy(Buffer.alloc(1))).toBe(false);
  });
});

describe("LocalVoiceActivityGateway", () => {
  it("delivers the verdict asynchronously with the request's correlation", async () => {
    const gateway = new LocalVoiceActivityGateway({ energyThreshold: 500 });
    const verdicts: VadResponse[] = [];
    gateway.onVerdict((v) => verdicts.push(v));
    gateway.submit(request(600));
    gateway.submit(request(0));
    expect(verdicts).toEqual([]);
    await nextImmediate();
    expect(verdicts).toEqual([
      { streamId: "s", generation: 2, correlationId: 7, isSpeech: true, confidence: 0.6 },
      { streamId: "s", generation: 2, correlationId: 7, isSpeech: false, confidence: 0 },
    ]);
  });
});

describe("StubVoiceActivityGateway", () => {
  it("marks every packet as speech", async () => {
    const gateway = new StubVoiceActivityGateway();
    const verdicts: VadResponse[] = [];
    gateway.onVerdict((v) => verdicts.push(v));
    gateway.submit(request(0));
    await nextImmediate();
    expect(verdicts).toEqual([{ streamId: "s", generation: 2, correlationId: 7, isSpeech: true, confidence: 1 }]);
  });
});

describe("parseVerdictMessage", () => {
  it("maps a well-formed message", () => {
    const raw = JSON.stringify({ stream_id: "s", generation: 1, correlation_id: 4, is_speech: true, confidence: 0.8 });
    expect(parseVerdictMessage(raw)).toEqual({ streamId: "s", generation: 1, correlationId: 4, isSpeech: true, confidence: 0.8 });
  });

  it("drops a non-finite confidence but keeps the verdict", () => {
    const raw = JSON.stringify({ stream_id: "s", generation: 1, correlation_id: 4, is_speech: false, confidence: "high" });
    expect(parseVerdictMessage(raw)?.confidence).toBeUndefined();
  });

  it("rejects malformed messages", () => {
    expect(parseVerdictMessage("not json")).toBeNull();
    expect(parseVerdictMessage("[]")).toBeNull();
    expect(parseVerdictMessage(JSON.stringify({ stream_id: "s", generation: 1, correlation_id: 1.5, is_speech: true }))).toBeNull();
    expect(parseVerdictMessage(JSON.stringify({ stream_id: "s", generation: 1, correlation_id: 1, is_speech: "yes" }))).toBeNull();
    expect(parseVerdictMessage(JSON.stringify({ generation: 1, correlation_id: 1, is_speech: true }))).toBeNull();
  });
});

describe("WebSocketVoiceActivityGateway", () => {
  it("is unhealthy and skips packets before connecting", () => {
    const gateway = new WebSocketVoiceActivityGateway({ url: "ws://127.0.0.1:1/vad" });
    expect(gateway.isHealthy()).toBe(false);
    expect(() => gateway.submit(request(600))).not.toThrow();
  });

  it("rejects connect without a url", async () => {
    const gateway = new WebSocketVoiceActivityGateway({ url: "" });
    await expect(gateway.connect()).rejects.toThrow("VAD_WS_URL");
  });
});

describe("createVoiceActivityGateway", () => {
  it("returns the local gateway by default", () => {
    expect(createVoiceActivityGateway(testConfig())).toBeInstanceOf(LocalVoiceActivityGateway);
  });

  it("returns the stub gateway when configured", () => {
    expect(createVoiceActivityGateway(testConfig({ vad: { provider: "stub" } }))).toBeInstanceOf(StubVoiceActivityGateway);
  });

  it("returns the WebSocket gateway only with a url", () => {
    expect(
      createVoiceActivityGateway(testConfig({ vad: { provider: "websocket", wsUrl: "ws://127.0.0.1:9001/vad" } }))
    ).toBeInstanceOf(WebSocketVoiceActivityGateway);
    expect(createVoiceActivityGateway(testConfig({ vad: { provider: "websocket" } }))).toBeInstanceOf(LocalVoiceActivityGateway);
  });
});
