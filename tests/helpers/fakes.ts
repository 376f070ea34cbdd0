/**
 * In-memory gateways for pipeline tests: capture requests, let the test answer them.
 */

import type { IVoiceActivityGateway, VadRequest, VerdictListener } from "../../src/adapters/vad/types";
import type { IRecognitionGateway, RecognitionListener, RecognitionRequest, RecognitionResponse } from "../../src/adapters/asr/types";
import type { AudioFrame } from "../../src/pipeline/types";
import { samplesToPcm16 } from "../../src/pipeline/audio-utils";

export class FakeVad implements IVoiceActivityGateway {
  readonly requests: VadRequest[] = [];
  private listeners: VerdictListener[] = [];

  submit(request: VadRequest): void {
    this.requests.push(request);
  }

  onVerdict(listener: VerdictListener): void {
    this.listeners.push(listener);
  }

  respond(request: VadRequest, isSpeech: boolean): void {
    for (const l of this.listeners) {
      l({ streamId: request.streamId, generation: request.generation, correlationId: request.correlationId, isSpeech });
    }
  }

  respondAll(isSpeech: boolean): void {
    for (const r of this.requests.splice(0)) this.respond(r, isSpeech);
  }
}

export class FakeAsr implements IRecognitionGateway {
  readonly requests: RecognitionRequest[] = [];
  readonly releasedStreams: string[] = [];
  private listeners: RecognitionListener[] = [];

  submit(request: RecognitionRequest): void {
    this.requests.push(request);
  }

  onResult(listener: RecognitionListener): void {
    this.listeners.push(listener);
  }

  releaseStream(streamId: string): void {
    this.releasedStreams.push(streamId);
  }

  respond(request: RecognitionRequest, reply: Partial<RecognitionResponse> = {}): void {
    for (const l of this.listeners) {
      l({
        streamId: request.streamId,
        generation: request.generation,
        correlationId: request.correlationId,
        text: "",
        ...reply,
      });
    }
  }
}

/** A frame of `count` samples all equal to `value`. */
export function frame(streamId: string, count: number, timestampMs: number, sequence: number, value = 1000): AudioFrame {
  return { streamId, pcm: samplesToPcm16(new Int16Array(count).fill(value)), timestampMs, sequence };
}
