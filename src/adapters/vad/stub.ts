/**
 * Stub voice-activity gateway: every packet is speech.
 * For wiring tests and for runs where a recognizer does its own silence handling.
 */

import type { IVoiceActivityGateway, VadRequest, VerdictListener } from "./types";

export class StubVoiceActivityGateway implements IVoiceActivityGateway {
  private listeners: VerdictListener[] = [];

  onVerdict(listener: VerdictListener): void {
    this.listeners.push(listener);
  }

  submit(request: VadRequest): void {
    setImmediate(() => {
      for (const listener of this.listeners) {
        listener({
          streamId: request.streamId,
          generation: request.generation,
          correlationId: request.correlationId,
          isSpeech: true,
          confidence: 1,
        });
      }
    });
  }
}
