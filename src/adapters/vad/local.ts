/**
 * Local voice-activity gateway: RMS energy classifier over each packet.
 * Runs in process but keeps the gateway contract: the verdict is delivered asynchronously
 * with the request's correlation id.
 */

import type { IVoiceActivityGateway, VadRequest, VerdictListener } from "./types";
import { pcm16ToSamples, rms } from "../../pipeline/audio-utils";

/** RMS threshold (16-bit PCM): below = silence. */
export const DEFAULT_ENERGY_THRESHOLD = 500;

export interface LocalVadConfig {
  energyThreshold?: number;
}

/** Energy-based speech test: RMS above threshold = speech. */
export function isVoiceEnergy(pcm: Buffer, threshold: number = DEFAULT_ENERGY_THRESHOLD): boolean {
  if (pcm.length < 2) return false;
  return rms(pcm16ToSamples(pcm)) > threshold;
}

export class LocalVoiceActivityGateway implements IVoiceActivityGateway {
  private listeners: VerdictListener[] = [];
  private readonly threshold: number;

  constructor(config: LocalVadConfig = {}) {
    this.threshold = config.energyThreshold ?? DEFAULT_ENERGY_THRESHOLD;
  }

  onVerdict(listener: VerdictListener): void {
    this.listeners.push(listener);
  }

  submit(request: VadRequest): void {
    const level = rms(pcm16ToSamples(request.pcm));
    const isSpeech = level > this.threshold;
    const confidence = Math.min(1, level / (this.threshold * 2));
    setImmediate(() => {
      for (const listener of this.listeners) {
        listener({
          streamId: request.streamId,
          generation: request.generation,
          correlationId: request.correlationId,
          isSpeech,
          confidence,
        });
      }
    });
  }
}
