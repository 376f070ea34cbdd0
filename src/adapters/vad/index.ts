/**
 * VAD gateway factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IVoiceActivityGateway } from "./types";
import { LocalVoiceActivityGateway } from "./local";
import { StubVoiceActivityGateway } from "./stub";
import { WebSocketVoiceActivityGateway } from "./websocket";

export type { IVoiceActivityGateway, VadRequest, VadResponse, VerdictListener } from "./types";
export { LocalVoiceActivityGateway, isVoiceEnergy } from "./local";
export { StubVoiceActivityGateway } from "./stub";
export { WebSocketVoiceActivityGateway, parseVerdictMessage } from "./websocket";

export function createVoiceActivityGateway(config: AppConfig): IVoiceActivityGateway {
  const { provider, wsUrl, energyThreshold } = config.vad;
  if (provider === "websocket" && wsUrl) {
    return new WebSocketVoiceActivityGateway({ url: wsUrl });
  }
  if (provider === "stub") {
    return new StubVoiceActivityGateway();
  }
  return new LocalVoiceActivityGateway({ energyThreshold });
}
