/**
 * Recognition gateway factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IRecognitionGateway } from "./types";
import { StubRecognitionGateway } from "./stub";
import { OpenAIRecognitionGateway } from "./openai-whisper";
import { HttpRecognitionGateway } from "./http";
import { logger } from "../../logging";

export type {
  IRecognitionGateway,
  RecognitionListener,
  RecognitionRequest,
  RecognitionResponse,
  TranscriptResult,
} from "./types";
export { TranscriptionGateway, withTimeout } from "./gateway";
export { StubRecognitionGateway } from "./stub";
export { OpenAIRecognitionGateway } from "./openai-whisper";
export { HttpRecognitionGateway, parseRecognitionReply } from "./http";

export function createRecognitionGateway(config: AppConfig): IRecognitionGateway {
  const { provider, openaiApiKey, openaiModel, url, timeoutMs } = config.asr;
  if (provider === "openai" && openaiApiKey) {
    return new OpenAIRecognitionGateway({ apiKey: openaiApiKey, model: openaiModel, timeoutMs });
  }
  if (provider === "http" && url) {
    return new HttpRecognitionGateway({ url, timeoutMs });
  }
  if (provider !== "stub") {
    logger.warn({ event: "ASR_PROVIDER_UNCONFIGURED", provider }, "ASR provider missing credentials or url; using stub");
  }
  return new StubRecognitionGateway();
}
