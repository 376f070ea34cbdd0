/**
 * Stub recognition gateway for testing or when no provider is configured.
 * Returns empty transcript.
 */

import type { RecognitionRequest, TranscriptResult } from "./types";
import { TranscriptionGateway } from "./gateway";

export class StubRecognitionGateway extends TranscriptionGateway {
  constructor() {
    super();
  }

  protected async transcribe(_request: RecognitionRequest): Promise<TranscriptResult> {
    return { text: "" };
  }
}
