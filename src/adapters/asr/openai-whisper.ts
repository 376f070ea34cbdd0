/**
 * OpenAI Whisper API recognition gateway.
 * Segments are wrapped as WAV and uploaded; Whisper does not diarize, so the speaker id stays the stream's.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import OpenAI from "openai";
import type { RecognitionRequest, TranscriptResult } from "./types";
import { TranscriptionGateway } from "./gateway";
import { pcmToWav } from "../../pipeline/audio-utils";
import { logger } from "../../logging";

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

let tmpCounter = 0;

export class OpenAIRecognitionGateway extends TranscriptionGateway {
  private client: OpenAI;
  private readonly model: string;

  constructor(config: OpenAIWhisperConfig) {
    super(config.timeoutMs);
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model ?? "whisper-1";
  }

  protected async transcribe(request: RecognitionRequest): Promise<TranscriptResult> {
    const wav = pcmToWav(request.pcm, request.sampleRate);
    const tmpPath = path.join(os.tmpdir(), `whisper-${process.pid}-${Date.now()}-${++tmpCounter}.wav`);
    try {
      fs.writeFileSync(tmpPath, wav);
      const transcription = await this.client.audio.transcriptions.create({
        file: fs.createReadStream(tmpPath),
        model: this.model,
      });
      return { text: transcription.text };
    } finally {
      try {
        fs.unlinkSync(tmpPath);
      } catch (err) {
        logger.debug({ event: "ASR_TMP_CLEANUP_FAILED", path: tmpPath, err: (err as Error).message }, "Temp WAV not removed");
      }
    }
  }
}
