/**
 * Recognition (speech-to-text) gateway types.
 * Implementations can be swapped via config (e.g. OpenAI transcription, HTTP inference server, stub).
 */

export interface RecognitionRequest {
  streamId: string;
  generation: number;
  /** Recognition correlation id; equal to the dispatch sequence within the stream. */
  correlationId: number;
  /** 16-bit LE mono PCM, up to the overflow bound. */
  pcm: Buffer;
  sampleRate: number;
  /** Stream-relative start of the segment (ms). */
  startMs: number;
  endMs: number;
  /** Ask the recognizer to label speakers (mixed audio). */
  diarization: boolean;
  speakerId?: string;
}

export interface RecognitionResponse {
  streamId: string;
  generation: number;
  correlationId: number;
  /** Transcribed text; may be empty. */
  text: string;
  speakerId?: string;
  confidence?: number;
  /** Segment times relative to the session (ms), when the recognizer reports them. */
  startMs?: number;
  endMs?: number;
  /** Set when the gateway gave up on this request. */
  error?: string;
}

export type RecognitionListener = (response: RecognitionResponse) => void;

/**
 * Recognition gateway: fire-and-forget submit, results via listener.
 * Retries (if any) live in the gateway client, never in the engine.
 */
export interface IRecognitionGateway {
  submit(request: RecognitionRequest): void;
  onResult(listener: RecognitionListener): void;
  /** Drop per-stream state (e.g. context history) when a stream is released. */
  releaseStream?(streamId: string): void;
  close?(): Promise<void>;
}

/** Text-level result of one transcription call, before correlation fields are attached. */
export interface TranscriptResult {
  text: string;
  speakerId?: string;
  confidence?: number;
  startMs?: number;
  endMs?: number;
}
