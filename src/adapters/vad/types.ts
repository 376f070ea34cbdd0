/**
 * Voice-activity gateway types.
 * Requests carry a per-stream correlation id; verdicts come back asynchronously through a listener
 * and may arrive late, duplicated or out of order. Implementations can be swapped via config.
 */

export interface VadRequest {
  streamId: string;
  /** Stream instance; a released and re-created stream gets a new generation. */
  generation: number;
  correlationId: number;
  /** 16-bit LE mono PCM of exactly one packet. */
  pcm: Buffer;
  sampleRate: number;
  /** Capture timestamp of the first sample (ms). */
  timestampMs: number;
}

export interface VadResponse {
  streamId: string;
  generation: number;
  correlationId: number;
  isSpeech: boolean;
  confidence?: number;
}

export type VerdictListener = (response: VadResponse) => void;

/**
 * Voice-activity gateway: fire-and-forget submit, verdicts via listener.
 * Gateways own their transport faults; a request with no verdict is resolved by the engine's timeout.
 */
export interface IVoiceActivityGateway {
  submit(request: VadRequest): void;
  onVerdict(listener: VerdictListener): void;
  /** Optional connect step (e.g. open a socket). */
  connect?(): Promise<void>;
  close?(): Promise<void>;
  /** For the watchdog; gateways without a connection are always healthy. */
  isHealthy?(): boolean;
}
