/**
 * Pipeline error types
 *
 * Each adapter failure has its own class so the orchestrator can decide how
 * a run degrades. None of them ends the command loop.
 */

/** Audio input device could not be opened, or failed while recording */
export class CaptureDeviceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CaptureDeviceError';
  }
}

/** Speech-to-text service or binary failed */
export class TranscriptionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TranscriptionError';
  }
}

/** Synthesis or playback failed */
export class SynthesisError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SynthesisError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
