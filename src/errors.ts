// Interview Voice Analyzer - Error taxonomy
//
// InputUnavailable   missing/corrupt audio or video; recovered with an
//                    available:false block.
// ExternalService    transcription/diarization/LLM failure; retried, then
//                    replaced by a fallback or an absent block.
// ResourceState      use of a closed recorder/accumulator; prevented by
//                    idempotent finalize, logged when it happens anyway.
//
// Degenerate signals (silence, zero durations) never throw: they resolve
// to documented defaults inside the DSP code.

export class InputUnavailableError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(message);
    this.name = "InputUnavailableError";
    this.path = path;
  }
}

export class ExternalServiceError extends Error {
  readonly service: string;
  /** When false, withRetry gives up immediately. */
  readonly retryable: boolean;

  constructor(service: string, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(`${service}: ${message}`, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ExternalServiceError";
    this.service = service;
    this.retryable = options.retryable ?? true;
  }
}

export class ResourceStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceStateError";
  }
}
