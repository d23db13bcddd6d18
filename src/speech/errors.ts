// ═══════════════════════════════════════════════════════════════════════════════
// SPEECH ERROR TAXONOMY
// ═══════════════════════════════════════════════════════════════════════════════

export type SpeechErrorCode =
  | 'INVALID_INPUT'
  | 'UNSUPPORTED_VOICE'
  | 'TRANSIENT_NETWORK'
  | 'REMOTE_REJECTED'
  | 'CACHE_IO'
  | 'PLAYBACK_FAILED'
  | 'MERGE_FAILED'
  | 'CANCELLED'
  | 'OUTPUT_FAILED'
  | 'NOT_CONFIGURED';

export class SpeechError extends Error {
  constructor(
    message: string,
    public readonly code: SpeechErrorCode,
    public readonly retryable: boolean,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SpeechError';
  }
}

/** Empty text or an unrecognized voice. Fatal, never retried. */
export class InvalidInputError extends SpeechError {
  constructor(message: string, code: 'INVALID_INPUT' | 'UNSUPPORTED_VOICE' = 'INVALID_INPUT') {
    super(message, code, false);
    this.name = 'InvalidInputError';
  }
}

/** The remote service does not know the requested voice. */
export class UnsupportedVoiceError extends InvalidInputError {
  constructor(public readonly voiceId: string, detail?: string) {
    super(
      detail ? `Unsupported voice "${voiceId}": ${detail}` : `Unsupported voice "${voiceId}"`,
      'UNSUPPORTED_VOICE',
    );
    this.name = 'UnsupportedVoiceError';
  }
}

/** Remote unreachable, timed out, throttled or failing server-side. */
export class TransientNetworkError extends SpeechError {
  constructor(message: string, public readonly status?: number, cause?: unknown) {
    super(message, 'TRANSIENT_NETWORK', true, cause);
    this.name = 'TransientNetworkError';
  }
}

/** Remote reached and refused the request. */
export class RemoteRejectedError extends SpeechError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'REMOTE_REJECTED', false);
    this.name = 'RemoteRejectedError';
  }
}

export class CacheIOError extends SpeechError {
  constructor(message: string, public readonly operation: string, cause?: unknown) {
    super(message, 'CACHE_IO', false, cause);
    this.name = 'CacheIOError';
  }
}

export class PlaybackError extends SpeechError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PLAYBACK_FAILED', false, cause);
    this.name = 'PlaybackError';
  }
}

export class MergeError extends SpeechError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MERGE_FAILED', false, cause);
    this.name = 'MergeError';
  }
}

export class CancelledError extends SpeechError {
  constructor(message = 'Request cancelled') {
    super(message, 'CANCELLED', false);
    this.name = 'CancelledError';
  }
}

/** The artifact could not be copied to the requested output path. */
export class OutputWriteError extends SpeechError {
  constructor(message: string, cause?: unknown) {
    super(message, 'OUTPUT_FAILED', false, cause);
    this.name = 'OutputWriteError';
  }
}

export class ConfigurationError extends SpeechError {
  constructor(message: string) {
    super(message, 'NOT_CONFIGURED', false);
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors outside the taxonomy count as retryable: synthesis failures of
 * unknown shape are worth another attempt.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof SpeechError) {
    return error.retryable;
  }
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
