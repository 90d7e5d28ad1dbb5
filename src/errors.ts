export type VoiceErrorCode =
  | 'SOURCE_CLOSED'
  | 'SPEECH_TOO_SHORT'
  | 'ENROLLMENT_MISSING'
  | 'SPEAKER_MISMATCH'
  | 'INVALID_INPUT'
  | 'CONFIG_MISSING'
  | 'REMOTE_BACKEND'
  | 'VOICEPRINT_NOT_FOUND';

export type PipelineStage =
  | 'scan'
  | 'capture'
  | 'guardrail'
  | 'verify'
  | 'store'
  | 'transcribe'
  | 'config'
  | 'input';

export interface VoiceErrorOptions {
  stage: PipelineStage;
  recoverable: boolean;
  counter?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class VoiceError extends Error {
  readonly stage: PipelineStage;
  readonly recoverable: boolean;
  readonly counter?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, public readonly code: VoiceErrorCode, options: VoiceErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'VoiceError';
    this.stage = options.stage;
    this.recoverable = options.recoverable;
    this.counter = options.counter;
    this.details = options.details;
  }
}

export function isVoiceError(value: unknown): value is VoiceError {
  return value instanceof VoiceError;
}

/** The audio source ended before the wake word was heard. Reacquire a source. */
export class SourceClosedError extends VoiceError {
  constructor(framesScanned: number) {
    super('Audio source closed before wake word detected', 'SOURCE_CLOSED', {
      stage: 'scan',
      recoverable: false,
      details: { framesScanned },
    });
    this.name = 'SourceClosedError';
  }
}

export class SpeechTooShortError extends VoiceError {
  constructor(details: { frames: number; speechFrames: number; minCommandFrames: number; minSpeechFrames: number }) {
    super('Insufficient speech captured for verification', 'SPEECH_TOO_SHORT', {
      stage: 'guardrail',
      recoverable: true,
      counter: 'speech_rejected_short',
      details,
    });
    this.name = 'SpeechTooShortError';
  }
}

export class EnrollmentMissingError extends VoiceError {
  constructor(voiceprintPath: string) {
    super('Owner has not been enrolled', 'ENROLLMENT_MISSING', {
      stage: 'verify',
      recoverable: false,
      details: { voiceprintPath },
    });
    this.name = 'EnrollmentMissingError';
  }
}

export class SpeakerMismatchError extends VoiceError {
  constructor(similarity: number, threshold: number) {
    super('Speaker does not match owner', 'SPEAKER_MISMATCH', {
      stage: 'verify',
      recoverable: true,
      counter: 'speaker_rejected',
      details: { similarity, threshold },
    });
    this.name = 'SpeakerMismatchError';
  }
}

export class InvalidInputError extends VoiceError {
  constructor(message: string, details?: Record<string, unknown>, stage: PipelineStage = 'input') {
    super(message, 'INVALID_INPUT', { stage, recoverable: false, details });
    this.name = 'InvalidInputError';
  }
}

export class ConfigMissingError extends VoiceError {
  constructor(setting: string, hint?: string) {
    super(hint ? `Missing required configuration: ${setting} (${hint})` : `Missing required configuration: ${setting}`, 'CONFIG_MISSING', {
      stage: 'config',
      recoverable: false,
      details: { setting },
    });
    this.name = 'ConfigMissingError';
  }
}

export class RemoteBackendError extends VoiceError {
  constructor(backendId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Remote transcription backend "${backendId}" failed: ${reason}`, 'REMOTE_BACKEND', {
      stage: 'transcribe',
      recoverable: false,
      details: { backendId },
      cause,
    });
    this.name = 'RemoteBackendError';
  }
}

export class VoiceprintNotFoundError extends VoiceError {
  constructor(path: string) {
    super(`No voiceprint stored at ${path}`, 'VOICEPRINT_NOT_FOUND', {
      stage: 'store',
      recoverable: false,
      details: { path },
    });
    this.name = 'VoiceprintNotFoundError';
  }
}
