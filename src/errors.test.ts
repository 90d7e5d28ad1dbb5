import { describe, expect, it } from 'vitest';
import {
  ConfigMissingError,
  EnrollmentMissingError,
  isVoiceError,
  RemoteBackendError,
  SourceClosedError,
  SpeakerMismatchError,
  VoiceError,
} from './errors';

describe('voice errors', () => {
  it('carry a code, stage and recoverability', () => {
    const error = new SpeakerMismatchError(0.42, 0.8);

    expect(error).toBeInstanceOf(VoiceError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SpeakerMismatchError');
    expect(error).toMatchObject({
      code: 'SPEAKER_MISMATCH',
      stage: 'verify',
      recoverable: true,
      counter: 'speaker_rejected',
      details: { similarity: 0.42, threshold: 0.8 },
    });
  });

  it('marks terminal failures as not recoverable', () => {
    expect(new SourceClosedError(7).recoverable).toBe(false);
    expect(new EnrollmentMissingError('./owner.voiceprint').code).toBe('ENROLLMENT_MISSING');
  });

  it('formats configuration hints', () => {
    expect(new ConfigMissingError('geminiApiKey').message).toBe('Missing required configuration: geminiApiKey');
    expect(new ConfigMissingError('geminiApiKey', 'set GEMINI_API_KEY').message).toBe(
      'Missing required configuration: geminiApiKey (set GEMINI_API_KEY)',
    );
  });

  it('keeps the cause of remote failures', () => {
    const error = new RemoteBackendError('cloud_gemini', 'rate limited');

    expect(error.message).toBe('Remote transcription backend "cloud_gemini" failed: rate limited');
    expect(error.cause).toBe('rate limited');
  });

  it('are recognized by isVoiceError', () => {
    expect(isVoiceError(new SourceClosedError(0))).toBe(true);
    expect(isVoiceError(new Error('plain'))).toBe(false);
    expect(isVoiceError('SOURCE_CLOSED')).toBe(false);
  });
});
