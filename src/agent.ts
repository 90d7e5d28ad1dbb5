/**
 * Voice Agent
 * Wires the listener, speaker verification and transcription routing from one PipelineConfig.
 */

import type { PipelineConfig } from './config';
import { createLogger, type Logger } from './log';
import { InMemoryMetrics, type MetricsSink } from './metrics';
import { GeminiBackend } from './transcription/geminiBackend';
import { GoogleSpeechBackend } from './transcription/googleSpeechBackend';
import { TranscriptionRouter } from './transcription/transcriptionRouter';
import type { TranscriptionBackend, TranscriptionResult } from './transcription/types';
import { WhisperBackend } from './transcription/whisperBackend';
import { ConfigMissingError } from './errors';
import { createEmbeddingModel, type Embedding } from './voice/embedding';
import { SpeakerVerifier } from './voice/speakerVerifier';
import { VoiceprintStore } from './voice/voiceprintStore';
import { ContinuousListener } from './wake/continuousListener';
import type { AudioFrame, AudioSource, VerifiedAudio } from './wake/types';
import { createWakeWordDetector, type WakeWordDetector } from './wake/wakeWordDetector';

export interface CommandPayload {
  audio: VerifiedAudio;
  transcription: TranscriptionResult;
}

export interface VoiceAgentParts {
  listener: ContinuousListener;
  verifier: SpeakerVerifier;
  router: TranscriptionRouter;
  metrics: MetricsSink;
  detector?: WakeWordDetector;
  logger?: Logger;
}

export class VoiceAgent {
  readonly listener: ContinuousListener;
  readonly verifier: SpeakerVerifier;
  readonly router: TranscriptionRouter;
  readonly metrics: MetricsSink;
  private detector?: WakeWordDetector;
  private logger: Logger;

  constructor(parts: VoiceAgentParts) {
    this.listener = parts.listener;
    this.verifier = parts.verifier;
    this.router = parts.router;
    this.metrics = parts.metrics;
    this.detector = parts.detector;
    this.logger = parts.logger ?? createLogger('VoiceAgent');
  }

  listenForCommand(): Promise<VerifiedAudio> {
    return this.listener.listenForCommand();
  }

  enrollOwner(frames: readonly AudioFrame[], sampleRate: number): Promise<Embedding> {
    return this.verifier.enrollOwner(frames, sampleRate);
  }

  verifyOwner(frames: readonly AudioFrame[], sampleRate: number): Promise<number> {
    return this.verifier.verifyOwner(frames, sampleRate);
  }

  transcribe(frames: readonly AudioFrame[], sampleRate: number): Promise<TranscriptionResult> {
    return this.router.transcribe(frames, sampleRate);
  }

  transcribeStreaming(source: AudioSource, sampleRate: number): Promise<TranscriptionResult> {
    return this.router.transcribeStreaming(source, sampleRate);
  }

  /**
   * Wait for one verified command and transcribe it.
   */
  async processAudioCommand(): Promise<CommandPayload> {
    const audio = await this.listenForCommand();
    const transcription = await this.router.transcribe(audio.frames, audio.sampleRate);
    this.metrics.increment('asr_calls');
    this.logger.info(`Command transcribed by ${transcription.source} (confidence ${transcription.confidence.toFixed(2)})`);
    return { audio, transcription };
  }

  async dispose(): Promise<void> {
    this.detector?.dispose?.();
    await this.router.dispose();
  }
}

export function createLocalBackend(config: PipelineConfig): TranscriptionBackend {
  if (!config.whisperBinary || !config.whisperModel) {
    throw new ConfigMissingError('whisperBinary/whisperModel', 'set VOICEGATE_WHISPER_BINARY and VOICEGATE_WHISPER_MODEL');
  }
  const backend = new WhisperBackend(config.whisperBinary, config.whisperModel, config.language);
  if (!backend.isAvailable()) {
    throw new ConfigMissingError('whisperBinary/whisperModel', `no whisper binary or model at ${config.whisperBinary}, ${config.whisperModel}`);
  }
  return backend;
}

export function createRemoteBackend(config: PipelineConfig): TranscriptionBackend | null {
  switch (config.remoteBackend) {
    case 'google-speech':
      return new GoogleSpeechBackend({
        languageCode: config.language === 'en' ? 'en-US' : config.language,
        apiEndpoint: config.remoteEndpoint,
        apiKey: config.googleApiKey,
      });
    case 'gemini':
      return new GeminiBackend({ apiKey: config.geminiApiKey });
    case 'none':
      return null;
  }
}

export interface VoiceAgentOverrides {
  metrics?: MetricsSink;
  localBackend?: TranscriptionBackend;
  remoteBackend?: TranscriptionBackend | null;
}

/**
 * Build a VoiceAgent from configuration. The voiceprint secret is checked here, before any audio
 * is read.
 */
export function createVoiceAgent(config: PipelineConfig, source: AudioSource, overrides: VoiceAgentOverrides = {}): VoiceAgent {
  const metrics = overrides.metrics ?? new InMemoryMetrics();
  const store = new VoiceprintStore(config.voiceprintPath, config.voiceprintSecret);
  const verifier = new SpeakerVerifier(createEmbeddingModel(config), store, config.verificationThreshold);
  const detector = createWakeWordDetector(config);

  const listener = new ContinuousListener({ detector, verifier, source, metrics }, config);
  const router = new TranscriptionRouter(
    overrides.localBackend ?? createLocalBackend(config),
    overrides.remoteBackend === undefined ? createRemoteBackend(config) : overrides.remoteBackend,
    { confidenceThreshold: config.confidenceThreshold, streamTimeoutMs: config.streamTimeoutMs },
    { metrics },
  );

  return new VoiceAgent({ listener, verifier, router, metrics, detector });
}
