/**
 * Continuous Listener
 * Scans an audio source for the wake word, captures the command that follows, applies the speech
 * guardrails and hands the capture to speaker verification. One call yields at most one command.
 *
 *   idle → wake_detected → capturing → guardrail_evaluation → verifying → verified | rejected
 */

import { EventEmitter } from 'events';
import { InvalidInputError, SourceClosedError, SpeakerMismatchError, SpeechTooShortError } from '../errors';
import { createLogger, type Logger } from '../log';
import { InMemoryMetrics, type MetricsSink } from '../metrics';
import type { SpeakerVerifier } from '../voice/speakerVerifier';
import { SilenceTracker } from './vad';
import type { WakeWordDetector } from './wakeWordDetector';
import {
  CEILING_FRAME_SAMPLES,
  DEFAULT_LISTENER_CONFIG,
  type AudioFrame,
  type AudioSource,
  type ListenerConfig,
  type ListenerStatus,
  type VerifiedAudio,
} from './types';

export interface ContinuousListenerEvents {
  statusChange: (status: ListenerStatus) => void;
  wakeDetected: (data: { framesScanned: number }) => void;
  speechRejected: (data: { frames: number; speechFrames: number }) => void;
  speakerVerified: (data: { similarity: number; latencyMs: number }) => void;
  speakerRejected: (data: { reason: string }) => void;
}

export type SpeakerCheck = Pick<SpeakerVerifier, 'verifyOwner'>;

export interface ContinuousListenerDeps {
  detector: WakeWordDetector;
  verifier: SpeakerCheck;
  source: AudioSource;
  metrics?: MetricsSink;
  logger?: Logger;
}

export interface CaptureResult {
  frames: AudioFrame[];
  speechFrames: number;
  stopReason: 'silence' | 'ceiling' | 'source_closed';
}

export class ContinuousListener extends EventEmitter {
  private config: ListenerConfig;
  private detector: WakeWordDetector;
  private verifier: SpeakerCheck;
  private frames: AsyncIterator<AudioFrame>;
  private sourceEnded = false;
  private status: ListenerStatus = 'idle';
  private listening = false;
  readonly metrics: MetricsSink;
  private logger: Logger;

  constructor(deps: ContinuousListenerDeps, config: Partial<ListenerConfig> = {}) {
    super();
    this.config = { ...DEFAULT_LISTENER_CONFIG, ...config };
    this.detector = deps.detector;
    this.verifier = deps.verifier;
    // Held once so that consecutive calls keep reading the same single-pass source
    this.frames = deps.source[Symbol.asyncIterator]();
    this.metrics = deps.metrics ?? new InMemoryMetrics();
    this.logger = deps.logger ?? createLogger('ContinuousListener');
  }

  /**
   * Frame ceiling for one capture, trigger frame included.
   */
  get maxCommandFrames(): number {
    const frames = Math.floor((this.config.maxCommandSeconds * this.config.sampleRate) / CEILING_FRAME_SAMPLES);
    return Math.max(1, frames);
  }

  get sampleRate(): number {
    return this.config.sampleRate;
  }

  /**
   * Block until the wake word is heard, then capture and verify the command.
   * Rejects with SourceClosedError, SpeechTooShortError, EnrollmentMissingError or SpeakerMismatchError.
   */
  async listenForCommand(): Promise<VerifiedAudio> {
    if (this.listening) {
      throw new InvalidInputError('listenForCommand is already running on this listener', undefined, 'scan');
    }
    this.listening = true;
    try {
      return await this.runOnce();
    } finally {
      this.listening = false;
    }
  }

  private async runOnce(): Promise<VerifiedAudio> {
    this.setStatus('idle');
    this.logger.debug('Starting continuous listen loop');

    const trigger = await this.scan();
    const wakeAt = Date.now();

    this.setStatus('capturing');
    const capture = await this.captureCommand(trigger);
    this.logger.debug(`Captured ${capture.frames.length} frames (stop: ${capture.stopReason})`);

    this.setStatus('guardrail_evaluation');
    if (!this.passesGuardrails(capture)) {
      this.metrics.increment('speaker_rejected');
      this.metrics.increment('speech_rejected_short');
      this.logger.warn('Insufficient speech captured; rejecting command');
      this.emit('speechRejected', { frames: capture.frames.length, speechFrames: capture.speechFrames });
      this.setStatus('rejected');
      throw new SpeechTooShortError({
        frames: capture.frames.length,
        speechFrames: capture.speechFrames,
        minCommandFrames: this.config.minCommandFrames,
        minSpeechFrames: this.config.minSpeechFrames,
      });
    }

    this.setStatus('verifying');
    let similarity: number;
    try {
      similarity = await this.verifier.verifyOwner(capture.frames, this.config.sampleRate);
    } catch (error) {
      this.setStatus('rejected');
      if (error instanceof SpeakerMismatchError) {
        this.metrics.increment('speaker_rejected');
        this.logger.warn('Speaker verification failed; rejecting command');
        this.emit('speakerRejected', { reason: error.message });
      }
      throw error;
    }

    const latencyMs = Date.now() - wakeAt;
    this.metrics.increment('speaker_verified');
    this.metrics.recordTiming('wake_to_verify_ms', latencyMs);
    this.logger.info('Speaker verified; emitting audio for downstream processing');
    this.emit('speakerVerified', { similarity, latencyMs });
    this.setStatus('verified');

    return Object.freeze({
      frames: Object.freeze([...capture.frames]),
      sampleRate: this.config.sampleRate,
      similarity,
    });
  }

  private async nextFrame(): Promise<AudioFrame | null> {
    if (this.sourceEnded) return null;
    const result = await this.frames.next();
    if (result.done) {
      this.sourceEnded = true;
      return null;
    }
    return result.value;
  }

  /**
   * Pull frames until one contains the wake word.
   */
  private async scan(): Promise<AudioFrame> {
    let scanned = 0;
    while (true) {
      const frame = await this.nextFrame();
      if (frame === null) {
        this.logger.warn(`Audio source closed after ${scanned} frames without a wake word`);
        throw new SourceClosedError(scanned);
      }
      scanned++;

      if (this.detector.heard(frame)) {
        this.logger.info('Wake word detected; capturing command audio');
        this.metrics.increment('wake_word_detected');
        this.setStatus('wake_detected');
        this.emit('wakeDetected', { framesScanned: scanned });
        return frame;
      }
    }
  }

  /**
   * Collect the trigger frame and what follows until sustained silence, the frame ceiling, or the
   * end of the source.
   */
  async captureCommand(trigger: AudioFrame): Promise<CaptureResult> {
    const tracker = new SilenceTracker(this.config.energyThreshold);
    const frames: AudioFrame[] = [trigger];
    const ceiling = this.maxCommandFrames;
    tracker.process(trigger);
    // the silent run is counted from the first frame after the trigger
    tracker.clearRun();

    while (true) {
      if (tracker.consecutiveSilentFrames >= this.config.silenceAfterFrames) {
        this.logger.debug('Detected sustained silence; stopping capture');
        return { frames, speechFrames: tracker.speechFrames, stopReason: 'silence' };
      }
      if (frames.length >= ceiling) {
        this.logger.debug('Reached max command duration; stopping capture');
        return { frames, speechFrames: tracker.speechFrames, stopReason: 'ceiling' };
      }

      const frame = await this.nextFrame();
      if (frame === null) {
        return { frames, speechFrames: tracker.speechFrames, stopReason: 'source_closed' };
      }
      frames.push(frame);
      tracker.process(frame);
    }
  }

  private passesGuardrails(capture: CaptureResult): boolean {
    return (
      capture.frames.length >= this.config.minCommandFrames &&
      capture.speechFrames >= this.config.minSpeechFrames
    );
  }

  private setStatus(status: ListenerStatus): void {
    if (this.status !== status) {
      this.logger.debug(`Status: ${this.status} → ${status}`);
      this.status = status;
      this.emit('statusChange', status);
    }
  }

  getStatus(): ListenerStatus {
    return this.status;
  }
}
