/**
 * Transcription Router
 * Local first; the remote backend is only paid for when local confidence is below the threshold.
 */

import { RemoteBackendError } from '../errors';
import { createLogger, silentLogger, type Logger } from '../log';
import { InMemoryMetrics, type MetricsSink } from '../metrics';
import type { ReceiveResult } from '../wake/frameQueue';
import type { AudioFrame, AudioSource } from '../wake/types';
import type { BackendTranscription, TranscriptionBackend, TranscriptionResult } from './types';

export interface TranscriptionRouterOptions {
  confidenceThreshold: number;
  // Upper bound on frame collection in transcribeStreaming
  streamTimeoutMs: number;
}

export const DEFAULT_ROUTER_OPTIONS: TranscriptionRouterOptions = {
  confidenceThreshold: 0.7,
  streamTimeoutMs: 5000,
};

export const STREAMING_SUFFIX = '_streaming';

/** Sources that can wait for a frame with a deadline without losing it on timeout. */
interface DeadlineSource {
  receive(timeoutMs?: number): Promise<ReceiveResult>;
}

function isDeadlineSource(source: AudioSource): source is AudioSource & DeadlineSource {
  return 'receive' in source && typeof source.receive === 'function';
}

export interface CollectedFrames {
  frames: AudioFrame[];
  timedOut: boolean;
}

/**
 * Gather frames until the source ends or `timeoutMs` has elapsed since the start, whichever
 * comes first. Never rejects because of the deadline. A plain async iterable is closed through
 * `return()` once the deadline passes; the frame its pending `next()` yields is discarded.
 */
export async function collectFrames(
  source: AudioSource,
  timeoutMs: number,
  logger: Logger = silentLogger,
): Promise<CollectedFrames> {
  const frames: AudioFrame[] = [];
  const deadline = Date.now() + timeoutMs;

  if (isDeadlineSource(source)) {
    while (true) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return { frames, timedOut: true };
      const result = await source.receive(remaining);
      if (result.kind === 'closed') return { frames, timedOut: false };
      if (result.kind === 'timeout') return { frames, timedOut: true };
      frames.push(result.frame);
    }
  }

  const iterator = source[Symbol.asyncIterator]();
  const expired = Symbol('expired');
  while (true) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) return { frames, timedOut: true };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof expired>((resolve) => {
      timer = setTimeout(() => resolve(expired), remaining);
    });

    try {
      const next = await Promise.race([iterator.next(), timeout]);
      if (next === expired) {
        iterator.return?.().catch((error: unknown) => logger.warn('Closing the timed-out source failed', error));
        return { frames, timedOut: true };
      }
      if (next.done) return { frames, timedOut: false };
      frames.push(next.value);
    } finally {
      clearTimeout(timer);
    }
  }
}

export class TranscriptionRouter {
  private options: TranscriptionRouterOptions;
  private metrics: MetricsSink;
  private logger: Logger;

  constructor(
    private readonly local: TranscriptionBackend,
    private readonly remote: TranscriptionBackend | null,
    options: Partial<TranscriptionRouterOptions> = {},
    deps: { metrics?: MetricsSink; logger?: Logger } = {},
  ) {
    this.options = { ...DEFAULT_ROUTER_OPTIONS, ...options };
    this.metrics = deps.metrics ?? new InMemoryMetrics();
    this.logger = deps.logger ?? createLogger('TranscriptionRouter');
  }

  get threshold(): number {
    return this.options.confidenceThreshold;
  }

  async transcribe(frames: readonly AudioFrame[], sampleRate: number): Promise<TranscriptionResult> {
    return this.route(frames, sampleRate, '');
  }

  /**
   * Collect frames from an asynchronous source under the stream timeout, then route them like
   * `transcribe`. A timeout only ends collection; whatever arrived is transcribed.
   */
  async transcribeStreaming(source: AudioSource, sampleRate: number): Promise<TranscriptionResult> {
    const { frames, timedOut } = await collectFrames(source, this.options.streamTimeoutMs, this.logger);
    if (timedOut) {
      this.metrics.increment('asr_stream_timeouts');
      this.logger.debug(`Stream collection timed out after ${this.options.streamTimeoutMs}ms with ${frames.length} frames`);
    }
    return this.route(frames, sampleRate, STREAMING_SUFFIX);
  }

  private async route(frames: readonly AudioFrame[], sampleRate: number, suffix: string): Promise<TranscriptionResult> {
    const startedAt = Date.now();
    const local = await this.local.transcribe(frames, sampleRate);

    if (local.confidence >= this.options.confidenceThreshold) {
      this.metrics.increment('asr_local_accepted');
      return this.finish(local, this.local.id + suffix, startedAt);
    }

    if (!this.remote) {
      this.logger.warn(
        `Local confidence ${local.confidence.toFixed(2)} below ${this.options.confidenceThreshold} and no remote backend configured`,
      );
      return this.finish(local, this.local.id + suffix, startedAt);
    }

    this.logger.info(`Local confidence ${local.confidence.toFixed(2)} below threshold; using ${this.remote.displayName}`);
    this.metrics.increment('asr_remote_fallback');

    let remote: BackendTranscription;
    try {
      remote = await this.remote.transcribe(frames, sampleRate);
    } catch (error) {
      this.logger.error('Remote transcription failed', error);
      throw error instanceof RemoteBackendError ? error : new RemoteBackendError(this.remote.id, error);
    }
    return this.finish(remote, this.remote.id + suffix, startedAt);
  }

  private finish(result: BackendTranscription, source: string, startedAt: number): TranscriptionResult {
    const latencyMs = Date.now() - startedAt;
    this.metrics.recordTiming('asr_latency_ms', latencyMs);
    return { text: result.text, confidence: result.confidence, source, latencyMs };
  }

  async dispose(): Promise<void> {
    await this.local.dispose();
    await this.remote?.dispose();
  }
}
