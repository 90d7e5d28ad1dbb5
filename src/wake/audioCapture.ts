/**
 * Audio Capture Service
 * Captures microphone audio using node-record-lpcm16 (SoX under the hood) and re-chunks it into
 * fixed-size 16-bit frames on a FrameQueue.
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { record, type Recording } from 'node-record-lpcm16';
import { createLogger, type Logger } from '../log';
import { FrameQueue } from './frameQueue';

export interface AudioCaptureOptions {
  sampleRate: number;
  channels: number;
  // Samples per emitted frame
  frameSamples: number;
  queueCapacity: number;
}

export const DEFAULT_CAPTURE_OPTIONS: AudioCaptureOptions = {
  sampleRate: 16000,
  channels: 1,
  frameSamples: 1024,
  queueCapacity: 512,
};

export class AudioCapture extends EventEmitter {
  private recording: Recording | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private isCapturing = false;
  private options: AudioCaptureOptions;
  readonly frames: FrameQueue;

  constructor(options: Partial<AudioCaptureOptions> = {}, private readonly logger: Logger = createLogger('AudioCapture')) {
    super();
    this.options = { ...DEFAULT_CAPTURE_OPTIONS, ...options };
    this.frames = new FrameQueue(this.options.queueCapacity, (dropped) => {
      this.emit('dropped', dropped);
    });
  }

  private get bytesPerFrame(): number {
    return this.options.frameSamples * this.options.channels * 2;
  }

  /**
   * Start capturing audio from the microphone
   */
  start(): void {
    if (this.isCapturing) {
      this.logger.warn('Already capturing');
      return;
    }
    if (this.frames.closed) {
      throw new Error('AudioCapture cannot be restarted after stop(); create a new instance');
    }

    this.logger.info(`Starting capture (sample rate: ${this.options.sampleRate}, channels: ${this.options.channels})`);

    this.recording = record({
      sampleRate: this.options.sampleRate,
      channels: this.options.channels,
      threshold: 0,
      recorder: 'sox',
    });

    const stream = this.recording.stream();

    stream.on('data', (chunk: Buffer) => {
      this.onData(chunk);
    });

    stream.on('error', (error: unknown) => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error('Stream error:', err);
      if (this.listenerCount('error') > 0) this.emit('error', err);
      this.stop();
    });

    stream.on('end', () => {
      this.logger.info('Stream ended');
      this.stop();
    });

    this.isCapturing = true;
    this.emit('started');
  }

  private onData(chunk: Buffer): void {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    const size = this.bytesPerFrame;
    while (this.pending.length >= size) {
      this.frames.push(Buffer.from(this.pending.subarray(0, size)));
      this.pending = this.pending.subarray(size);
    }
  }

  /**
   * Stop capturing and end the frame stream. A trailing partial frame is delivered as-is.
   */
  stop(): void {
    if (!this.isCapturing) return;
    this.isCapturing = false;

    if (this.recording) {
      this.recording.stop();
      this.recording = null;
    }

    if (this.pending.length > 0) {
      this.frames.push(Buffer.from(this.pending));
      this.pending = Buffer.alloc(0);
    }
    this.frames.close();

    this.emit('stopped');
    this.logger.info('Stopped capturing audio');
  }

  get capturing(): boolean {
    return this.isCapturing;
  }
}

/**
 * Check if SoX is installed
 */
export async function checkSoxInstalled(): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn('which', ['sox']);
    child.on('close', (code) => {
      resolve(code === 0);
    });
    child.on('error', () => {
      resolve(false);
    });
  });
}
