/**
 * Bounded frame channel
 * Producers push frames (microphone callbacks, file readers); a single consumer pulls them in
 * order, optionally with a deadline. When full, the oldest frame is dropped.
 */

import type { AudioFrame } from './types';

export type ReceiveResult =
  | { kind: 'frame'; frame: AudioFrame }
  | { kind: 'closed' }
  | { kind: 'timeout' };

type Waiter = (result: ReceiveResult) => void;

export const DEFAULT_QUEUE_CAPACITY = 512;

export class FrameQueue implements AsyncIterable<AudioFrame> {
  private frames: AudioFrame[] = [];
  private waiters: Waiter[] = [];
  private isClosed = false;
  private dropped = 0;

  constructor(
    private readonly capacity = DEFAULT_QUEUE_CAPACITY,
    private readonly onDrop?: (dropped: number) => void,
  ) {}

  push(frame: AudioFrame): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ kind: 'frame', frame });
      return;
    }

    this.frames.push(frame);
    if (this.frames.length > this.capacity) {
      this.frames.shift();
      this.dropped++;
      this.onDrop?.(this.dropped);
    }
  }

  /**
   * Signal end-of-stream. Frames already queued are still delivered.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ kind: 'closed' });
    }
  }

  /**
   * Wait for the next frame. With a timeout, resolves `{ kind: 'timeout' }` once it elapses
   * and leaves the queue untouched.
   */
  receive(timeoutMs?: number): Promise<ReceiveResult> {
    const frame = this.frames.shift();
    if (frame) return Promise.resolve({ kind: 'frame', frame });
    if (this.isClosed) return Promise.resolve({ kind: 'closed' });

    return new Promise<ReceiveResult>((resolve) => {
      let timer: NodeJS.Timeout | null = null;

      const waiter: Waiter = (result) => {
        if (timer) clearTimeout(timer);
        resolve(result);
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve({ kind: 'timeout' });
        }, Math.max(0, timeoutMs));
      }
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<AudioFrame> {
    while (true) {
      const result = await this.receive();
      if (result.kind !== 'frame') return;
      yield result.frame;
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.frames.length;
  }

  get droppedFrames(): number {
    return this.dropped;
  }
}
