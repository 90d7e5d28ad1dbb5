import { readFile } from 'fs/promises';
import { InvalidInputError } from '../errors';
import { FrameQueue } from './frameQueue';
import type { AudioFrame } from './types';

/**
 * Split raw PCM bytes into fixed-size frames. The last frame may be shorter.
 */
export function chunkFrames(data: Buffer, chunkSize: number): AudioFrame[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidInputError('Chunk size must be a positive integer', { chunkSize });
  }

  const frames: AudioFrame[] = [];
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    frames.push(data.subarray(offset, offset + chunkSize));
  }
  return frames;
}

export async function readFrames(path: string, chunkSize: number): Promise<AudioFrame[]> {
  const data = await readFile(path);
  return chunkFrames(data, chunkSize);
}

/**
 * Load a raw PCM file into a closed queue, ready to be consumed as an audio source.
 */
export async function fileSource(path: string, chunkSize: number): Promise<FrameQueue> {
  const frames = await readFrames(path, chunkSize);
  const queue = new FrameQueue(Math.max(frames.length, 1));
  for (const frame of frames) queue.push(frame);
  queue.close();
  return queue;
}
