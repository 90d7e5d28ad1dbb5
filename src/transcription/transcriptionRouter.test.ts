import { describe, expect, it, vi } from 'vitest';
import { RemoteBackendError } from '../errors';
import { silentLogger } from '../log';
import { InMemoryMetrics } from '../metrics';
import { FrameQueue } from '../wake/frameQueue';
import type { AudioFrame } from '../wake/types';
import { collectFrames, TranscriptionRouter } from './transcriptionRouter';
import type { BackendTranscription } from './types';

function fakeBackend(id: string, outcome: BackendTranscription | Error) {
  return {
    id,
    displayName: id,
    transcribe: vi.fn(async (_frames: readonly AudioFrame[], _sampleRate: number) => {
      if (outcome instanceof Error) throw outcome;
      return outcome;
    }),
    dispose: vi.fn(),
  };
}

const frames = [Buffer.from('turn'), Buffer.from('on')];

function makeRouter(local: BackendTranscription, remote: BackendTranscription | Error | null, streamTimeoutMs = 5000) {
  const metrics = new InMemoryMetrics();
  const localBackend = fakeBackend('local_whisper', local);
  const remoteBackend = remote === null ? null : fakeBackend('cloud_google', remote);
  const router = new TranscriptionRouter(
    localBackend,
    remoteBackend,
    { confidenceThreshold: 0.7, streamTimeoutMs },
    { metrics, logger: silentLogger },
  );
  return { router, metrics, localBackend, remoteBackend };
}

describe('TranscriptionRouter.transcribe', () => {
  it('keeps a confident local result', async () => {
    const { router, metrics, remoteBackend } = makeRouter({ text: 'turn on', confidence: 0.92 }, { text: 'x', confidence: 1 });

    const result = await router.transcribe(frames, 16000);

    expect(result).toMatchObject({ text: 'turn on', confidence: 0.92, source: 'local_whisper' });
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(remoteBackend?.transcribe).not.toHaveBeenCalled();
    expect(metrics.snapshot().counters).toEqual({ asr_local_accepted: 1 });
    expect(metrics.snapshot().timings.asr_latency_ms.count).toBe(1);
  });

  it('accepts a local result exactly at the threshold', async () => {
    const { router } = makeRouter({ text: 'turn on', confidence: 0.7 }, { text: 'x', confidence: 1 });

    expect((await router.transcribe(frames, 16000)).source).toBe('local_whisper');
  });

  it('falls back to the remote backend below the threshold', async () => {
    const { router, metrics, remoteBackend } = makeRouter(
      { text: 'turn of', confidence: 0.65 },
      { text: 'turn on', confidence: 0.95 },
    );

    const result = await router.transcribe(frames, 16000);

    expect(result).toMatchObject({ text: 'turn on', confidence: 0.95, source: 'cloud_google' });
    expect(remoteBackend?.transcribe).toHaveBeenCalledWith(frames, 16000);
    expect(metrics.snapshot().counters).toEqual({ asr_remote_fallback: 1 });
  });

  it('returns the local result when no remote backend is configured', async () => {
    const { router } = makeRouter({ text: 'turn of', confidence: 0.3 }, null);

    expect(await router.transcribe(frames, 16000)).toMatchObject({ text: 'turn of', confidence: 0.3, source: 'local_whisper' });
  });

  it('wraps remote failures', async () => {
    const cause = new Error('quota exceeded');
    const { router } = makeRouter({ text: '', confidence: 0 }, cause);

    const error = await router.transcribe(frames, 16000).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteBackendError);
    expect(error).toMatchObject({
      message: 'Remote transcription backend "cloud_google" failed: quota exceeded',
      cause,
      details: { backendId: 'cloud_google' },
    });
  });

  it('does not wrap a RemoteBackendError twice', async () => {
    const original = new RemoteBackendError('cloud_google', 'offline');
    const { router } = makeRouter({ text: '', confidence: 0 }, original);

    await expect(router.transcribe(frames, 16000)).rejects.toBe(original);
  });

  it('disposes both backends', async () => {
    const { router, localBackend, remoteBackend } = makeRouter({ text: '', confidence: 0 }, { text: '', confidence: 0 });

    await router.dispose();

    expect(localBackend.dispose).toHaveBeenCalledTimes(1);
    expect(remoteBackend?.dispose).toHaveBeenCalledTimes(1);
  });
});

describe('TranscriptionRouter.transcribeStreaming', () => {
  it('tags the source and transcribes everything the stream delivered', async () => {
    const { router, metrics, localBackend } = makeRouter({ text: 'turn on', confidence: 0.9 }, null);
    const queue = new FrameQueue();
    frames.forEach((frame) => queue.push(frame));
    queue.close();

    const result = await router.transcribeStreaming(queue, 16000);

    expect(result.source).toBe('local_whisper_streaming');
    expect(localBackend.transcribe).toHaveBeenCalledWith(frames, 16000);
    expect(metrics.snapshot().counters.asr_stream_timeouts).toBeUndefined();
  });

  it('tags remote results too', async () => {
    const { router } = makeRouter({ text: '', confidence: 0.1 }, { text: 'turn on', confidence: 0.9 });
    const queue = new FrameQueue();
    queue.close();

    expect((await router.transcribeStreaming(queue, 16000)).source).toBe('cloud_google_streaming');
  });

  it('stops collecting at the timeout and transcribes what arrived', async () => {
    const { router, metrics, localBackend } = makeRouter({ text: 'turn', confidence: 0.9 }, null, 10);
    const queue = new FrameQueue();
    queue.push(Buffer.from('early'));
    const late = setTimeout(() => queue.push(Buffer.from('late')), 20);

    const result = await router.transcribeStreaming(queue, 16000);
    clearTimeout(late);

    expect(result.source).toBe('local_whisper_streaming');
    expect(localBackend.transcribe).toHaveBeenCalledWith([Buffer.from('early')], 16000);
    expect(metrics.snapshot().counters.asr_stream_timeouts).toBe(1);
  });
});

describe('collectFrames', () => {
  it('reads a plain async iterable to the end', async () => {
    async function* two(): AsyncGenerator<AudioFrame> {
      yield Buffer.from('a');
      yield Buffer.from('b');
    }

    expect(await collectFrames(two(), 1000)).toEqual({ frames: [Buffer.from('a'), Buffer.from('b')], timedOut: false });
  });

  it('gives up on a plain async iterable at the deadline', async () => {
    async function* slow(): AsyncGenerator<AudioFrame> {
      yield Buffer.from('a');
      await new Promise((resolve) => setTimeout(resolve, 50));
      yield Buffer.from('b');
    }

    expect(await collectFrames(slow(), 10)).toEqual({ frames: [Buffer.from('a')], timedOut: true });
  });

  it('closes a plain async iterable once the deadline passes', async () => {
    let resumed = false;
    let closed = false;
    async function* slow(): AsyncGenerator<AudioFrame> {
      try {
        yield Buffer.from('a');
        await new Promise((resolve) => setTimeout(resolve, 30));
        yield Buffer.from('b');
        resumed = true;
        yield Buffer.from('c');
      } finally {
        closed = true;
      }
    }

    expect(await collectFrames(slow(), 10, silentLogger)).toEqual({ frames: [Buffer.from('a')], timedOut: true });

    await vi.waitFor(() => expect(closed).toBe(true));
    expect(resumed).toBe(false);
  });

  it('leaves a frame that arrives after the deadline in the queue', async () => {
    const queue = new FrameQueue();

    expect(await collectFrames(queue, 5)).toEqual({ frames: [], timedOut: true });

    queue.push(Buffer.from('next'));
    expect(queue.size).toBe(1);
  });
});
