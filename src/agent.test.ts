import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@picovoice/porcupine-node', () => ({ Porcupine: vi.fn() }));

import { createLocalBackend, createRemoteBackend, createVoiceAgent } from './agent';
import { loadConfig, type PipelineConfig } from './config';
import { ConfigMissingError, SourceClosedError } from './errors';
import { InMemoryMetrics } from './metrics';
import { GeminiBackend } from './transcription/geminiBackend';
import { GoogleSpeechBackend } from './transcription/googleSpeechBackend';
import { WhisperBackend } from './transcription/whisperBackend';
import { FrameQueue } from './wake/frameQueue';
import type { AudioFrame } from './wake/types';

function fakeLocal(text: string, confidence: number) {
  return {
    id: 'local_whisper',
    displayName: 'Fake Whisper',
    transcribe: vi.fn(async (_frames: readonly AudioFrame[], _sampleRate: number) => ({ text, confidence })),
    dispose: vi.fn(),
  };
}

function queueOf(frames: AudioFrame[]): FrameQueue {
  const queue = new FrameQueue(frames.length + 1);
  frames.forEach((frame) => queue.push(frame));
  queue.close();
  return queue;
}

describe('VoiceAgent', () => {
  let tmpDir: string;
  let config: PipelineConfig;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-test-'));
    config = loadConfig({}, {
      voiceprintPath: path.join(tmpDir, 'owner.voiceprint'),
      voiceprintSecret: 'test-secret',
      silenceAfterFrames: 1,
    });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('listens, verifies and transcribes one command', async () => {
    const command = [Buffer.from('jarvis lights'), Buffer.from('on please'), Buffer.alloc(2)];
    const metrics = new InMemoryMetrics();
    const local = fakeLocal('lights on please', 0.91);
    const agent = createVoiceAgent(config, queueOf([Buffer.from('chatter'), ...command]), {
      metrics,
      localBackend: local,
      remoteBackend: null,
    });
    await agent.enrollOwner(command, 16000);

    const { audio, transcription } = await agent.processAudioCommand();

    expect(audio.frames).toEqual(command);
    expect(transcription).toMatchObject({ text: 'lights on please', confidence: 0.91, source: 'local_whisper' });
    expect(local.transcribe).toHaveBeenCalledWith(audio.frames, 16000);
    expect(metrics.snapshot().counters).toEqual({
      wake_word_detected: 1,
      speaker_verified: 1,
      asr_local_accepted: 1,
      asr_calls: 1,
    });
  });

  it('reports a closed source without transcribing', async () => {
    const local = fakeLocal('unused', 1);
    const agent = createVoiceAgent(config, queueOf([Buffer.from('chatter')]), { localBackend: local, remoteBackend: null });

    await expect(agent.processAudioCommand()).rejects.toBeInstanceOf(SourceClosedError);
    expect(local.transcribe).not.toHaveBeenCalled();
  });

  it('verifies and transcribes directly', async () => {
    const local = fakeLocal('hello', 0.8);
    const agent = createVoiceAgent(config, queueOf([]), { localBackend: local, remoteBackend: null });
    const frames = [Buffer.from('owner'), Buffer.from('speaking')];

    const embedding = await agent.enrollOwner(frames, 16000);
    expect(embedding).toHaveLength(32);
    expect(await agent.verifyOwner(frames, 16000)).toBeCloseTo(1, 10);
    expect((await agent.transcribe(frames, 16000)).source).toBe('local_whisper');
    expect((await agent.transcribeStreaming(queueOf(frames), 16000)).source).toBe('local_whisper_streaming');
  });

  it('disposes the transcription backends', async () => {
    const local = fakeLocal('', 0);
    const agent = createVoiceAgent(config, queueOf([]), { localBackend: local, remoteBackend: null });

    await agent.dispose();

    expect(local.dispose).toHaveBeenCalledTimes(1);
  });

  it('requires the voiceprint secret up front', () => {
    const withoutSecret = { ...config, voiceprintSecret: undefined };

    expect(() => createVoiceAgent(withoutSecret, queueOf([]), { localBackend: fakeLocal('', 0), remoteBackend: null })).toThrow(
      ConfigMissingError,
    );
  });
});

describe('backend factories', () => {
  const base = loadConfig({});

  it('builds the local whisper backend from its paths', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-whisper-'));
    const whisperBinary = path.join(dir, 'main');
    const whisperModel = path.join(dir, 'base.bin');
    fs.writeFileSync(whisperBinary, '');
    fs.writeFileSync(whisperModel, '');
    try {
      expect(() => createLocalBackend(base)).toThrow(ConfigMissingError);
      expect(createLocalBackend({ ...base, whisperBinary, whisperModel })).toBeInstanceOf(WhisperBackend);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('refuses whisper paths that do not exist', () => {
    expect(() =>
      createLocalBackend({ ...base, whisperBinary: '/nonexistent/whisper', whisperModel: '/nonexistent/model.bin' }),
    ).toThrow('no whisper binary or model at /nonexistent/whisper, /nonexistent/model.bin');
  });

  it('builds the configured remote backend', () => {
    expect(createRemoteBackend({ ...base, remoteBackend: 'none' })).toBeNull();
    expect(createRemoteBackend({ ...base, remoteBackend: 'google-speech' })).toBeInstanceOf(GoogleSpeechBackend);
    expect(createRemoteBackend({ ...base, remoteBackend: 'gemini', geminiApiKey: 'test-key' })).toBeInstanceOf(GeminiBackend);
    expect(() => createRemoteBackend({ ...base, remoteBackend: 'gemini' })).toThrow(ConfigMissingError);
  });
});
