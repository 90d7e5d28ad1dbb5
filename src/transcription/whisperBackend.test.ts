import * as fs from 'fs';
import * as path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('child_process')>();
  return { ...actual, execFile: execFileMock };
});

import { silentLogger } from '../log';
import { parseWhisperJson, WhisperBackend } from './whisperBackend';

type ExecCallback = (err: Error | null) => void;

const whisperOutput = JSON.stringify({
  transcription: [
    {
      text: ' Turn on',
      tokens: [
        { text: '[_BEG_]', p: 0.1 },
        { text: ' Turn', p: 0.9 },
        { text: ' on', p: 0.7 },
      ],
    },
    {
      text: ' the lights.',
      tokens: [
        { text: ' the', p: 0.8 },
        { text: ' lights', p: 0.6 },
        { text: '[_TT_150]', p: 0.2 },
      ],
    },
  ],
});

describe('parseWhisperJson', () => {
  it('joins segment text and averages spoken token probabilities', () => {
    const result = parseWhisperJson(whisperOutput);

    expect(result.text).toBe('Turn on the lights.');
    // [_TT_150] does not match the special-token pattern and counts as spoken
    expect(result.confidence).toBeCloseTo((0.9 + 0.7 + 0.8 + 0.6 + 0.2) / 5, 10);
  });

  it('reports zero confidence when nothing was spoken', () => {
    expect(parseWhisperJson('{"transcription": []}')).toEqual({ text: '', confidence: 0 });
    expect(parseWhisperJson('{}')).toEqual({ text: '', confidence: 0 });
  });
});

describe('WhisperBackend', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it('runs whisper.cpp on a temporary WAV and reads its JSON output', async () => {
    let args: string[] = [];
    execFileMock.mockImplementation((_binary: string, callArgs: string[], _options: unknown, callback: ExecCallback) => {
      args = callArgs;
      const prefix = callArgs[callArgs.indexOf('-of') + 1];
      fs.writeFileSync(`${prefix}.json`, whisperOutput);
      callback(null);
    });
    const backend = new WhisperBackend('/opt/whisper/main', '/opt/whisper/ggml-base.en.bin', 'en', silentLogger);

    const result = await backend.transcribe([Buffer.alloc(4)], 16000);

    expect(result.text).toBe('Turn on the lights.');
    expect(execFileMock.mock.calls[0][0]).toBe('/opt/whisper/main');
    const wavPath = args[args.indexOf('-f') + 1];
    expect(args).toEqual([
      '-m', '/opt/whisper/ggml-base.en.bin',
      '-f', wavPath,
      '-l', 'en',
      '--no-timestamps',
      '-oj', '-ojf',
      '-of', path.join(path.dirname(wavPath), 'output'),
    ]);
    expect(fs.existsSync(path.dirname(wavPath))).toBe(false);
  });

  it('propagates process failures', async () => {
    execFileMock.mockImplementation((_binary: string, _args: string[], _options: unknown, callback: ExecCallback) => {
      callback(new Error('model not found'));
    });
    const backend = new WhisperBackend('/opt/whisper/main', '/missing.bin', 'en', silentLogger);

    await expect(backend.transcribe([Buffer.alloc(2)], 16000)).rejects.toThrow('model not found');
  });

  it('is unavailable when the binary or model is missing', () => {
    const backend = new WhisperBackend('/nonexistent/whisper', '/nonexistent/model.bin', 'en', silentLogger);

    expect(backend.isAvailable()).toBe(false);
    expect(backend.id).toBe('local_whisper');
  });
});
