#!/usr/bin/env node
/**
 * Stream microphone audio (or a raw PCM file) through the listener and print each verified,
 * transcribed command.
 *
 *   voicegate-listen --wake-word jarvis --voiceprint ./owner.voiceprint --threshold 0.8
 */

import * as dotenv from 'dotenv';
import { parseArgs } from 'util';
import { createVoiceAgent, type VoiceAgent } from '../agent';
import { loadConfig, numberFrom, positiveInteger, type PipelineConfig } from '../config';
import { isVoiceError } from '../errors';
import { createLogger } from '../log';
import { AudioCapture, checkSoxInstalled } from '../wake/audioCapture';
import { fileSource } from '../wake/fileSource';
import type { AudioSource } from '../wake/types';

export interface ListenOptions {
  wakeWord: string;
  voiceprintPath: string;
  threshold: number;
  sampleRate: number;
  // Samples per frame
  blocksize: number;
  audioPath?: string;
}

export interface AudioInput {
  kind: 'mic' | 'file';
  source: AudioSource;
  stop(): void;
  // Set for microphone input; reports frames dropped by a full queue
  capture?: AudioCapture;
}

export async function openAudioInput(options: ListenOptions): Promise<AudioInput> {
  if (options.audioPath) {
    const source = await fileSource(options.audioPath, options.blocksize * 2);
    return { kind: 'file', source, stop: () => source.close() };
  }

  if (!(await checkSoxInstalled())) {
    throw new Error(
      'SoX is required for microphone capture. Install it:\n' +
        '  macOS: brew install sox\n' +
        '  Ubuntu: sudo apt-get install sox\n' +
        'or pass --audio <file> to stream from a raw PCM file.',
    );
  }

  const capture = new AudioCapture({ sampleRate: options.sampleRate, frameSamples: options.blocksize });
  capture.start();
  return { kind: 'mic', source: capture.frames, stop: () => capture.stop(), capture };
}

export interface RunAgentDeps {
  openInput?: (options: ListenOptions) => Promise<AudioInput>;
  createAgent?: (config: PipelineConfig, source: AudioSource) => VoiceAgent;
  env?: NodeJS.ProcessEnv;
  print?: (line: string) => void;
  onInput?: (input: AudioInput) => void;
}

/**
 * Loop over commands until the audio source closes. Recoverable failures (speech too short,
 * speaker mismatch) are reported and listening resumes; anything else ends the loop.
 */
export async function runAgent(options: ListenOptions, deps: RunAgentDeps = {}): Promise<number> {
  const logger = createLogger('Listen');
  const print = deps.print ?? ((line: string) => console.log(line));
  const config = loadConfig(deps.env ?? process.env, {
    wakeWord: options.wakeWord,
    voiceprintPath: options.voiceprintPath,
    verificationThreshold: options.threshold,
    sampleRate: options.sampleRate,
    frameSamples: options.blocksize,
  });

  const input = await (deps.openInput ?? openAudioInput)(options);
  deps.onInput?.(input);

  let handled = 0;
  let agent: VoiceAgent | null = null;
  // A capture failure closes the frame queue; the loop then ends and the failure is rethrown
  const captureErrors: Error[] = [];
  input.capture?.on('error', (error: Error) => captureErrors.push(error));
  try {
    agent = (deps.createAgent ?? createVoiceAgent)(config, input.source);
    const metrics = agent.metrics;
    input.capture?.on('dropped', () => metrics.increment('frames_dropped'));
    print('Listening for wake word... (Ctrl+C to exit)');

    while (true) {
      try {
        const { transcription } = await agent.processAudioCommand();
        handled++;
        print(`Transcription: ${transcription.text}`);
      } catch (error) {
        if (isVoiceError(error) && error.code === 'SOURCE_CLOSED') break;
        if (isVoiceError(error) && error.recoverable) {
          logger.warn(`${error.code}: ${error.message}`);
          continue;
        }
        throw error;
      }
    }
    if (captureErrors.length > 0) throw captureErrors[0];
  } finally {
    input.stop();
    await agent?.dispose();
    print('Stopping listener.');
  }
  return handled;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'wake-word': { type: 'string', default: 'jarvis' },
      voiceprint: { type: 'string', default: './owner.voiceprint' },
      threshold: { type: 'string', default: '0.8' },
      'sample-rate': { type: 'string', default: '16000' },
      blocksize: { type: 'string', default: '1024' },
      audio: { type: 'string' },
    },
  });

  await runAgent(
    {
      wakeWord: values['wake-word'] ?? 'jarvis',
      voiceprintPath: values.voiceprint ?? './owner.voiceprint',
      threshold: values.threshold === undefined ? 0.8 : numberFrom('--threshold', values.threshold),
      sampleRate: positiveInteger('--sample-rate', values['sample-rate'], 16000),
      blocksize: positiveInteger('--blocksize', values.blocksize, 1024),
      audioPath: values.audio,
    },
    {
      onInput: (input) => {
        process.once('SIGINT', () => input.stop());
      },
    },
  );
}

if (require.main === module) {
  dotenv.config();
  const logger = createLogger('Listen');
  main().catch((error: unknown) => {
    logger.error(isVoiceError(error) ? `${error.code}: ${error.message}` : String(error));
    process.exitCode = 1;
  });
}
