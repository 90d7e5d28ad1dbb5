#!/usr/bin/env node
/**
 * Enroll the owner voiceprint from a raw 16-bit PCM file.
 *
 *   voicegate-enroll --audio owner.raw --voiceprint ./owner.voiceprint --sample-rate 16000
 */

import * as dotenv from 'dotenv';
import { parseArgs } from 'util';
import { loadConfig, positiveInteger } from '../config';
import { InvalidInputError, isVoiceError } from '../errors';
import { createEmbeddingModel } from '../voice/embedding';
import { SpeakerVerifier } from '../voice/speakerVerifier';
import { DEFAULT_KEY_ENV_VAR, VoiceprintStore } from '../voice/voiceprintStore';
import { readFrames } from '../wake/fileSource';

export interface EnrollOptions {
  audioPath: string;
  voiceprintPath: string;
  sampleRate?: number;
  chunkSize?: number;
  keyEnvVar?: string;
  env?: NodeJS.ProcessEnv;
}

export interface EnrollSummary {
  voiceprintPath: string;
  frames: number;
  embeddingLength: number;
}

export async function enrollFromFile(options: EnrollOptions): Promise<EnrollSummary> {
  const env = options.env ?? process.env;
  const store = VoiceprintStore.fromEnv(options.voiceprintPath, options.keyEnvVar ?? DEFAULT_KEY_ENV_VAR, env);

  const frames = await readFrames(options.audioPath, options.chunkSize ?? 1024);
  if (frames.length === 0) {
    throw new InvalidInputError(`No audio frames read from ${options.audioPath}`, { audioPath: options.audioPath });
  }

  const config = loadConfig(env);
  const verifier = new SpeakerVerifier(createEmbeddingModel(config), store);
  const embedding = await verifier.enrollOwner(frames, options.sampleRate ?? config.sampleRate);

  return {
    voiceprintPath: options.voiceprintPath,
    frames: frames.length,
    embeddingLength: embedding.length,
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      audio: { type: 'string' },
      voiceprint: { type: 'string', default: './owner.voiceprint' },
      'sample-rate': { type: 'string', default: '16000' },
      'chunk-size': { type: 'string', default: '1024' },
      'key-env-var': { type: 'string', default: DEFAULT_KEY_ENV_VAR },
    },
  });

  if (!values.audio) {
    throw new InvalidInputError('--audio is required');
  }

  const result = await enrollFromFile({
    audioPath: values.audio,
    voiceprintPath: values.voiceprint ?? './owner.voiceprint',
    sampleRate: positiveInteger('--sample-rate', values['sample-rate'], 16000),
    chunkSize: positiveInteger('--chunk-size', values['chunk-size'], 1024),
    keyEnvVar: values['key-env-var'],
  });

  console.log(
    `Enrollment complete. Stored voiceprint at ${result.voiceprintPath} ` +
      `(frames: ${result.frames}, embedding length: ${result.embeddingLength}).`,
  );
}

if (require.main === module) {
  dotenv.config();
  main().catch((error: unknown) => {
    console.error('[Enroll]', isVoiceError(error) ? `${error.code}: ${error.message}` : error);
    process.exitCode = 1;
  });
}
