/**
 * Pipeline configuration
 * One explicit object selects every backend; nothing reads the environment behind the caller's back.
 * `loadConfig` is the only place environment variables are mapped in.
 */

import { ConfigMissingError, InvalidInputError } from './errors';
import type { RemoteBackendKind } from './transcription/types';
import { DEFAULT_LISTENER_CONFIG, type ListenerConfig } from './wake/types';
import type { WakeBackend, WakeClassifier } from './wake/wakeWordDetector';
import type { EmbeddingBackend } from './voice/embedding';

export type PipelineConfig = ListenerConfig & {
  // Wake detection
  wakeWord: string;
  wakeBackend: WakeBackend;
  wakeClassifier?: WakeClassifier;
  porcupineAccessKey?: string;
  porcupineKeyword?: string;
  porcupineSensitivity: number;
  // Speaker verification
  embeddingBackend: EmbeddingBackend;
  embeddingLength: number;
  embeddingCommand?: string;
  embeddingArgs: string[];
  voiceprintPath: string;
  voiceprintSecret?: string;
  verificationThreshold: number;
  // Audio
  frameSamples: number;
  // Transcription
  confidenceThreshold: number;
  streamTimeoutMs: number;
  language: string;
  whisperBinary?: string;
  whisperModel?: string;
  remoteBackend: RemoteBackendKind;
  remoteEndpoint?: string;
  googleApiKey?: string;
  geminiApiKey?: string;
};

export const DEFAULT_CONFIG: PipelineConfig = {
  ...DEFAULT_LISTENER_CONFIG,
  wakeWord: 'jarvis',
  wakeBackend: 'fallback',
  porcupineSensitivity: 0.5,
  embeddingBackend: 'hash',
  embeddingLength: 32,
  embeddingArgs: [],
  voiceprintPath: './owner.voiceprint',
  verificationThreshold: 0.8,
  frameSamples: 1024,
  confidenceThreshold: 0.7,
  streamTimeoutMs: 5000,
  language: 'en',
  remoteBackend: 'google-speech',
};

const WAKE_BACKENDS: readonly WakeBackend[] = ['fallback', 'external-detector'];
const EMBEDDING_BACKENDS: readonly EmbeddingBackend[] = ['hash', 'external-model'];
const REMOTE_BACKENDS: readonly RemoteBackendKind[] = ['google-speech', 'gemini', 'none'];

function oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new InvalidInputError(`${name} must be one of ${allowed.join(', ')}`, { name, value }, 'config');
  }
  return match;
}

export function numberFrom(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidInputError(`${name} must be a number`, { name, value }, 'config');
  }
  return parsed;
}

export function positiveInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = numberFrom(name, value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidInputError(`${name} must be a positive integer`, { name, value }, 'config');
  }
  return parsed;
}

/**
 * Map environment variables onto a config object. Only variables that are set override the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const fromEnv: Partial<PipelineConfig> = {};
  const str = (key: string) => {
    const value = env[key];
    return value === undefined || value === '' ? undefined : value;
  };
  const num = (key: string) => {
    const value = str(key);
    return value === undefined ? undefined : numberFrom(key, value);
  };

  const wakeBackend = str('VOICEGATE_WAKE_BACKEND');
  const embeddingBackend = str('VOICEGATE_EMBEDDING_BACKEND');
  const remoteBackend = str('VOICEGATE_REMOTE_BACKEND');
  const embeddingArgs = str('VOICEGATE_EMBEDDING_ARGS');

  if (wakeBackend) fromEnv.wakeBackend = oneOf('VOICEGATE_WAKE_BACKEND', wakeBackend, WAKE_BACKENDS);
  if (embeddingBackend) fromEnv.embeddingBackend = oneOf('VOICEGATE_EMBEDDING_BACKEND', embeddingBackend, EMBEDDING_BACKENDS);
  if (remoteBackend) fromEnv.remoteBackend = oneOf('VOICEGATE_REMOTE_BACKEND', remoteBackend, REMOTE_BACKENDS);
  if (embeddingArgs) fromEnv.embeddingArgs = embeddingArgs.split(/\s+/).filter(Boolean);

  const strings = {
    wakeWord: str('VOICEGATE_WAKE_WORD'),
    porcupineAccessKey: str('PICOVOICE_ACCESS_KEY'),
    porcupineKeyword: str('VOICEGATE_PORCUPINE_KEYWORD'),
    embeddingCommand: str('VOICEGATE_EMBEDDING_COMMAND'),
    voiceprintPath: str('VOICEGATE_VOICEPRINT_PATH'),
    voiceprintSecret: str('VOICEPRINT_KEY'),
    language: str('VOICEGATE_LANGUAGE'),
    whisperBinary: str('VOICEGATE_WHISPER_BINARY'),
    whisperModel: str('VOICEGATE_WHISPER_MODEL'),
    remoteEndpoint: str('VOICEGATE_REMOTE_ENDPOINT'),
    googleApiKey: str('GOOGLE_API_KEY'),
    geminiApiKey: str('GEMINI_API_KEY'),
  };
  const numbers = {
    porcupineSensitivity: num('VOICEGATE_PORCUPINE_SENSITIVITY'),
    embeddingLength: num('VOICEGATE_EMBEDDING_LENGTH'),
    verificationThreshold: num('VOICEGATE_VERIFICATION_THRESHOLD'),
    sampleRate: num('VOICEGATE_SAMPLE_RATE'),
    frameSamples: num('VOICEGATE_FRAME_SAMPLES'),
    maxCommandSeconds: num('VOICEGATE_MAX_COMMAND_SECONDS'),
    silenceAfterFrames: num('VOICEGATE_SILENCE_AFTER_FRAMES'),
    energyThreshold: num('VOICEGATE_ENERGY_THRESHOLD'),
    minCommandFrames: num('VOICEGATE_MIN_COMMAND_FRAMES'),
    minSpeechFrames: num('VOICEGATE_MIN_SPEECH_FRAMES'),
    confidenceThreshold: num('VOICEGATE_CONFIDENCE_THRESHOLD'),
    streamTimeoutMs: num('VOICEGATE_STREAM_TIMEOUT_MS'),
  };

  for (const [key, value] of Object.entries({ ...strings, ...numbers })) {
    if (value !== undefined) Object.assign(fromEnv, { [key]: value });
  }

  return { ...DEFAULT_CONFIG, ...fromEnv, ...overrides };
}

export interface EnvCheck {
  present: string[];
  missing: string[];
  ok: boolean;
}

export function auditEnvironment(required: Iterable<string>, env: NodeJS.ProcessEnv = process.env): EnvCheck {
  const present: string[] = [];
  const missing: string[] = [];
  for (const name of required) {
    if (env[name]) present.push(name);
    else missing.push(name);
  }
  return { present, missing, ok: missing.length === 0 };
}

export function assertEnvironment(required: Iterable<string>, env: NodeJS.ProcessEnv = process.env): void {
  const check = auditEnvironment(required, env);
  if (!check.ok) {
    throw new ConfigMissingError(check.missing.join(', '), 'missing environment variables');
  }
}
