import { execFile } from 'child_process';
import { createHash } from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigMissingError, InvalidInputError } from '../errors';
import { pcmToWav } from '../transcription/wav';
import type { AudioFrame } from '../wake/types';

export type Embedding = number[];

export interface EmbeddingModel {
  readonly id: string;
  embed(frames: readonly AudioFrame[], sampleRate: number): Promise<Embedding>;
}

const SHA256_BYTES = 32;

/**
 * Stand-in speaker embedding: component i is the mean of byte i of each frame's SHA-256 digest.
 * Identical audio always maps to the same vector; it carries no acoustic meaning.
 */
export class HashEmbeddingModel implements EmbeddingModel {
  readonly id = 'hash';

  constructor(readonly length = SHA256_BYTES) {
    if (!Number.isInteger(length) || length < 1 || length > SHA256_BYTES) {
      throw new InvalidInputError(`Hash embedding length must be between 1 and ${SHA256_BYTES}`, { length });
    }
  }

  async embed(frames: readonly AudioFrame[]): Promise<Embedding> {
    const accum = new Array<number>(this.length).fill(0);
    if (frames.length === 0) return accum;

    for (const frame of frames) {
      const digest = createHash('sha256').update(frame).digest();
      for (let i = 0; i < this.length; i++) {
        accum[i] += digest[i];
      }
    }
    return accum.map((value) => value / frames.length);
  }
}

const EMBEDDING_TIMEOUT_MS = 30_000;

/**
 * Runs an external speaker-embedding program. The frames are written to a temporary WAV file whose
 * path is appended to `args`; the program must print a JSON array of numbers on stdout.
 */
export class ExecEmbeddingModel implements EmbeddingModel {
  readonly id = 'external-model';

  constructor(
    private command: string,
    private args: string[] = [],
  ) {}

  async embed(frames: readonly AudioFrame[], sampleRate: number): Promise<Embedding> {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'voicegate-embed-'));
    const wavPath = path.join(tmpDir, 'input.wav');

    try {
      fs.writeFileSync(wavPath, pcmToWav(Buffer.concat(frames), sampleRate));

      const stdout = await new Promise<string>((resolve, reject) => {
        execFile(
          this.command,
          [...this.args, wavPath],
          { maxBuffer: 10 * 1024 * 1024, timeout: EMBEDDING_TIMEOUT_MS },
          (err, out) => {
            if (err) reject(err);
            else resolve(out);
          },
        );
      });

      return parseEmbedding(stdout);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  }
}

export function parseEmbedding(raw: string): Embedding {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim());
  } catch {
    throw new InvalidInputError('Embedding output is not valid JSON');
  }

  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new InvalidInputError('Embedding output must be a non-empty JSON array');
  }

  const values: Embedding = [];
  for (const value of parsed) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidInputError('Embedding output contains a non-numeric value');
    }
    values.push(value);
  }
  return values;
}

/**
 * dot(a, b) / (|a| * |b|), or 0 when either vector has zero norm.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new InvalidInputError('Embeddings must have the same length', { left: a.length, right: b.length }, 'verify');
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export type EmbeddingBackend = 'hash' | 'external-model';

export interface EmbeddingSettings {
  embeddingBackend: EmbeddingBackend;
  embeddingLength?: number;
  embeddingCommand?: string;
  embeddingArgs?: string[];
}

export function createEmbeddingModel(settings: EmbeddingSettings): EmbeddingModel {
  if (settings.embeddingBackend === 'hash') {
    return new HashEmbeddingModel(settings.embeddingLength);
  }
  if (!settings.embeddingCommand) {
    throw new ConfigMissingError('embeddingCommand', 'external-model needs VOICEGATE_EMBEDDING_COMMAND');
  }
  return new ExecEmbeddingModel(settings.embeddingCommand, settings.embeddingArgs);
}
