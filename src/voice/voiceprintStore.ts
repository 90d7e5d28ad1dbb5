/**
 * Voiceprint Store
 * Persists the owner's embedding at a single path.
 *
 * On-disk format: base64( utf8("v0,v1,...") XOR sha256(secret) ), the key repeating every 32 bytes.
 * This is an obfuscation layer, not authenticated encryption.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import { readFile, rm, writeFile } from 'fs/promises';
import { ConfigMissingError, InvalidInputError, VoiceprintNotFoundError } from '../errors';
import type { Embedding } from './embedding';

export const DEFAULT_KEY_ENV_VAR = 'VOICEPRINT_KEY';

function xorWithKey(data: Buffer, key: Buffer): Buffer {
  const out = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = data[i] ^ key[i % key.length];
  }
  return out;
}

export function encodeVoiceprint(embedding: readonly number[], key: Buffer): string {
  const raw = Buffer.from(embedding.map((value) => String(value)).join(','), 'utf-8');
  return xorWithKey(raw, key).toString('base64');
}

export function decodeVoiceprint(payload: string, key: Buffer): Embedding {
  const raw = xorWithKey(Buffer.from(payload.trim(), 'base64'), key).toString('utf-8');

  const values: Embedding = [];
  for (const part of raw.split(',')) {
    if (!part) continue;
    const value = Number(part);
    if (!Number.isFinite(value)) {
      throw new InvalidInputError('Stored voiceprint could not be decoded; check the key', undefined, 'store');
    }
    values.push(value);
  }
  return values;
}

export function deriveKey(secret: string): Buffer {
  return createHash('sha256').update(secret, 'utf-8').digest();
}

export class VoiceprintStore {
  private readonly key: Buffer;

  constructor(readonly path: string, secret: string | undefined) {
    if (!secret) {
      throw new ConfigMissingError('voiceprintSecret', `set ${DEFAULT_KEY_ENV_VAR}`);
    }
    this.key = deriveKey(secret);
  }

  static fromEnv(path: string, envVar = DEFAULT_KEY_ENV_VAR, env: NodeJS.ProcessEnv = process.env): VoiceprintStore {
    const secret = env[envVar];
    if (!secret) {
      throw new ConfigMissingError(envVar);
    }
    return new VoiceprintStore(path, secret);
  }

  /**
   * Replace whatever was stored before.
   */
  async save(embedding: readonly number[]): Promise<void> {
    // load() accepts only finite values
    if (!embedding.every(Number.isFinite)) {
      throw new InvalidInputError('Voiceprint values must be finite numbers', undefined, 'store');
    }
    await writeFile(this.path, encodeVoiceprint(embedding, this.key), 'utf-8');
  }

  async load(): Promise<Embedding> {
    let payload: string;
    try {
      payload = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) throw new VoiceprintNotFoundError(this.path);
      throw err;
    }
    return decodeVoiceprint(payload, this.key);
  }

  exists(): boolean {
    return fs.existsSync(this.path);
  }

  async remove(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
