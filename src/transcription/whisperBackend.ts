import { execFile } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger, type Logger } from '../log';
import type { AudioFrame } from '../wake/types';
import { pcmToWav } from './wav';
import { clampConfidence, type BackendTranscription, type TranscriptionBackend } from './types';

const TRANSCRIPTION_TIMEOUT_MS = 30_000;
const SPECIAL_TOKEN = /^\[_.*_\]$/;

interface WhisperToken {
  text: string;
  p: number;
}

/**
 * Pull text and token probabilities out of whisper.cpp's `-ojf` JSON output.
 */
export function parseWhisperJson(raw: string): BackendTranscription {
  const parsed: unknown = JSON.parse(raw);
  const segments = isRecord(parsed) && Array.isArray(parsed.transcription) ? parsed.transcription : [];

  let text = '';
  const tokens: WhisperToken[] = [];
  for (const segment of segments) {
    if (!isRecord(segment)) continue;
    if (typeof segment.text === 'string') text += segment.text;
    if (!Array.isArray(segment.tokens)) continue;
    for (const token of segment.tokens) {
      if (isRecord(token) && typeof token.text === 'string' && typeof token.p === 'number') {
        tokens.push({ text: token.text, p: token.p });
      }
    }
  }

  const spoken = tokens.filter((token) => !SPECIAL_TOKEN.test(token.text.trim()));
  const confidence = spoken.length === 0 ? 0 : spoken.reduce((sum, token) => sum + token.p, 0) / spoken.length;

  return { text: text.trim(), confidence: clampConfidence(confidence) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Local whisper.cpp transcription. Spawned per call; nothing stays running between calls.
 */
export class WhisperBackend implements TranscriptionBackend {
  readonly id = 'local_whisper';
  readonly displayName = 'Whisper (Local)';

  constructor(
    private binaryPath: string,
    private modelPath: string,
    private language = 'en',
    private logger: Logger = createLogger('WhisperBackend'),
  ) {}

  isAvailable(): boolean {
    return fs.existsSync(this.binaryPath) && fs.existsSync(this.modelPath);
  }

  async transcribe(frames: readonly AudioFrame[], sampleRate: number): Promise<BackendTranscription> {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'whisper-'));
    const wavPath = path.join(tmpDir, 'input.wav');
    const outputPrefix = path.join(tmpDir, 'output');

    try {
      fs.writeFileSync(wavPath, pcmToWav(Buffer.concat(frames), sampleRate));

      const args = [
        '-m', this.modelPath,
        '-f', wavPath,
        '-l', this.language,
        '--no-timestamps',
        '-oj', '-ojf',
        '-of', outputPrefix,
      ];

      await new Promise<void>((resolve, reject) => {
        execFile(this.binaryPath, args, { maxBuffer: 10 * 1024 * 1024, timeout: TRANSCRIPTION_TIMEOUT_MS }, (err) => {
          if (err) {
            this.logger.error('Whisper transcription failed', err.message);
            reject(err);
          } else {
            resolve();
          }
        });
      });

      const result = parseWhisperJson(fs.readFileSync(`${outputPrefix}.json`, 'utf-8'));
      this.logger.debug(`Local transcription confidence ${result.confidence.toFixed(2)}`);
      return result;
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  }

  dispose(): void {
    // Stateless: one process per call
  }
}
