/**
 * Gemini transcription
 * Sends the captured command as inline WAV to Gemini and asks for a JSON transcript with a
 * self-reported confidence.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { ConfigMissingError } from '../errors';
import { createLogger, type Logger } from '../log';
import type { AudioFrame } from '../wake/types';
import { pcmToWav } from './wav';
import { clampConfidence, type BackendTranscription, type TranscriptionBackend } from './types';

const TRANSCRIBE_PROMPT =
  'Transcribe the spoken words in this audio exactly. Reply with JSON of the form ' +
  '{"text": string, "confidence": number} where confidence is between 0 and 1. ' +
  'Use an empty string when nothing is said.';

export interface GeminiBackendOptions {
  apiKey?: string;
  model: string;
}

export const DEFAULT_GEMINI_OPTIONS: GeminiBackendOptions = {
  model: 'gemini-2.5-flash',
};

export function parseGeminiTranscript(raw: string): BackendTranscription {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    return { text: '', confidence: 0 };
  }

  const text = 'text' in parsed && typeof parsed.text === 'string' ? parsed.text.trim() : '';
  const confidence = 'confidence' in parsed && typeof parsed.confidence === 'number' ? parsed.confidence : 0;
  return { text, confidence: text ? clampConfidence(confidence) : 0 };
}

export class GeminiBackend implements TranscriptionBackend {
  readonly id = 'cloud_gemini';
  readonly displayName = 'Gemini';
  private genAI: GoogleGenerativeAI;
  private options: GeminiBackendOptions;

  constructor(options: Partial<GeminiBackendOptions> = {}, private logger: Logger = createLogger('GeminiBackend')) {
    this.options = { ...DEFAULT_GEMINI_OPTIONS, ...options };
    if (!this.options.apiKey) {
      throw new ConfigMissingError('geminiApiKey', 'set GEMINI_API_KEY');
    }
    this.genAI = new GoogleGenerativeAI(this.options.apiKey);
  }

  async transcribe(frames: readonly AudioFrame[], sampleRate: number): Promise<BackendTranscription> {
    const wavAudio = pcmToWav(Buffer.concat(frames), sampleRate);
    this.logger.debug(`Sending ${wavAudio.length} bytes of WAV audio`);

    const model = this.genAI.getGenerativeModel({
      model: this.options.model,
      generationConfig: { responseMimeType: 'application/json' },
    });

    const result = await model.generateContent([
      { inlineData: { mimeType: 'audio/wav', data: wavAudio.toString('base64') } },
      { text: TRANSCRIBE_PROMPT },
    ]);

    return parseGeminiTranscript(result.response.text());
  }

  dispose(): void {
    // HTTP client holds no open connections
  }
}
