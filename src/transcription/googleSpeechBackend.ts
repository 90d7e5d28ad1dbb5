/**
 * Google Cloud Speech-to-Text, one-shot recognition of a captured command.
 */

import { SpeechClient, protos } from '@google-cloud/speech';
import { createLogger, type Logger } from '../log';
import type { AudioFrame } from '../wake/types';
import { clampConfidence, type BackendTranscription, type TranscriptionBackend } from './types';

type IRecognizeResponse = protos.google.cloud.speech.v1.IRecognizeResponse;

export interface GoogleSpeechBackendOptions {
  languageCode: string;
  // Overrides the default speech.googleapis.com endpoint
  apiEndpoint?: string;
  apiKey?: string;
  enableAutomaticPunctuation: boolean;
}

export const DEFAULT_GOOGLE_SPEECH_OPTIONS: GoogleSpeechBackendOptions = {
  languageCode: 'en-US',
  enableAutomaticPunctuation: true,
};

export function summarizeRecognition(response: IRecognizeResponse): BackendTranscription {
  const texts: string[] = [];
  const confidences: number[] = [];

  for (const result of response.results ?? []) {
    const best = result.alternatives?.[0];
    if (!best) continue;
    texts.push((best.transcript ?? '').trim());
    confidences.push(best.confidence ?? 0);
  }

  const confidence = confidences.length === 0 ? 0 : confidences.reduce((a, b) => a + b, 0) / confidences.length;
  return {
    text: texts.filter(Boolean).join(' '),
    confidence: clampConfidence(confidence),
  };
}

export class GoogleSpeechBackend implements TranscriptionBackend {
  readonly id = 'cloud_google';
  readonly displayName = 'Google Speech-to-Text';
  private client: SpeechClient | null = null;
  private options: GoogleSpeechBackendOptions;

  constructor(options: Partial<GoogleSpeechBackendOptions> = {}, private logger: Logger = createLogger('GoogleSpeech')) {
    this.options = { ...DEFAULT_GOOGLE_SPEECH_OPTIONS, ...options };
  }

  private getClient(): SpeechClient {
    if (!this.client) {
      const { apiEndpoint, apiKey } = this.options;
      this.client = new SpeechClient({
        ...(apiEndpoint ? { apiEndpoint } : {}),
        ...(apiKey ? { apiKey } : {}),
      });
      this.logger.info(`Initialized ${apiKey ? 'with API key' : 'with default credentials'}${apiEndpoint ? ` at ${apiEndpoint}` : ''}`);
    }
    return this.client;
  }

  async transcribe(frames: readonly AudioFrame[], sampleRate: number): Promise<BackendTranscription> {
    const [response] = await this.getClient().recognize({
      config: {
        encoding: protos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding.LINEAR16,
        sampleRateHertz: sampleRate,
        languageCode: this.options.languageCode,
        enableAutomaticPunctuation: this.options.enableAutomaticPunctuation,
      },
      audio: { content: Buffer.concat(frames).toString('base64') },
    });

    const result = summarizeRecognition(response);
    this.logger.debug(`Transcript received (confidence ${result.confidence.toFixed(2)})`);
    return result;
  }

  async dispose(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
    }
  }
}
