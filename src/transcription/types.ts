import type { AudioFrame } from '../wake/types';

export interface BackendTranscription {
  text: string;
  // 0..1
  confidence: number;
}

export interface TranscriptionBackend {
  /** Tag reported as the result source, e.g. "local_whisper" */
  readonly id: string;
  readonly displayName: string;
  transcribe(frames: readonly AudioFrame[], sampleRate: number): Promise<BackendTranscription>;
  dispose(): void | Promise<void>;
}

export interface TranscriptionResult {
  text: string;
  confidence: number;
  source: string;
  latencyMs?: number;
}

export type RemoteBackendKind = 'google-speech' | 'gemini' | 'none';

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
