export * from './errors';
export * from './log';
export * from './metrics';
export * from './config';
export * from './agent';
export * from './wake';
export * from './voice/embedding';
export * from './voice/voiceprintStore';
export * from './voice/speakerVerifier';
export * from './transcription/types';
export * from './transcription/wav';
export * from './transcription/whisperBackend';
export * from './transcription/googleSpeechBackend';
export * from './transcription/geminiBackend';
export * from './transcription/transcriptionRouter';
