/**
 * Listener Types
 */

/** One producer-defined chunk of raw audio. */
export type AudioFrame = Buffer;

/** Single-pass frame source. Ends by completing, not by throwing. */
export type AudioSource = AsyncIterable<AudioFrame>;

export interface VerifiedAudio {
  readonly frames: readonly AudioFrame[];
  readonly sampleRate: number;
  /** Cosine similarity against the enrolled voiceprint */
  readonly similarity: number;
}

export type ListenerStatus =
  | 'idle'                 // Scanning frames for the wake word
  | 'wake_detected'        // Trigger frame seen
  | 'capturing'            // Collecting command frames
  | 'guardrail_evaluation' // Checking length / speech content
  | 'verifying'            // Comparing against the enrolled voiceprint
  | 'verified'             // Command accepted
  | 'rejected';            // Guardrail or speaker check failed

export type ListenerConfig = {
  sampleRate: number;
  // Hard ceiling on a single command
  maxCommandSeconds: number;
  // Consecutive silent frames that end a capture
  silenceAfterFrames: number;
  // Mean absolute 16-bit amplitude below which a frame is silent
  energyThreshold: number;
  // Guardrails evaluated before verification
  minCommandFrames: number;
  minSpeechFrames: number;
};

export const DEFAULT_LISTENER_CONFIG: ListenerConfig = {
  sampleRate: 16000,
  maxCommandSeconds: 15,
  silenceAfterFrames: 30,
  energyThreshold: 50.0,
  minCommandFrames: 2,
  minSpeechFrames: 2,
};

/** Samples per frame the capture ceiling is computed against. */
export const CEILING_FRAME_SAMPLES = 1024;
