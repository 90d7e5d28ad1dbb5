/**
 * Wake Word Listening Module
 *
 * Turns an unbounded stream of audio frames into verified commands:
 * - Wake word detection per frame (text fallback, caller classifier or Porcupine)
 * - Command capture that stops on sustained silence or a frame ceiling
 * - Speech guardrails before speaker verification
 *
 * Usage:
 * ```
 * import { AudioCapture, ContinuousListener, TextWakeWordDetector } from './wake';
 *
 * const capture = new AudioCapture();
 * capture.start();
 *
 * const listener = new ContinuousListener({
 *   detector: new TextWakeWordDetector('jarvis'),
 *   verifier,
 *   source: capture.frames,
 * });
 *
 * listener.on('statusChange', (status) => console.log('Status:', status));
 * const audio = await listener.listenForCommand();
 * ```
 */

export * from './types';
export * from './audioCapture';
export * from './fileSource';
export * from './frameQueue';
export * from './vad';
export * from './wakeWordDetector';
export * from './continuousListener';
