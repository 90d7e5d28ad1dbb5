/**
 * Wake Word Detectors
 * Every detector answers one question per frame: was the trigger phrase heard?
 * Detection is frame-local; no state carries over between calls.
 */

import { Porcupine } from '@picovoice/porcupine-node';
import { TextDecoder } from 'util';
import { ConfigMissingError } from '../errors';
import type { AudioFrame } from './types';

export interface WakeWordDetector {
  heard(frame: AudioFrame): boolean;
  dispose?(): void;
}

export type WakeClassifier = (frame: AudioFrame) => boolean;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Treats the frame as text and looks for the wake word in it. Frames that are not valid UTF-8
 * (real PCM audio, mostly) are never a match.
 */
export class TextWakeWordDetector implements WakeWordDetector {
  readonly wakeWord: string;

  constructor(wakeWord: string) {
    this.wakeWord = wakeWord.toLowerCase().trim();
  }

  heard(frame: AudioFrame): boolean {
    let text: string;
    try {
      text = strictUtf8.decode(frame);
    } catch {
      return false;
    }
    return text.toLowerCase().includes(this.wakeWord);
  }
}

/**
 * Delegates to a caller-supplied binary classifier, e.g. a model running elsewhere.
 */
export class ClassifierWakeWordDetector implements WakeWordDetector {
  constructor(private readonly classifier: WakeClassifier) {}

  heard(frame: AudioFrame): boolean {
    return this.classifier(frame);
  }
}

export interface PorcupineDetectorOptions {
  accessKey: string;
  // Built-in keyword name or path to a .ppn keyword file
  keyword: string;
  sensitivity?: number;
}

/**
 * Picovoice Porcupine over 16-bit PCM frames. Each full `frameLength` window inside the frame is
 * checked; trailing samples that do not fill a window are ignored.
 */
export class PorcupineWakeWordDetector implements WakeWordDetector {
  private readonly porcupine: Porcupine;

  constructor(options: PorcupineDetectorOptions) {
    if (!options.accessKey) {
      throw new ConfigMissingError('porcupineAccessKey', 'set PICOVOICE_ACCESS_KEY');
    }
    this.porcupine = new Porcupine(options.accessKey, [options.keyword], [options.sensitivity ?? 0.5]);
  }

  get frameLength(): number {
    return this.porcupine.frameLength;
  }

  heard(frame: AudioFrame): boolean {
    const window = this.porcupine.frameLength;
    const samples = Math.floor(frame.length / 2);

    for (let start = 0; start + window <= samples; start += window) {
      const pcm = new Int16Array(window);
      for (let i = 0; i < window; i++) {
        pcm[i] = frame.readInt16LE((start + i) * 2);
      }
      if (this.porcupine.process(pcm) >= 0) return true;
    }
    return false;
  }

  dispose(): void {
    this.porcupine.release();
  }
}

export type WakeBackend = 'fallback' | 'external-detector';

export interface WakeDetectorSettings {
  wakeWord: string;
  wakeBackend: WakeBackend;
  wakeClassifier?: WakeClassifier;
  porcupineAccessKey?: string;
  porcupineKeyword?: string;
  porcupineSensitivity?: number;
}

export function createWakeWordDetector(settings: WakeDetectorSettings): WakeWordDetector {
  if (settings.wakeBackend === 'fallback') {
    return new TextWakeWordDetector(settings.wakeWord);
  }

  if (settings.wakeClassifier) {
    return new ClassifierWakeWordDetector(settings.wakeClassifier);
  }
  if (settings.porcupineAccessKey) {
    return new PorcupineWakeWordDetector({
      accessKey: settings.porcupineAccessKey,
      keyword: settings.porcupineKeyword ?? settings.wakeWord,
      sensitivity: settings.porcupineSensitivity,
    });
  }
  throw new ConfigMissingError('wakeClassifier', 'external-detector needs a classifier or PICOVOICE_ACCESS_KEY');
}
