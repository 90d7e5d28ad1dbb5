/**
 * Silence detection
 * Energy-based rule used to end command capture and to run the speech guardrails.
 *
 * A frame with a positive, even byte length is read as 16-bit signed little-endian mono PCM and
 * its energy is the mean absolute sample value:
 *
 *   energy = (|s0| + |s1| + ... + |sN-1|) / N
 *
 * The frame is silent when energy < energyThreshold. Frames that cannot be read as PCM
 * (empty or odd length) are silent only when every byte is zero.
 */

import type { AudioFrame } from './types';

export function canDecodePcm16(frame: AudioFrame): boolean {
  return frame.length > 0 && frame.length % 2 === 0;
}

/**
 * Mean absolute amplitude of a 16-bit PCM frame, or null when the frame cannot be decoded.
 */
export function frameEnergy(frame: AudioFrame): number | null {
  if (!canDecodePcm16(frame)) return null;

  let sum = 0;
  const samples = frame.length / 2;
  for (let i = 0; i < frame.length; i += 2) {
    sum += Math.abs(frame.readInt16LE(i));
  }
  return sum / samples;
}

export function isSilentFrame(frame: AudioFrame, energyThreshold: number): boolean {
  const energy = frameEnergy(frame);
  if (energy === null) {
    return !frame.some((byte) => byte !== 0);
  }
  return energy < energyThreshold;
}

/**
 * Tracks the current run of silent frames and the total speech frames across one capture.
 */
export class SilenceTracker {
  private silentRun = 0;
  private speech = 0;
  private total = 0;

  constructor(private readonly energyThreshold: number) {}

  /**
   * Feed one frame. Returns true when the frame was silent.
   */
  process(frame: AudioFrame): boolean {
    this.total++;
    const silent = isSilentFrame(frame, this.energyThreshold);
    if (silent) {
      this.silentRun++;
    } else {
      this.silentRun = 0;
      this.speech++;
    }
    return silent;
  }

  get consecutiveSilentFrames(): number {
    return this.silentRun;
  }

  get speechFrames(): number {
    return this.speech;
  }

  get frames(): number {
    return this.total;
  }

  /**
   * Start a new silent run without forgetting the frames already counted.
   */
  clearRun(): void {
    this.silentRun = 0;
  }
}
