/**
 * Waveform bar animation
 * Heights are half-heights in pixels of the original pill design (2 = flat, up to 16).
 */

export const BAR_COUNT = 20;
export const FLAT_HEIGHT = 2;
export const MAX_HEIGHT = 16;

// Phase advance per animation frame
export const LOADING_STEP = 0.15;
export const LISTENING_STEP = 0.4;

export function flatBars(count = BAR_COUNT): number[] {
  return new Array<number>(count).fill(FLAT_HEIGHT);
}

/**
 * Slow travelling sine while the model loads
 */
export function loadingBars(phase: number, count = BAR_COUNT): number[] {
  const bars: number[] = [];
  for (let i = 0; i < count; i++) {
    bars.push((Math.sin(phase * 2 - i * 0.35) * 0.5 + 0.5) * 12 + 2);
  }
  return bars;
}

/**
 * Jittery bars while listening
 */
export function listeningBars(phase: number, random: () => number, count = BAR_COUNT): number[] {
  const bars: number[] = [];
  for (let i = 0; i < count; i++) {
    bars.push(Math.abs(Math.sin(phase + i * 0.5) * 8) + random() * 6 + 2);
  }
  return bars;
}

export function loadingCaption(phase: number): string {
  return `Loading AI${'.'.repeat(Math.floor(phase * 2) % 4)}`;
}
