/**
 * Capture Types
 */

export type AudioFrame = Readonly<{
  // Mono samples in [-1, 1]
  samples: Float32Array;
  sampleRate: number;
  durationMs: number;
}>;

export type GateDecision =
  | 'continue'               // Keep pulling frames
  | 'utterance-complete'     // Speech followed by enough silence
  | 'no-speech-timeout'      // Nothing above threshold within the initial timeout
  | 'max-duration-reached';  // Safety valve, fires even mid-speech

export type SilenceGateState = Readonly<{
  accumulatedMs: number;
  silenceRunMs: number;
  speechDetected: boolean;
}>;

export type GateResult = {
  decision: GateDecision;
  state: SilenceGateState;
  energy: number;
};

export type CompletionReason = 'utterance-complete' | 'max-duration-reached';

export type UtteranceBuffer = Readonly<{
  frames: readonly AudioFrame[];
  sampleRate: number;
  durationMs: number;
  reason: CompletionReason;
}>;

export type FrameRead = {
  frame: AudioFrame;
  // Samples were dropped before this frame was delivered
  overflowed: boolean;
};

export function createFrame(samples: Float32Array, sampleRate: number): AudioFrame {
  return Object.freeze({
    samples,
    sampleRate,
    durationMs: (samples.length / sampleRate) * 1000,
  });
}

export function concatFrames(utterance: UtteranceBuffer): Float32Array {
  const total = utterance.frames.reduce((sum, frame) => sum + frame.samples.length, 0);
  const out = new Float32Array(total);
  let offset = 0;
  for (const frame of utterance.frames) {
    out.set(frame.samples, offset);
    offset += frame.samples.length;
  }
  return out;
}
