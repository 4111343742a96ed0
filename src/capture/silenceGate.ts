/**
 * Silence Gate
 * Energy-based utterance detector. Decides, frame by frame, whether a recording
 * attempt keeps going or ends (speech then silence, no speech at all, or too long).
 *
 * evaluateFrame is pure: all state goes in and comes out, nothing is kept here.
 */

import type { GateConfig } from '../config';
import type { AudioFrame, GateDecision, GateResult, SilenceGateState } from './types';

export function initialGateState(): SilenceGateState {
  return { accumulatedMs: 0, silenceRunMs: 0, speechDetected: false };
}

/**
 * Calculate RMS energy of a frame
 */
export function rmsEnergy(samples: Float32Array): number {
  if (samples.length === 0) return 0;

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}

export function evaluateFrame(
  frame: AudioFrame,
  state: SilenceGateState,
  config: GateConfig
): GateResult {
  const energy = rmsEnergy(frame.samples);
  const accumulatedMs = state.accumulatedMs + frame.durationMs;
  const isSpeech = energy >= config.silenceThreshold;

  const next: SilenceGateState = {
    accumulatedMs,
    silenceRunMs: isSpeech ? 0 : state.silenceRunMs + frame.durationMs,
    speechDetected: state.speechDetected || isSpeech,
  };

  return { decision: decide(next, config), state: next, energy };
}

function decide(state: SilenceGateState, config: GateConfig): GateDecision {
  if (!state.speechDetected && state.accumulatedMs >= config.initialTimeoutMs) {
    return 'no-speech-timeout';
  }
  if (state.speechDetected && state.silenceRunMs >= config.silenceTimeoutMs) {
    return 'utterance-complete';
  }
  if (state.accumulatedMs >= config.maxRecordDurationMs) {
    return 'max-duration-reached';
  }
  return 'continue';
}

export function isTerminal(decision: GateDecision): decision is Exclude<GateDecision, 'continue'> {
  return decision !== 'continue';
}
