/**
 * Utterance Recorder
 * Opens a frame source, feeds every frame through the silence gate and returns
 * one complete utterance, or NoSpeechDetectedError when nobody spoke.
 */

import type { GateConfig } from '../config';
import { NoSpeechDetectedError } from '../errors';
import type { AudioFrameSource, FrameSourceFactory } from './frameSource';
import { evaluateFrame, initialGateState, isTerminal } from './silenceGate';
import type { AudioFrame, UtteranceBuffer } from './types';

export type RecordOutcome =
  | { ok: true; utterance: UtteranceBuffer }
  | { ok: false; error: NoSpeechDetectedError };

export interface Recorder {
  record(): Promise<RecordOutcome>;
}

export class UtteranceRecorder implements Recorder {
  constructor(
    private readonly createSource: FrameSourceFactory,
    private readonly gate: GateConfig
  ) {}

  /**
   * Record until the gate ends the attempt. DeviceError propagates; the source is
   * closed on every path.
   */
  async record(): Promise<RecordOutcome> {
    const source = this.createSource();
    await source.open();
    try {
      console.log('[Recorder] Recording started... Speak now!');
      return await this.capture(source);
    } finally {
      await source.close();
    }
  }

  private async capture(source: AudioFrameSource): Promise<RecordOutcome> {
    const frames: AudioFrame[] = [];
    let state = initialGateState();

    for (;;) {
      const { frame, overflowed } = await source.read();
      if (overflowed) {
        console.warn('[Recorder] Warning: Buffer overflow');
      }

      frames.push(frame);
      const result = evaluateFrame(frame, state, this.gate);
      state = result.state;

      const { decision } = result;
      if (!isTerminal(decision)) continue;

      if (decision === 'no-speech-timeout') {
        // Captured frames are dropped here
        console.log('[Recorder] No speech detected (timeout).');
        return { ok: false, error: new NoSpeechDetectedError(state.accumulatedMs) };
      }

      if (decision === 'utterance-complete') {
        console.log(`[Recorder] Silence detected. Recorded ${formatSeconds(state.accumulatedMs)}.`);
      } else {
        console.log(`[Recorder] Max duration reached (${formatSeconds(this.gate.maxRecordDurationMs)}).`);
      }

      return {
        ok: true,
        utterance: {
          frames,
          sampleRate: frame.sampleRate,
          durationMs: state.accumulatedMs,
          reason: decision,
        },
      };
    }
  }
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
