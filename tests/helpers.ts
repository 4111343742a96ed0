import type { AudioFrameSource } from "../src/capture/frameSource";
import { createFrame, type AudioFrame, type FrameRead } from "../src/capture/types";
import type { GateConfig } from "../src/config";
import { DeviceError } from "../src/errors";

// 8 samples at 16 Hz = 500 ms per frame, small enough to reason about by hand
export const TEST_SAMPLE_RATE = 16;

export const GATE: GateConfig = {
  silenceThreshold: 0.003,
  silenceTimeoutMs: 3500,
  maxRecordDurationMs: 120000,
  initialTimeoutMs: 15000,
};

export const SPEECH = 0.01;
export const SILENCE = 0.0001;

/**
 * A frame whose RMS energy equals |amplitude|
 */
export function constantFrame(amplitude: number, durationMs = 500): AudioFrame {
  const count = (TEST_SAMPLE_RATE * durationMs) / 1000;
  return createFrame(new Float32Array(count).fill(amplitude), TEST_SAMPLE_RATE);
}

export function frames(amplitude: number, count: number): AudioFrame[] {
  return Array.from({ length: count }, () => constantFrame(amplitude));
}

export type ScriptStep = AudioFrame | FrameRead | Error;

/**
 * Plays back a fixed list of frames (or errors), then fails like a dead device.
 */
export class ScriptedFrameSource implements AudioFrameSource {
  opened = 0;
  closed = 0;
  reads = 0;
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[], private readonly openError?: Error) {
    this.steps = [...steps];
  }

  async open(): Promise<void> {
    if (this.openError) throw this.openError;
    this.opened++;
  }

  async read(): Promise<FrameRead> {
    this.reads++;
    const step = this.steps.shift();
    if (!step) throw new DeviceError("Script exhausted");
    if (step instanceof Error) throw step;
    return "frame" in step ? step : { frame: step, overflowed: false };
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
