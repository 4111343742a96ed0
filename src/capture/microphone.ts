/**
 * Microphone Frame Source
 * Captures microphone audio using node-record-lpcm16 (SoX under the hood) and hands it
 * out as fixed-duration float frames.
 */

import { spawn } from 'child_process';
import { record } from 'node-record-lpcm16';
import type { AudioConfig } from '../config';
import { DeviceError } from '../errors';
import type { AudioFrameSource } from './frameSource';
import { createFrame, type FrameRead } from './types';
import { findDataOffset } from './wav';

export type RecordingHandle = {
  stream: () => NodeJS.ReadableStream;
  stop: () => void;
};

export type StartRecording = (config: AudioConfig) => RecordingHandle;

export const startSoxRecording: StartRecording = (config) => {
  const recording = record({
    sampleRate: config.sampleRate,
    channels: config.channels,
    recorder: config.recordProgram,
    audioType: 'raw',
    ...(config.device ? { device: config.device } : {}),
  });

  // Spawn failures (recorder not installed) are otherwise unhandled
  recording.process.on('error', (error) => {
    recording.stream().emit('error', error);
  });

  return recording;
};

// Frames buffered before the oldest audio is dropped
const DEFAULT_MAX_BUFFERED_FRAMES = 20;
// Give up looking for a WAV header after this many bytes
const HEADER_PROBE_LIMIT = 4096;

export class MicrophoneFrameSource implements AudioFrameSource {
  private recording: RecordingHandle | null = null;
  private audioStream: NodeJS.ReadableStream | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private headerChecked = false;
  private overflowed = false;
  private ended = false;
  private failure: DeviceError | null = null;
  private waiter: (() => void) | null = null;

  private readonly samplesPerFrame: number;
  private readonly frameBytes: number;
  private readonly maxPendingBytes: number;

  constructor(
    private readonly config: AudioConfig,
    private readonly startRecording: StartRecording = startSoxRecording,
    maxBufferedFrames = DEFAULT_MAX_BUFFERED_FRAMES
  ) {
    this.samplesPerFrame = Math.round((config.sampleRate * config.frameDurationMs) / 1000);
    this.frameBytes = this.samplesPerFrame * config.channels * 2;
    this.maxPendingBytes = this.frameBytes * maxBufferedFrames;
  }

  async open(): Promise<void> {
    if (this.recording) {
      throw new DeviceError('Microphone is already open');
    }

    console.log(
      `[Microphone] Opening ${this.config.device ?? 'default'} device via ${this.config.recordProgram} ` +
      `(${this.config.sampleRate} Hz, ${this.config.channels} ch)`
    );

    try {
      this.recording = this.startRecording(this.config);
      this.audioStream = this.recording.stream();
    } catch (error) {
      this.recording = null;
      throw new DeviceError('Failed to start microphone recording', error);
    }

    this.audioStream.on('data', (chunk: Buffer) => this.onData(chunk));

    this.audioStream.on('error', (error: unknown) => {
      console.error('[Microphone] Stream error:', error);
      this.failure = new DeviceError('Microphone stream failed', error);
      this.wake();
    });

    this.audioStream.on('end', () => {
      this.ended = true;
      this.wake();
    });
  }

  async read(): Promise<FrameRead> {
    while (this.pending.length < this.frameBytes) {
      if (this.failure) throw this.failure;
      if (this.ended) throw new DeviceError('Microphone stream ended unexpectedly');
      if (!this.recording) throw new DeviceError('Microphone is not open');
      await this.waitForData();
    }

    const bytes = this.pending.subarray(0, this.frameBytes);
    this.pending = this.pending.subarray(this.frameBytes);

    const overflowed = this.overflowed;
    this.overflowed = false;

    return { frame: createFrame(this.toMono(bytes), this.config.sampleRate), overflowed };
  }

  async close(): Promise<void> {
    if (this.audioStream) {
      this.audioStream.removeAllListeners();
      this.audioStream = null;
    }

    if (this.recording) {
      try {
        this.recording.stop();
      } catch (error) {
        console.error('[Microphone] Error stopping recorder:', error);
      }
      this.recording = null;
      console.log('[Microphone] Closed');
    }

    this.pending = Buffer.alloc(0);
    this.headerChecked = false;
    this.overflowed = false;
    this.ended = false;
    this.failure = null;
    this.wake();
  }

  private onData(chunk: Buffer): void {
    this.pending = this.pending.length ? Buffer.concat([this.pending, chunk]) : chunk;

    if (!this.headerChecked && !this.stripHeader()) return;

    if (this.pending.length > this.maxPendingBytes) {
      // Keep sample alignment when dropping
      const align = this.config.channels * 2;
      const excess = this.pending.length - this.maxPendingBytes;
      const drop = Math.ceil(excess / align) * align;
      this.pending = this.pending.subarray(drop);
      this.overflowed = true;
    }

    this.wake();
  }

  /**
   * Some recorders prepend a WAV header even for piped output. Returns false while
   * more bytes are needed to decide.
   */
  private stripHeader(): boolean {
    if (this.pending.length < 4) return false;

    if (this.pending.toString('ascii', 0, 4) === 'RIFF') {
      const offset = findDataOffset(this.pending);
      if (offset === null) {
        if (this.pending.length < HEADER_PROBE_LIMIT) return false;
        console.warn('[Microphone] Could not find WAV data chunk, treating stream as raw PCM');
      } else {
        this.pending = this.pending.subarray(offset);
      }
    }

    this.headerChecked = true;
    return true;
  }

  private toMono(bytes: Buffer): Float32Array {
    const channels = this.config.channels;
    const samples = new Float32Array(this.samplesPerFrame);
    for (let i = 0; i < this.samplesPerFrame; i++) {
      let sum = 0;
      for (let c = 0; c < channels; c++) {
        sum += bytes.readInt16LE((i * channels + c) * 2);
      }
      // Normalize to -1 to 1
      samples[i] = sum / channels / 32768;
    }
    return samples;
  }

  private waitForData(): Promise<void> {
    const timeoutMs = this.config.deviceReadTimeoutMs;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new DeviceError(`No audio from microphone within ${timeoutMs}ms`));
      }, timeoutMs);

      this.waiter = () => {
        clearTimeout(timer);
        this.waiter = null;
        resolve();
      };
    });
  }

  private wake(): void {
    this.waiter?.();
  }
}

/**
 * Check if the recorder program is installed
 */
export async function checkRecorderInstalled(program: string): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = spawn('which', [program]);
    probe.on('close', (code) => {
      resolve(code === 0);
    });
    probe.on('error', () => {
      resolve(false);
    });
  });
}
