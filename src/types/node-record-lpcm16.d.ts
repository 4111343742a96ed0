// node-record-lpcm16 ships no typings
declare module 'node-record-lpcm16' {
  import type { ChildProcess } from 'child_process';

  export type RecordOptions = {
    sampleRate?: number;
    channels?: number;
    compress?: boolean;
    threshold?: number;
    thresholdStart?: number | null;
    thresholdEnd?: number | null;
    silence?: string;
    recorder?: string;
    endOnSilence?: boolean;
    audioType?: string;
    device?: string | null;
  };

  export interface Recording {
    process: ChildProcess;
    stream(): NodeJS.ReadableStream;
    stop(): void;
    pause(): void;
    resume(): void;
    isPaused(): boolean;
  }

  export function record(options?: RecordOptions): Recording;
}
