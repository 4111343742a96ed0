import type { FrameRead } from './types';

/**
 * Pull-based source of fixed-duration PCM frames.
 *
 * A source is opened for one recording attempt and closed afterwards; read() resolves
 * with the next frame or rejects with a DeviceError.
 */
export interface AudioFrameSource {
  open(): Promise<void>;
  read(): Promise<FrameRead>;
  close(): Promise<void>;
}

export type FrameSourceFactory = () => AudioFrameSource;
