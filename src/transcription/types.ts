/**
 * Transcription Types
 */

export type TranscriptionRequest = {
  // Mono float samples of one utterance
  samples: Float32Array;
  sampleRate: number;
  languageCode: string;
  // Recognition hint for a regional variant, only set for some languages
  dialectHint?: string;
};

export type TranscriptSegment = {
  text: string;
};

export interface TranscriptionService {
  readonly name: string;
  // Loads the model / creates the client. Rejects with ModelLoadError.
  initialize(): Promise<void>;
  transcribe(request: TranscriptionRequest): Promise<TranscriptSegment[]>;
}

/**
 * Join segment texts with single spaces
 */
export function joinSegments(segments: readonly TranscriptSegment[]): string {
  return segments
    .map((segment) => segment.text.trim())
    .filter((text) => text.length > 0)
    .join(' ')
    .trim();
}
