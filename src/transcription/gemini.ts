/**
 * Gemini transcription
 * Sends the utterance as an inline WAV part and asks for a verbatim transcript.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { encodeWav } from '../capture/wav';
import { ModelLoadError, TranscriptionFailureError } from '../errors';
import type { TranscriptionRequest, TranscriptionService, TranscriptSegment } from './types';

export function buildTranscriptionPrompt(languageCode: string, dialectHint?: string): string {
  const lines = [
    `Transcribe this audio to text. The speaker is using the language with code "${languageCode}".`,
  ];
  if (dialectHint) {
    lines.push(`Context: ${dialectHint}.`);
  }
  lines.push('Only return the transcribed text, nothing else. If nobody speaks, return nothing.');
  return lines.join('\n');
}

export class GeminiTranscriber implements TranscriptionService {
  readonly name = 'Gemini';
  private model: GenerativeModel | null = null;

  constructor(
    private readonly apiKey: string | null,
    private readonly modelName: string
  ) {}

  async initialize(): Promise<void> {
    if (!this.apiKey) {
      throw new ModelLoadError(
        this.name,
        'GEMINI_API_KEY not found in environment variables. Please add it to your .env file.'
      );
    }

    const genAI = new GoogleGenerativeAI(this.apiKey);
    this.model = genAI.getGenerativeModel({ model: this.modelName });
    console.log(`[Gemini] ✓ Using model ${this.modelName}`);
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptSegment[]> {
    if (!this.model) {
      throw new TranscriptionFailureError(this.name, new Error('Not initialized. Call initialize() first.'));
    }

    const wav = encodeWav(request.samples, request.sampleRate);
    console.log(`[Gemini] Sending ${wav.length} bytes of WAV audio...`);

    try {
      const result = await this.model.generateContent([
        {
          inlineData: {
            mimeType: 'audio/wav',
            data: wav.toString('base64'),
          },
        },
        buildTranscriptionPrompt(request.languageCode, request.dialectHint),
      ]);
      return [{ text: result.response.text() }];
    } catch (error) {
      throw new TranscriptionFailureError(this.name, error);
    }
  }
}
