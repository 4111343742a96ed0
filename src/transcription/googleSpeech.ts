/**
 * Google Cloud Speech-to-Text (batch recognition)
 * One utterance per request, sent as a LINEAR16 WAV.
 */

import { SpeechClient } from '@google-cloud/speech';
import type { protos } from '@google-cloud/speech';
import { encodeWav } from '../capture/wav';
import { describeError, ModelLoadError, TranscriptionFailureError } from '../errors';
import type { TranscriptionRequest, TranscriptionService, TranscriptSegment } from './types';

type IRecognizeRequest = protos.google.cloud.speech.v1.IRecognizeRequest;

export class GoogleSpeechTranscriber implements TranscriptionService {
  readonly name = 'Google Speech-to-Text';
  private client: SpeechClient | null = null;

  constructor(
    private readonly apiKey: string | null,
    private readonly languageCodes: Record<string, string> = {}
  ) {}

  async initialize(): Promise<void> {
    console.log('[GoogleSpeech] Initializing...');
    try {
      if (this.apiKey) {
        this.client = new SpeechClient({ apiKey: this.apiKey });
        console.log('[GoogleSpeech] ✓ Initialized with API key');
      } else {
        this.client = new SpeechClient();
        console.log('[GoogleSpeech] ✓ Initialized with default credentials');
      }
      await this.client.initialize();
    } catch (error) {
      this.client = null;
      throw new ModelLoadError(this.name, describeError(error));
    }
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptSegment[]> {
    if (!this.client) {
      throw new TranscriptionFailureError(this.name, new Error('Not initialized. Call initialize() first.'));
    }

    const wav = encodeWav(request.samples, request.sampleRate);
    const recognizeRequest: IRecognizeRequest = {
      config: {
        encoding: 'LINEAR16',
        sampleRateHertz: request.sampleRate,
        languageCode: this.languageCodes[request.languageCode] ?? request.languageCode,
        enableAutomaticPunctuation: true,
        ...(request.dialectHint ? { speechContexts: [{ phrases: [request.dialectHint] }] } : {}),
      },
      audio: { content: wav.toString('base64') },
    };

    try {
      const [response] = await this.client.recognize(recognizeRequest);
      return (response.results ?? [])
        .map((result) => ({ text: result.alternatives?.[0]?.transcript ?? '' }))
        .filter((segment) => segment.text.trim().length > 0);
    } catch (error) {
      throw new TranscriptionFailureError(this.name, error);
    }
  }
}
