import type { TranscriptionConfig } from '../config';
import { GeminiTranscriber } from './gemini';
import { GoogleSpeechTranscriber } from './googleSpeech';
import type { TranscriptionService } from './types';
import { WhisperCliTranscriber } from './whisperCli';

export * from './types';

export function createTranscriptionService(config: TranscriptionConfig): TranscriptionService {
  switch (config.provider) {
    case 'google-speech':
      return new GoogleSpeechTranscriber(config.geminiApiKey, config.googleLanguageCodes);
    case 'gemini':
      return new GeminiTranscriber(config.geminiApiKey, config.geminiModel);
    case 'whisper-cli':
      return new WhisperCliTranscriber({
        binary: config.whisperBinary,
        model: config.whisperModel,
        threads: config.whisperThreads,
      });
  }
}
