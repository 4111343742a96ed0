/**
 * Service configuration
 * Everything is fixed at process start: defaults below, overridden by environment
 * variables (loaded from .env by main.ts).
 */

import { ConfigError } from './errors';

export type Language = {
  displayName: string;
  code: string;
  abbreviation: string;
};

export type TranscriptionProvider = 'google-speech' | 'gemini' | 'whisper-cli';

export const TRANSCRIPTION_PROVIDERS: readonly TranscriptionProvider[] = [
  'google-speech',
  'gemini',
  'whisper-cli',
];

export type AudioConfig = {
  sampleRate: number;
  channels: number;
  // Length of one frame pulled from the device (ms)
  frameDurationMs: number;
  // How long a single read may wait for the device before it counts as broken (ms)
  deviceReadTimeoutMs: number;
  // SoX-family program used by node-record-lpcm16 ('sox', 'rec' or 'arecord')
  recordProgram: string;
  device: string | null;
};

export type GateConfig = {
  // RMS energy below this level = silence
  silenceThreshold: number;
  // Silence after speech before the utterance is complete (ms)
  silenceTimeoutMs: number;
  // Safety limit for one utterance (ms)
  maxRecordDurationMs: number;
  // How long to wait for the first speech (ms)
  initialTimeoutMs: number;
};

export type TranscriptionConfig = {
  provider: TranscriptionProvider;
  geminiApiKey: string | null;
  geminiModel: string;
  whisperBinary: string;
  whisperModel: string;
  whisperThreads: number;
  // Extra recognition hint per language code
  dialectHints: Record<string, string>;
  // Regional BCP-47 code Google Speech expects for each language code
  googleLanguageCodes: Record<string, string>;
};

export type HotkeyConfig = {
  listen: string;
  switchLanguage: string;
};

export type AppConfig = {
  audio: AudioConfig;
  gate: GateConfig;
  languages: Language[];
  transcription: TranscriptionConfig;
  hotkeys: HotkeyConfig;
};

export const DEFAULT_LANGUAGES: Language[] = [
  { displayName: 'English', code: 'en', abbreviation: 'EN' },
  { displayName: 'Arabic (Iraq)', code: 'ar', abbreviation: 'AR' },
];

export const DEFAULT_CONFIG: AppConfig = {
  audio: {
    sampleRate: 16000,
    channels: 1,
    frameDurationMs: 500,
    deviceReadTimeoutMs: 5000,
    recordProgram: 'sox',
    device: null,
  },
  gate: {
    silenceThreshold: 0.003,
    silenceTimeoutMs: 3500,
    maxRecordDurationMs: 120000,
    initialTimeoutMs: 15000,
  },
  languages: DEFAULT_LANGUAGES,
  transcription: {
    provider: 'google-speech',
    geminiApiKey: null,
    geminiModel: 'gemini-2.0-flash',
    whisperBinary: 'whisper-cli',
    whisperModel: 'ggml-medium.bin',
    whisperThreads: 4,
    dialectHints: {
      ar: 'this is arabic language iraqi',
    },
    googleLanguageCodes: {
      en: 'en-US',
      ar: 'ar-IQ',
    },
  },
  hotkeys: {
    listen: 'F9',
    switchLanguage: 'F10',
  },
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function readPositive(env: Env, name: string, fallback: number, integer = true): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(name, raw, integer ? 'a positive integer' : 'a positive number');
  }
  return value;
}

function readProvider(env: Env, fallback: TranscriptionProvider): TranscriptionProvider {
  const raw = readString(env, 'STT_PROVIDER');
  if (raw === undefined) return fallback;

  const provider = TRANSCRIPTION_PROVIDERS.find((p) => p === raw.toLowerCase());
  if (!provider) {
    throw new ConfigError('STT_PROVIDER', raw, `one of ${TRANSCRIPTION_PROVIDERS.join(', ')}`);
  }
  return provider;
}

/**
 * Build the effective configuration from environment variables
 */
export function loadConfig(env: Env = process.env, defaults: AppConfig = DEFAULT_CONFIG): AppConfig {
  const audio: AudioConfig = {
    sampleRate: readPositive(env, 'SAMPLE_RATE', defaults.audio.sampleRate),
    channels: readPositive(env, 'CHANNELS', defaults.audio.channels),
    frameDurationMs: readPositive(env, 'FRAME_DURATION_MS', defaults.audio.frameDurationMs),
    deviceReadTimeoutMs: readPositive(env, 'DEVICE_READ_TIMEOUT_MS', defaults.audio.deviceReadTimeoutMs),
    recordProgram: readString(env, 'RECORD_PROGRAM') ?? defaults.audio.recordProgram,
    device: readString(env, 'AUDIO_DEVICE') ?? defaults.audio.device,
  };

  const gate: GateConfig = {
    silenceThreshold: readPositive(env, 'SILENCE_THRESHOLD', defaults.gate.silenceThreshold, false),
    silenceTimeoutMs: readPositive(env, 'SILENCE_TIMEOUT_MS', defaults.gate.silenceTimeoutMs),
    maxRecordDurationMs: readPositive(env, 'MAX_RECORD_DURATION_MS', defaults.gate.maxRecordDurationMs),
    initialTimeoutMs: readPositive(env, 'INITIAL_TIMEOUT_MS', defaults.gate.initialTimeoutMs),
  };

  const transcription: TranscriptionConfig = {
    ...defaults.transcription,
    provider: readProvider(env, defaults.transcription.provider),
    geminiApiKey: readString(env, 'GEMINI_API_KEY') ?? defaults.transcription.geminiApiKey,
    geminiModel: readString(env, 'GEMINI_MODEL') ?? defaults.transcription.geminiModel,
    whisperBinary: readString(env, 'WHISPER_BIN') ?? defaults.transcription.whisperBinary,
    whisperModel: readString(env, 'WHISPER_MODEL') ?? defaults.transcription.whisperModel,
    whisperThreads: readPositive(env, 'WHISPER_THREADS', defaults.transcription.whisperThreads),
  };

  const hotkeys: HotkeyConfig = {
    listen: readString(env, 'LISTEN_HOTKEY') ?? defaults.hotkeys.listen,
    switchLanguage: readString(env, 'SWITCH_HOTKEY') ?? defaults.hotkeys.switchLanguage,
  };

  return { audio, gate, languages: defaults.languages, transcription, hotkeys };
}
