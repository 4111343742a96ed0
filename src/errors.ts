export class VoicePasteError extends Error {
  constructor(message: string, public readonly code: string, public readonly details?: unknown) {
    super(message);
    this.name = 'VoicePasteError';
  }
}

export class NoSpeechDetectedError extends VoicePasteError {
  constructor(waitedMs: number) {
    super(
      `No speech detected within ${(waitedMs / 1000).toFixed(1)}s.`,
      'NO_SPEECH',
      { waitedMs }
    );
    this.name = 'NoSpeechDetectedError';
  }
}

export class DeviceError extends VoicePasteError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'DEVICE_ERROR', { originalError });
    this.name = 'DeviceError';
  }
}

export class TranscriptionFailureError extends VoicePasteError {
  constructor(provider: string, originalError: unknown) {
    super(
      `Transcription via ${provider} failed: ${describeError(originalError)}`,
      'TRANSCRIPTION_FAILED',
      { provider, originalError }
    );
    this.name = 'TranscriptionFailureError';
  }
}

export class ModelLoadError extends VoicePasteError {
  constructor(provider: string, reason: string) {
    super(`Failed to load ${provider}: ${reason}`, 'MODEL_LOAD_FAILED', { provider });
    this.name = 'ModelLoadError';
  }
}

export class ConfigError extends VoicePasteError {
  constructor(variable: string, value: string, expected: string) {
    super(`Invalid ${variable}="${value}": expected ${expected}.`, 'INVALID_CONFIG', { variable, value });
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
