import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config";
import { createTranscriptionService, joinSegments } from "../../src/transcription";
import { GeminiTranscriber } from "../../src/transcription/gemini";
import { GoogleSpeechTranscriber } from "../../src/transcription/googleSpeech";
import { WhisperCliTranscriber } from "../../src/transcription/whisperCli";

describe("joinSegments", () => {
  it("trims segments and joins them with single spaces", () => {
    expect(joinSegments([{ text: " hello " }, { text: "" }, { text: "\tworld\n" }])).toBe("hello world");
  });

  it("returns an empty string when nothing was said", () => {
    expect(joinSegments([])).toBe("");
    expect(joinSegments([{ text: "   " }])).toBe("");
  });
});

describe("createTranscriptionService", () => {
  const base = DEFAULT_CONFIG.transcription;

  it("builds the configured provider", () => {
    expect(createTranscriptionService(base)).toBeInstanceOf(GoogleSpeechTranscriber);
    expect(createTranscriptionService({ ...base, provider: "gemini" })).toBeInstanceOf(GeminiTranscriber);
    expect(createTranscriptionService({ ...base, provider: "whisper-cli" })).toBeInstanceOf(WhisperCliTranscriber);
  });
});
