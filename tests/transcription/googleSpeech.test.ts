import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { encodeWav } from "../../src/capture/wav";
import { ModelLoadError, TranscriptionFailureError } from "../../src/errors";
import { GoogleSpeechTranscriber } from "../../src/transcription/googleSpeech";

const { constructed, initialize, recognize } = vi.hoisted(() => ({
  constructed: vi.fn(),
  initialize: vi.fn(),
  recognize: vi.fn(),
}));

vi.mock("@google-cloud/speech", () => ({
  SpeechClient: class {
    constructor(options?: unknown) {
      constructed(options);
    }
    initialize() {
      return initialize();
    }
    recognize(request: unknown) {
      return recognize(request);
    }
  },
}));

const samples = new Float32Array([0, 0.25, -0.25, 0.5]);

describe("GoogleSpeechTranscriber", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    constructed.mockReset();
    initialize.mockReset();
    recognize.mockReset();
    initialize.mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the API key when one is configured", async () => {
    await new GoogleSpeechTranscriber("test-key").initialize();

    expect(constructed).toHaveBeenCalledWith({ apiKey: "test-key" });
    expect(initialize).toHaveBeenCalledTimes(1);
  });

  it("falls back to default credentials", async () => {
    await new GoogleSpeechTranscriber(null).initialize();

    expect(constructed).toHaveBeenCalledWith(undefined);
  });

  it("turns client start-up failures into ModelLoadError", async () => {
    initialize.mockRejectedValueOnce(new Error("Could not load the default credentials"));

    const failure = new GoogleSpeechTranscriber(null).initialize();

    await expect(failure).rejects.toBeInstanceOf(ModelLoadError);
    await expect(failure).rejects.toThrow(
      "Failed to load Google Speech-to-Text: Could not load the default credentials"
    );
  });

  it("sends LINEAR16 audio and keeps the first alternative of each result", async () => {
    recognize.mockResolvedValueOnce([
      {
        results: [
          { alternatives: [{ transcript: "hello" }, { transcript: "hollow" }] },
          { alternatives: [{ transcript: "world" }] },
          { alternatives: [] },
          { alternatives: [{ transcript: "  " }] },
        ],
      },
    ]);
    const transcriber = new GoogleSpeechTranscriber("test-key");
    await transcriber.initialize();

    const segments = await transcriber.transcribe({ samples, sampleRate: 16000, languageCode: "en" });

    expect(segments).toEqual([{ text: "hello" }, { text: "world" }]);
    expect(recognize).toHaveBeenCalledWith({
      config: {
        encoding: "LINEAR16",
        sampleRateHertz: 16000,
        languageCode: "en",
        enableAutomaticPunctuation: true,
      },
      audio: { content: encodeWav(samples, 16000).toString("base64") },
    });
  });

  it("passes the dialect hint as a speech context", async () => {
    recognize.mockResolvedValueOnce([{ results: [] }]);
    const transcriber = new GoogleSpeechTranscriber("test-key");
    await transcriber.initialize();

    const segments = await transcriber.transcribe({
      samples,
      sampleRate: 16000,
      languageCode: "ar",
      dialectHint: "this is arabic language iraqi",
    });

    expect(segments).toEqual([]);
    expect(recognize).toHaveBeenCalledWith(
      expect.objectContaining({
        config: expect.objectContaining({ speechContexts: [{ phrases: ["this is arabic language iraqi"] }] }),
      })
    );
  });

  it("sends the regional code configured for the language", async () => {
    recognize.mockResolvedValueOnce([{ results: [] }]);
    const transcriber = new GoogleSpeechTranscriber("test-key", { en: "en-US", ar: "ar-IQ" });
    await transcriber.initialize();

    await transcriber.transcribe({ samples, sampleRate: 16000, languageCode: "ar" });

    expect(recognize).toHaveBeenCalledWith(
      expect.objectContaining({ config: expect.objectContaining({ languageCode: "ar-IQ" }) })
    );
  });

  it("wraps API errors", async () => {
    recognize.mockRejectedValueOnce(new Error("PERMISSION_DENIED"));
    const transcriber = new GoogleSpeechTranscriber("test-key");
    await transcriber.initialize();

    const failure = transcriber.transcribe({ samples, sampleRate: 16000, languageCode: "en" });

    await expect(failure).rejects.toBeInstanceOf(TranscriptionFailureError);
    await expect(failure).rejects.toThrow("Transcription via Google Speech-to-Text failed: PERMISSION_DENIED");
  });
});
