import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { encodeWav } from "../../src/capture/wav";
import { ModelLoadError } from "../../src/errors";
import { buildTranscriptionPrompt, GeminiTranscriber } from "../../src/transcription/gemini";

const { constructed, getGenerativeModel, generateContent } = vi.hoisted(() => ({
  constructed: vi.fn(),
  getGenerativeModel: vi.fn(),
  generateContent: vi.fn(),
}));

vi.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: class {
    constructor(apiKey: string) {
      constructed(apiKey);
    }
    getGenerativeModel(params: unknown) {
      return getGenerativeModel(params);
    }
  },
}));

describe("buildTranscriptionPrompt", () => {
  it("names the language", () => {
    expect(buildTranscriptionPrompt("en")).toBe(
      'Transcribe this audio to text. The speaker is using the language with code "en".\n' +
        "Only return the transcribed text, nothing else. If nobody speaks, return nothing."
    );
  });

  it("adds the dialect hint as context", () => {
    expect(buildTranscriptionPrompt("ar", "this is arabic language iraqi").split("\n")[1]).toBe(
      "Context: this is arabic language iraqi."
    );
  });
});

describe("GeminiTranscriber", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    constructed.mockReset();
    generateContent.mockReset();
    getGenerativeModel.mockReset();
    getGenerativeModel.mockReturnValue({ generateContent });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("needs an API key to load", async () => {
    const transcriber = new GeminiTranscriber(null, "gemini-test");

    await expect(transcriber.initialize()).rejects.toBeInstanceOf(ModelLoadError);
    expect(constructed).not.toHaveBeenCalled();
  });

  it("creates the model from the configured name", async () => {
    await new GeminiTranscriber("test-key", "gemini-test").initialize();

    expect(constructed).toHaveBeenCalledWith("test-key");
    expect(getGenerativeModel).toHaveBeenCalledWith({ model: "gemini-test" });
  });

  it("sends the utterance as inline WAV with the prompt", async () => {
    generateContent.mockResolvedValueOnce({ response: { text: () => "hello there" } });
    const transcriber = new GeminiTranscriber("test-key", "gemini-test");
    await transcriber.initialize();
    const samples = new Float32Array([0, 0.5, -0.5, 0.25]);

    const segments = await transcriber.transcribe({
      samples,
      sampleRate: 16000,
      languageCode: "ar",
      dialectHint: "this is arabic language iraqi",
    });

    expect(segments).toEqual([{ text: "hello there" }]);
    expect(generateContent).toHaveBeenCalledWith([
      { inlineData: { mimeType: "audio/wav", data: encodeWav(samples, 16000).toString("base64") } },
      buildTranscriptionPrompt("ar", "this is arabic language iraqi"),
    ]);
  });

  it("wraps API errors", async () => {
    generateContent.mockRejectedValueOnce(new Error("quota exceeded"));
    const transcriber = new GeminiTranscriber("test-key", "gemini-test");
    await transcriber.initialize();

    await expect(
      transcriber.transcribe({ samples: new Float32Array(4), sampleRate: 16000, languageCode: "en" })
    ).rejects.toThrow("Transcription via Gemini failed: quota exceeded");
  });

  it("refuses to transcribe before initialize", async () => {
    const transcriber = new GeminiTranscriber("test-key", "gemini-test");

    await expect(
      transcriber.transcribe({ samples: new Float32Array(4), sampleRate: 16000, languageCode: "en" })
    ).rejects.toThrow("Transcription via Gemini failed: Not initialized. Call initialize() first.");
  });
});
