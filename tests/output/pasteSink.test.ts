import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ClipboardPasteSink, type Automation } from "../../src/output/pasteSink";

function fakeAutomation() {
  const calls: string[] = [];
  const automation: Automation = {
    setClipboard: vi.fn(async (text: string) => {
      calls.push(`clipboard:${text}`);
    }),
    pressPaste: vi.fn(async () => {
      calls.push("paste");
    }),
  };
  return { automation, calls };
}

describe("ClipboardPasteSink", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("copies the text with a trailing space, then pastes", async () => {
    const { automation, calls } = fakeAutomation();
    const sink = new ClipboardPasteSink(async () => automation);

    await sink.emit("hello");

    expect(calls).toEqual(["clipboard:hello ", "paste"]);
    expect(console.log).toHaveBeenCalledWith("[Paste] ✓ Pasted 5 characters");
  });

  it("loads the automation backend once", async () => {
    const { automation } = fakeAutomation();
    const load = vi.fn(async () => automation);
    const sink = new ClipboardPasteSink(load);

    await sink.emit("one");
    await sink.emit("two");

    expect(load).toHaveBeenCalledTimes(1);
  });

  it("retries a failed load on the next paste", async () => {
    const { automation, calls } = fakeAutomation();
    const load = vi
      .fn<() => Promise<Automation>>()
      .mockRejectedValueOnce(new Error("libnut not available"))
      .mockResolvedValueOnce(automation);
    const sink = new ClipboardPasteSink(load);

    await expect(sink.emit("first")).rejects.toThrow("libnut not available");
    await sink.emit("second");

    expect(load).toHaveBeenCalledTimes(2);
    expect(calls).toEqual(["clipboard:second ", "paste"]);
  });
});
