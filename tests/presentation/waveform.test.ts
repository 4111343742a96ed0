import { describe, expect, it } from "vitest";
import {
  BAR_COUNT,
  FLAT_HEIGHT,
  flatBars,
  listeningBars,
  loadingBars,
  loadingCaption,
  MAX_HEIGHT,
} from "../../src/presentation/waveform";

describe("waveform", () => {
  it("draws flat bars at the resting height", () => {
    expect(flatBars()).toEqual(Array(BAR_COUNT).fill(FLAT_HEIGHT));
  });

  it("keeps loading bars within the pill", () => {
    for (const phase of [0, 0.15, 1.2, 7.5]) {
      for (const height of loadingBars(phase)) {
        expect(height).toBeGreaterThanOrEqual(FLAT_HEIGHT);
        expect(height).toBeLessThanOrEqual(14);
      }
    }
  });

  it("starts the loading wave at mid height", () => {
    expect(loadingBars(0)[0]).toBe(8);
  });

  it("adds the random jitter to the listening bars", () => {
    const quiet = listeningBars(0, () => 0);
    const loud = listeningBars(0, () => 1);

    expect(quiet[0]).toBe(2);
    expect(loud[0]).toBe(8);
    expect(Math.max(...loud)).toBeLessThanOrEqual(MAX_HEIGHT);
  });

  it("cycles the loading caption dots", () => {
    expect([0, 0.5, 1, 1.5, 2].map(loadingCaption)).toEqual([
      "Loading AI",
      "Loading AI.",
      "Loading AI..",
      "Loading AI...",
      "Loading AI",
    ]);
  });
});
