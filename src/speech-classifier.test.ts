// Unit tests for the energy-based speech classifier

import { describe, it, expect } from "vitest";
import { EnergySpeechClassifier, rmsToDbfs } from "./speech-classifier.js";

function constantFrame(amplitude: number, samples = 512): Float32Array {
  return new Float32Array(samples).fill(amplitude);
}

describe("rmsToDbfs", () => {
  it("maps full scale to 0 dBFS", () => {
    expect(rmsToDbfs(1)).toBe(0);
  });

  it("maps 0.1 to -20 dBFS", () => {
    expect(rmsToDbfs(0.1)).toBeCloseTo(-20, 10);
  });

  it("floors digital silence at -200 dBFS", () => {
    expect(rmsToDbfs(0)).toBeCloseTo(-200, 10);
  });
});

describe("EnergySpeechClassifier", () => {
  it("returns 0.5 for a frame at the midpoint level", () => {
    // 0.01 RMS = -40 dBFS, the default midpoint
    const classifier = new EnergySpeechClassifier();
    expect(classifier.score(constantFrame(0.01))).toBeCloseTo(0.5, 3);
  });

  it("scores loud frames near 1 and silence near 0", () => {
    const classifier = new EnergySpeechClassifier();
    expect(classifier.score(constantFrame(0.5))).toBeGreaterThan(0.999);
    expect(classifier.score(constantFrame(0))).toBeLessThan(1e-6);
  });

  it("is monotonic in frame energy", () => {
    const classifier = new EnergySpeechClassifier();
    const levels = [0.0005, 0.002, 0.008, 0.03, 0.1];
    const scores = levels.map((a) => classifier.score(constantFrame(a)));
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThan(scores[i - 1]);
    }
  });

  it("honours a custom midpoint", () => {
    const classifier = new EnergySpeechClassifier({ midpointDb: -20 });
    expect(classifier.score(constantFrame(0.1))).toBeCloseTo(0.5, 3);
  });

  it("infer() resolves to the synchronous score", async () => {
    const classifier = new EnergySpeechClassifier({ slopeDb: 2 });
    const frame = constantFrame(0.02);
    await expect(classifier.infer(frame)).resolves.toBe(classifier.score(frame));
  });

  it("rejects invalid curve parameters", () => {
    expect(() => new EnergySpeechClassifier({ slopeDb: 0 })).toThrow("slopeDb must be a positive number, got 0");
    expect(() => new EnergySpeechClassifier({ midpointDb: Number.NaN })).toThrow("midpointDb must be finite, got NaN");
  });
});
