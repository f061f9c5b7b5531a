/**
 * Unit tests for vad-config.ts
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_VAD_CONFIG,
  VAD_PRESETS,
  createVadConfig,
  framesToSeconds,
  isVadPreset,
  loadAppConfig,
  validateEnergyClassifierConfig,
  validateVadConfig,
} from "./vad-config.js";

describe("presets", () => {
  it("defaults to the v5 preset", () => {
    expect(DEFAULT_VAD_CONFIG).toEqual({
      frameSamples: 512,
      sampleRate: 16000,
      positiveSpeechThreshold: 0.5,
      negativeSpeechThreshold: 0.35,
      redemptionFrames: 24,
      preSpeechPadFrames: 30,
      minSpeechFrames: 8,
    });
  });

  it("tunes the legacy preset for 1536-sample frames", () => {
    expect(VAD_PRESETS.legacy).toMatchObject({
      frameSamples: 1536,
      redemptionFrames: 8,
      preSpeechPadFrames: 10,
      minSpeechFrames: 3,
    });
  });

  it("recognises preset names", () => {
    expect(isVadPreset("v5")).toBe(true);
    expect(isVadPreset("legacy")).toBe(true);
    expect(isVadPreset("v4")).toBe(false);
  });
});

describe("validateVadConfig", () => {
  it("accepts every preset", () => {
    expect(validateVadConfig(VAD_PRESETS.v5)).toEqual([]);
    expect(validateVadConfig(VAD_PRESETS.legacy)).toEqual([]);
  });

  it("accepts zero redemption and pre-roll frames", () => {
    expect(validateVadConfig({ ...DEFAULT_VAD_CONFIG, redemptionFrames: 0, preSpeechPadFrames: 0 })).toEqual([]);
  });

  it("accepts equal thresholds", () => {
    expect(
      validateVadConfig({ ...DEFAULT_VAD_CONFIG, positiveSpeechThreshold: 0.4, negativeSpeechThreshold: 0.4 }),
    ).toEqual([]);
  });

  it("reports each violated rule", () => {
    const errors = validateVadConfig({
      frameSamples: 0,
      sampleRate: 16000.5,
      positiveSpeechThreshold: 1.2,
      negativeSpeechThreshold: -0.1,
      redemptionFrames: -1,
      preSpeechPadFrames: 2,
      minSpeechFrames: 0,
    });

    expect(errors).toEqual([
      "frameSamples must be a positive integer, got 0",
      "sampleRate must be a positive integer, got 16000.5",
      "positiveSpeechThreshold must be within [0, 1], got 1.2",
      "negativeSpeechThreshold must be within [0, 1], got -0.1",
      "redemptionFrames must be a non-negative integer, got -1",
      "minSpeechFrames must be a positive integer, got 0",
    ]);
  });

  it("rejects a negative threshold above the positive one", () => {
    const errors = validateVadConfig({
      ...DEFAULT_VAD_CONFIG,
      positiveSpeechThreshold: 0.3,
      negativeSpeechThreshold: 0.6,
    });
    expect(errors).toEqual(["negativeSpeechThreshold (0.6) must not exceed positiveSpeechThreshold (0.3)"]);
  });
});

describe("createVadConfig", () => {
  it("applies overrides on top of the preset and freezes the result", () => {
    const config = createVadConfig({ minSpeechFrames: 4 }, "legacy");
    expect(config.minSpeechFrames).toBe(4);
    expect(config.frameSamples).toBe(1536);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("throws listing the violations", () => {
    expect(() => createVadConfig({ frameSamples: -5 })).toThrow(
      "Invalid VAD configuration: frameSamples must be a positive integer, got -5",
    );
  });
});

describe("framesToSeconds", () => {
  it("converts frame counts using frame size and sample rate", () => {
    expect(framesToSeconds(24, VAD_PRESETS.v5)).toBe(0.768);
    expect(framesToSeconds(8, VAD_PRESETS.legacy)).toBe(0.768);
  });
});

describe("loadAppConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadAppConfig({});
    expect(config).toEqual({
      port: 3000,
      debug: false,
      frameTelemetry: false,
      vad: DEFAULT_VAD_CONFIG,
      energy: { midpointDb: -40, slopeDb: 4 },
    });
  });

  it("reads preset, overrides and flags", () => {
    const config = loadAppConfig({
      PORT: "8080",
      VAD_DEBUG: "true",
      VAD_FRAME_TELEMETRY: "1",
      VAD_PRESET: "legacy",
      VAD_MIN_SPEECH_FRAMES: "5",
      VAD_POSITIVE_THRESHOLD: "0.6",
      VAD_ENERGY_MIDPOINT_DB: "-35",
    });

    expect(config.port).toBe(8080);
    expect(config.debug).toBe(true);
    expect(config.frameTelemetry).toBe(true);
    expect(config.vad.frameSamples).toBe(1536);
    expect(config.vad.minSpeechFrames).toBe(5);
    expect(config.vad.positiveSpeechThreshold).toBe(0.6);
    expect(config.energy).toEqual({ midpointDb: -35, slopeDb: 4 });
  });

  it("treats blank variables as unset", () => {
    const config = loadAppConfig({ VAD_FRAME_SAMPLES: "  ", VAD_PRESET: "" });
    expect(config.vad.frameSamples).toBe(512);
  });

  it("treats unrecognised boolean values as false", () => {
    expect(loadAppConfig({ VAD_DEBUG: "nope" }).debug).toBe(false);
  });

  it("rejects an unknown preset", () => {
    expect(() => loadAppConfig({ VAD_PRESET: "v4" })).toThrow('VAD_PRESET must be "v5" or "legacy", got "v4"');
  });

  it("rejects non-numeric values", () => {
    expect(() => loadAppConfig({ VAD_FRAME_SAMPLES: "abc" })).toThrow('VAD_FRAME_SAMPLES must be a number, got "abc"');
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadAppConfig({ PORT: "70000" })).toThrow('PORT must be an integer between 0 and 65535, got "70000"');
  });

  it("rejects a non-positive energy slope at load time", () => {
    expect(() => loadAppConfig({ VAD_ENERGY_SLOPE_DB: "0" })).toThrow(
      "Invalid energy classifier configuration: slopeDb must be a positive number, got 0",
    );
    expect(() => loadAppConfig({ VAD_ENERGY_SLOPE_DB: "-1" })).toThrow(
      "Invalid energy classifier configuration: slopeDb must be a positive number, got -1",
    );
  });

  it("rejects an infinite energy midpoint at load time", () => {
    expect(() => loadAppConfig({ VAD_ENERGY_MIDPOINT_DB: "-Infinity" })).toThrow(
      "Invalid energy classifier configuration: midpointDb must be finite, got -Infinity",
    );
  });

  it("rejects overrides that break the config rules", () => {
    expect(() => loadAppConfig({ VAD_NEGATIVE_THRESHOLD: "0.9" })).toThrow(
      "Invalid VAD configuration: negativeSpeechThreshold (0.9) must not exceed positiveSpeechThreshold (0.5)",
    );
  });
});

describe("validateEnergyClassifierConfig", () => {
  it("accepts the defaults", () => {
    expect(validateEnergyClassifierConfig({ midpointDb: -40, slopeDb: 4 })).toEqual([]);
  });

  it("reports both fields", () => {
    expect(validateEnergyClassifierConfig({ midpointDb: Number.NaN, slopeDb: Infinity })).toEqual([
      "midpointDb must be finite, got NaN",
      "slopeDb must be a positive number, got Infinity",
    ]);
  });
});
