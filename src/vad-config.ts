// ─── VAD Configuration ──────────────────────────────────────────────────────────
// Presets, validation and environment loading for the segmentation engine.

import type { VadConfig, VadPreset } from "./types.js";

/**
 * Tuned parameter sets per Silero model generation.
 * v5 works on 32ms frames at 16kHz; the legacy (v4) model on 96ms frames.
 */
export const VAD_PRESETS: Readonly<Record<VadPreset, Readonly<VadConfig>>> = {
  v5: Object.freeze({
    frameSamples: 512,
    sampleRate: 16000,
    positiveSpeechThreshold: 0.5,
    negativeSpeechThreshold: 0.35,
    redemptionFrames: 24,
    preSpeechPadFrames: 30,
    minSpeechFrames: 8,
  }),
  legacy: Object.freeze({
    frameSamples: 1536,
    sampleRate: 16000,
    positiveSpeechThreshold: 0.5,
    negativeSpeechThreshold: 0.35,
    redemptionFrames: 8,
    preSpeechPadFrames: 10,
    minSpeechFrames: 3,
  }),
};

export const DEFAULT_VAD_CONFIG: Readonly<VadConfig> = VAD_PRESETS.v5;

export function isVadPreset(value: string): value is VadPreset {
  return value === "v5" || value === "legacy";
}

/**
 * Check every rule a VadConfig must satisfy.
 * Returns one message per violation; an empty array means the config is valid.
 */
export function validateVadConfig(config: VadConfig): string[] {
  const errors: string[] = [];

  const positiveInt = (name: keyof VadConfig) => {
    const v = config[name];
    if (!Number.isInteger(v) || v <= 0) errors.push(`${name} must be a positive integer, got ${v}`);
  };
  const nonNegativeInt = (name: keyof VadConfig) => {
    const v = config[name];
    if (!Number.isInteger(v) || v < 0) errors.push(`${name} must be a non-negative integer, got ${v}`);
  };
  const unitInterval = (name: keyof VadConfig) => {
    const v = config[name];
    if (!Number.isFinite(v) || v < 0 || v > 1) errors.push(`${name} must be within [0, 1], got ${v}`);
  };

  positiveInt("frameSamples");
  positiveInt("sampleRate");
  unitInterval("positiveSpeechThreshold");
  unitInterval("negativeSpeechThreshold");
  nonNegativeInt("redemptionFrames");
  nonNegativeInt("preSpeechPadFrames");
  positiveInt("minSpeechFrames");

  if (config.negativeSpeechThreshold > config.positiveSpeechThreshold) {
    errors.push(
      `negativeSpeechThreshold (${config.negativeSpeechThreshold}) must not exceed ` +
        `positiveSpeechThreshold (${config.positiveSpeechThreshold})`,
    );
  }

  return errors;
}

/**
 * Build a frozen VadConfig from a preset plus overrides.
 * Throws if the result violates any rule in validateVadConfig().
 */
export function createVadConfig(overrides: Partial<VadConfig> = {}, preset: VadPreset = "v5"): Readonly<VadConfig> {
  const config: VadConfig = { ...VAD_PRESETS[preset], ...overrides };
  const errors = validateVadConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid VAD configuration: ${errors.join("; ")}`);
  }
  return Object.freeze(config);
}

/** Duration in seconds covered by `frames` frames. */
export function framesToSeconds(frames: number, config: Pick<VadConfig, "frameSamples" | "sampleRate">): number {
  return (frames * config.frameSamples) / config.sampleRate;
}

// ─── Application Config ─────────────────────────────────────────────────────────

export interface EnergyClassifierConfig {
  /** Level in dBFS mapped to probability 0.5. */
  midpointDb: number;
  /** dB per logistic unit; smaller is steeper. */
  slopeDb: number;
}

export interface AppConfig {
  port: number;
  debug: boolean;
  /** Stream per-frame probabilities to clients by default. */
  frameTelemetry: boolean;
  vad: Readonly<VadConfig>;
  energy: EnergyClassifierConfig;
}

export const DEFAULT_ENERGY_CLASSIFIER_CONFIG: Readonly<EnergyClassifierConfig> = Object.freeze({
  midpointDb: -40,
  slopeDb: 4,
});

/** Every violated rule of the energy curve, in field order. */
export function validateEnergyClassifierConfig(config: EnergyClassifierConfig): string[] {
  const errors: string[] = [];
  if (!Number.isFinite(config.midpointDb)) {
    errors.push(`midpointDb must be finite, got ${config.midpointDb}`);
  }
  if (!Number.isFinite(config.slopeDb) || config.slopeDb <= 0) {
    errors.push(`slopeDb must be a positive number, got ${config.slopeDb}`);
  }
  return errors;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
}

/**
 * Read the application config from environment variables (typically
 * populated by dotenv). Unset variables fall back to the preset.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const presetName = env.VAD_PRESET?.trim() || "v5";
  if (!isVadPreset(presetName)) {
    throw new Error(`VAD_PRESET must be "v5" or "legacy", got "${presetName}"`);
  }

  const overrides: Partial<VadConfig> = {};
  const mapping: ReadonlyArray<[string, keyof VadConfig]> = [
    ["VAD_FRAME_SAMPLES", "frameSamples"],
    ["VAD_SAMPLE_RATE", "sampleRate"],
    ["VAD_POSITIVE_THRESHOLD", "positiveSpeechThreshold"],
    ["VAD_NEGATIVE_THRESHOLD", "negativeSpeechThreshold"],
    ["VAD_REDEMPTION_FRAMES", "redemptionFrames"],
    ["VAD_PRE_SPEECH_PAD_FRAMES", "preSpeechPadFrames"],
    ["VAD_MIN_SPEECH_FRAMES", "minSpeechFrames"],
  ];
  for (const [key, field] of mapping) {
    const value = readNumber(env, key);
    if (value !== undefined) overrides[field] = value;
  }

  const port = parseInt(env.PORT || "3000", 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }

  const energy: EnergyClassifierConfig = {
    midpointDb: readNumber(env, "VAD_ENERGY_MIDPOINT_DB") ?? DEFAULT_ENERGY_CLASSIFIER_CONFIG.midpointDb,
    slopeDb: readNumber(env, "VAD_ENERGY_SLOPE_DB") ?? DEFAULT_ENERGY_CLASSIFIER_CONFIG.slopeDb,
  };
  const energyErrors = validateEnergyClassifierConfig(energy);
  if (energyErrors.length > 0) {
    throw new Error(`Invalid energy classifier configuration: ${energyErrors.join("; ")}`);
  }

  return {
    port,
    debug: readBoolean(env, "VAD_DEBUG", false),
    frameTelemetry: readBoolean(env, "VAD_FRAME_TELEMETRY", false),
    vad: createVadConfig(overrides, presetName),
    energy,
  };
}
