// ─── Speech Classifier Adapter ──────────────────────────────────────────────────
// Maps one fixed-size frame to a speech probability. The VadIterator only
// depends on the SpeechClassifier contract; a neural model plugs in here.

import { computeFrameRMS } from "./pcm.js";
import {
  DEFAULT_ENERGY_CLASSIFIER_CONFIG,
  validateEnergyClassifierConfig,
  type EnergyClassifierConfig,
} from "./vad-config.js";

/**
 * Contract between the segmentation engine and whatever scores frames.
 *
 * Frames arrive strictly in order and never concurrently, so an
 * implementation may keep recurrent state between calls.
 */
export interface SpeechClassifier {
  readonly name: string;
  /** Probability in [0, 1] that the frame contains speech. Rejects on inference failure. */
  infer(frame: Float32Array): Promise<number>;
  /** Clear recurrent state. Called by VadIterator.reset(). */
  reset?(): void;
  /** Free model resources. Called once by VadIterator.release(). */
  release?(): void | Promise<void>;
}

/** Floor for dBFS conversion so digital silence maps to a finite level */
const MIN_RMS = 1e-10;

export function rmsToDbfs(rms: number): number {
  return 20 * Math.log10(Math.max(rms, MIN_RMS));
}

/**
 * Energy-based classifier: the frame's RMS level in dBFS passes through a
 * logistic curve centred on `midpointDb`. Stateless; no model to load.
 *
 * Not a substitute for a trained model on noisy input, but enough to drive
 * the pipeline end to end.
 */
export class EnergySpeechClassifier implements SpeechClassifier {
  readonly name = "energy";
  private readonly midpointDb: number;
  private readonly slopeDb: number;

  constructor(config: Partial<EnergyClassifierConfig> = {}) {
    const { midpointDb, slopeDb } = { ...DEFAULT_ENERGY_CLASSIFIER_CONFIG, ...config };
    const errors = validateEnergyClassifierConfig({ midpointDb, slopeDb });
    if (errors.length > 0) {
      throw new Error(errors.join("; "));
    }
    this.midpointDb = midpointDb;
    this.slopeDb = slopeDb;
  }

  /** Synchronous scoring, exposed for callers that don't need the async contract. */
  score(frame: Float32Array): number {
    const db = rmsToDbfs(computeFrameRMS(frame));
    return 1 / (1 + Math.exp(-(db - this.midpointDb) / this.slopeDb));
  }

  async infer(frame: Float32Array): Promise<number> {
    return this.score(frame);
  }
}
