// ─── VAD Iterator ───────────────────────────────────────────────────────────────
// Streaming segmentation engine. Consumes fixed-size frames in arrival order,
// asks the classifier for a speech probability, and turns the probability
// stream into speech episodes with hysteresis, pre-roll and misfire filtering.

import { FrameSlicer } from "./frame-slicer.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import { encodeSpeechFrames } from "./pcm.js";
import { PreSpeechBuffer } from "./pre-speech-buffer.js";
import type { SpeechClassifier } from "./speech-classifier.js";
import type {
  ProbabilityBand,
  VadConfig,
  VadEvent,
  VadEventCallback,
  VadIteratorSnapshot,
} from "./types.js";
import { framesToSeconds, validateVadConfig } from "./vad-config.js";

export interface VadIteratorOptions {
  config: VadConfig;
  classifier: SpeechClassifier;
  /** Diagnostics sink. Defaults to a console logger scoped "VadIterator". */
  logger?: Logger;
  /** Log every state transition at debug level. Default: false */
  debug?: boolean;
}

/**
 * Band a probability against the hysteresis thresholds.
 * Exactly one band matches any finite probability.
 */
export function classifyProbability(
  probability: number,
  config: Pick<VadConfig, "positiveSpeechThreshold" | "negativeSpeechThreshold">,
): ProbabilityBand {
  if (probability >= config.positiveSpeechThreshold) return "positive";
  if (probability < config.negativeSpeechThreshold) return "negative";
  return "intermediate";
}

/**
 * Frame-by-frame speech segmentation state machine.
 *
 * States are NotSpeaking (initial) and Speaking:
 * - positive frame: starts speech if needed (pre-roll moves into the speech
 *   buffer), resets redemption, counts toward validation
 * - negative frame while speaking: advances redemption; reaching
 *   `redemptionFrames` ends the episode as speech-end or misfire
 * - intermediate frame while speaking: buffered, resets redemption
 * - negative or intermediate frame while not speaking: pre-roll
 *
 * Callers must await each processFrame()/processAudioData() before issuing
 * the next; nothing here synchronizes concurrent calls. Event handlers must
 * not feed frames back into the same instance.
 */
export class VadIterator {
  private readonly config: Readonly<VadConfig>;
  private classifier: SpeechClassifier | null;
  private readonly logger: Logger;
  private readonly debug: boolean;
  private callback: VadEventCallback | null = null;

  private readonly slicer: FrameSlicer;
  private readonly preSpeechBuffer: PreSpeechBuffer;
  private speechBuffer: Float32Array[] = [];

  private speaking = false;
  private redemptionCounter = 0;
  private speechPositiveFrameCount = 0;
  private speechRealStartFired = false;
  private currentSample = 0;
  private totalFramesProcessed = 0;

  /** Bumped by reset() and release(); inference results from an older epoch are discarded. */
  private epoch = 0;

  constructor(options: VadIteratorOptions) {
    const errors = validateVadConfig(options.config);
    if (errors.length > 0) {
      throw new Error(`Invalid VAD configuration: ${errors.join("; ")}`);
    }

    this.config = Object.freeze({ ...options.config });
    this.classifier = options.classifier;
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createConsoleLogger("VadIterator", { verbose: this.debug });
    this.slicer = new FrameSlicer(this.config.frameSamples);
    this.preSpeechBuffer = new PreSpeechBuffer(this.config.preSpeechPadFrames);

    this.resetState();
  }

  private trace(msg: string): void {
    if (this.debug) this.logger.debug(msg);
  }

  setEventCallback(callback: VadEventCallback | null): void {
    this.callback = callback;
  }

  get isSpeaking(): boolean {
    return this.speaking;
  }

  get isReleased(): boolean {
    return this.classifier === null;
  }

  snapshot(): VadIteratorSnapshot {
    return {
      speaking: this.speaking,
      redemptionCounter: this.redemptionCounter,
      speechPositiveFrameCount: this.speechPositiveFrameCount,
      speechRealStartFired: this.speechRealStartFired,
      currentSample: this.currentSample,
      totalFramesProcessed: this.totalFramesProcessed,
      preSpeechFrames: this.preSpeechBuffer.size,
      speechFrames: this.speechBuffer.length,
      pendingBytes: this.slicer.pendingBytes,
      released: this.classifier === null,
    };
  }

  // ─── Input ──────────────────────────────────────────────────────────────────

  /**
   * Feed raw 16-bit LE PCM of any length. Whole frames are decoded and
   * processed one at a time, in order; leftover bytes wait for the next call.
   */
  async processAudioData(data: Uint8Array): Promise<void> {
    if (!this.classifier) {
      this.logger.warn("Classifier not initialized, audio data ignored");
      return;
    }

    this.slicer.append(data);

    let frame = this.slicer.takeFrame();
    while (frame !== null) {
      await this.processFrame(frame);
      frame = this.slicer.takeFrame();
    }
  }

  /**
   * Process exactly one frame of `frameSamples` floats.
   * Never rejects: size mismatches are logged and dropped, inference
   * failures become `error` events and leave the state untouched.
   */
  async processFrame(frame: Float32Array): Promise<void> {
    const classifier = this.classifier;
    if (!classifier) {
      this.logger.warn("Classifier not initialized, frame ignored");
      return;
    }

    if (frame.length !== this.config.frameSamples) {
      this.logger.warn(`Unexpected frame size: ${frame.length}, expected: ${this.config.frameSamples}`);
      return;
    }

    // The engine owns its copy from here on
    const owned = Float32Array.from(frame);
    const epoch = this.epoch;

    let probability: number;
    try {
      probability = await this.runInference(classifier, owned);
    } catch (err) {
      if (epoch !== this.epoch) {
        this.trace(`Dropping inference error from before reset: ${errorMessage(err)}`);
        return;
      }
      const msg = errorMessage(err);
      this.logger.error(`Inference failed on frame ${this.totalFramesProcessed + 1}: ${msg}`);
      this.emit({
        type: "error",
        timestamp: this.timestamp(),
        message: `Frame processing error: ${msg}`,
      });
      return;
    }

    if (epoch !== this.epoch) {
      this.trace("Dropping inference result from before reset");
      return;
    }

    this.totalFramesProcessed++;

    if (this.speaking && probability < this.config.negativeSpeechThreshold) {
      this.trace(
        `During speech - probability ${probability.toFixed(3)} < negativeSpeechThreshold ` +
          `${this.config.negativeSpeechThreshold.toFixed(3)}`,
      );
    }

    const frameTimestamp = this.timestamp();
    this.emit({
      type: "frame-processed",
      timestamp: frameTimestamp,
      message: `Frame processed at ${frameTimestamp.toFixed(3)}s`,
      probabilities: { isSpeech: probability, notSpeech: 1 - probability },
      frame: Float32Array.from(owned),
    });

    // A handler reset or released the engine; this frame no longer applies
    if (epoch !== this.epoch) return;

    this.currentSample += this.config.frameSamples;

    for (const event of this.handleStateTransition(probability, owned)) {
      if (epoch !== this.epoch) break;
      this.emit(event);
    }
  }

  private async runInference(classifier: SpeechClassifier, frame: Float32Array): Promise<number> {
    const probability = await classifier.infer(frame);
    if (!Number.isFinite(probability)) {
      throw new Error(`Classifier "${classifier.name}" returned a non-finite probability: ${probability}`);
    }
    return Math.min(1, Math.max(0, probability));
  }

  // ─── State Machine ──────────────────────────────────────────────────────────

  /**
   * Apply one frame's decision. State is fully updated before any of the
   * returned events reach the callback.
   */
  private handleStateTransition(probability: number, frame: Float32Array): VadEvent[] {
    const band = classifyProbability(probability, this.config);
    switch (band) {
      case "positive":
        return this.handlePositiveFrame(probability, frame);
      case "negative":
        return this.handleNegativeFrame(frame);
      case "intermediate":
        return this.handleIntermediateFrame(frame);
      default: {
        const exhaustiveCheck: never = band;
        throw new Error(`Unhandled probability band: ${String(exhaustiveCheck)}`);
      }
    }
  }

  private handlePositiveFrame(probability: number, frame: Float32Array): VadEvent[] {
    const events: VadEvent[] = [];
    const ts = this.timestamp();

    if (!this.speaking) {
      this.speaking = true;
      this.speechRealStartFired = false;
      this.trace(`Speech started (prob: ${probability.toFixed(3)})`);
      events.push({ type: "speech-start", timestamp: ts, message: `Speech started at ${ts.toFixed(3)}s` });

      for (const preRoll of this.preSpeechBuffer.drain()) {
        this.speechBuffer.push(preRoll);
      }
    }

    if (this.redemptionCounter > 0) {
      this.trace(
        `Redemption counter reset from ${this.redemptionCounter} to 0 due to positive speech ` +
          `(prob: ${probability.toFixed(3)})`,
      );
    }
    this.redemptionCounter = 0;
    this.speechBuffer.push(frame);
    this.speechPositiveFrameCount++;

    if (this.speechPositiveFrameCount === this.config.minSpeechFrames && !this.speechRealStartFired) {
      this.speechRealStartFired = true;
      this.trace("Real speech validated");
      events.push({ type: "speech-validated", timestamp: ts, message: `Speech validated at ${ts.toFixed(3)}s` });
    }

    return events;
  }

  private handleNegativeFrame(frame: Float32Array): VadEvent[] {
    if (!this.speaking) {
      this.preSpeechBuffer.push(frame);
      return [];
    }

    this.redemptionCounter++;
    this.trace(`Redemption counter incremented to ${this.redemptionCounter}/${this.config.redemptionFrames}`);

    if (this.redemptionCounter < this.config.redemptionFrames) {
      this.speechBuffer.push(frame);
      return [];
    }

    const ts = this.timestamp();
    if (this.speechPositiveFrameCount >= this.config.minSpeechFrames) {
      const durationSeconds = framesToSeconds(this.speechBuffer.length, this.config);
      const audio = encodeSpeechFrames(this.speechBuffer);
      this.closeEpisode();
      this.trace(`Speech ended (duration: ${durationSeconds.toFixed(2)}s)`);
      return [{ type: "speech-end", timestamp: ts, message: `Speech ended at ${ts.toFixed(3)}s`, audio }];
    }

    this.trace(`Misfire (only ${this.speechPositiveFrameCount} positive frames)`);
    this.closeEpisode();
    return [{ type: "misfire", timestamp: ts, message: `Misfire detected at ${ts.toFixed(3)}s` }];
  }

  /** Intermediate frames hold speech open without counting toward validation. */
  private handleIntermediateFrame(frame: Float32Array): VadEvent[] {
    if (this.speaking) {
      this.speechBuffer.push(frame);
      this.redemptionCounter = 0;
    } else {
      this.preSpeechBuffer.push(frame);
    }
    return [];
  }

  /** Return every speaking-related field to NotSpeaking values. */
  private closeEpisode(): void {
    this.speaking = false;
    this.redemptionCounter = 0;
    this.speechPositiveFrameCount = 0;
    this.speechBuffer = [];
    this.preSpeechBuffer.clear();
    this.speechRealStartFired = false;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * End a validated episode now, emitting speech-end with the audio buffered
   * so far. No-op when not speaking or when the episode hasn't reached
   * `minSpeechFrames` positive frames (no misfire is emitted either).
   */
  forceEndSpeech(): void {
    if (!this.speaking || this.speechPositiveFrameCount < this.config.minSpeechFrames) {
      this.trace(
        `Force end ignored (speaking: ${this.speaking}, positive frames: ${this.speechPositiveFrameCount}/` +
          `${this.config.minSpeechFrames})`,
      );
      return;
    }

    this.trace("Forcing speech end");
    const ts = this.timestamp();
    const audio = encodeSpeechFrames(this.speechBuffer);
    this.closeEpisode();
    this.emit({
      type: "speech-end",
      timestamp: ts,
      message: `Speech forcefully ended at ${ts.toFixed(3)}s`,
      audio,
    });
  }

  /**
   * Return all mutable state to initial values, discard both frame buffers
   * and any partial frame bytes, and clear the classifier's recurrent state.
   */
  reset(): void {
    this.trace(`Resetting state (processed ${this.totalFramesProcessed} frames so far)`);
    this.epoch++;
    this.resetState();
    this.classifier?.reset?.();
  }

  /** Drop the classifier. Every later call is a logged no-op. */
  async release(): Promise<void> {
    const classifier = this.classifier;
    if (!classifier) return;

    this.trace(`Releasing classifier "${classifier.name}"`);
    this.classifier = null;
    this.epoch++;
    this.resetState();
    this.callback = null;
    await classifier.release?.();
  }

  private resetState(): void {
    this.closeEpisode();
    this.currentSample = 0;
    this.totalFramesProcessed = 0;
    this.slicer.clear();
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private timestamp(): number {
    return this.currentSample / this.config.sampleRate;
  }

  private emit(event: VadEvent): void {
    if (!this.callback) return;
    try {
      this.callback(event);
    } catch (err) {
      this.logger.error(`Event handler failed on "${event.type}": ${errorMessage(err)}`);
    }
  }
}
