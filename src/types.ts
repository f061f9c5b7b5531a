// Streaming VAD - Shared TypeScript interfaces and types
// Engine configuration, lifecycle events and the WebSocket wire protocol.

// ─── Configuration ──────────────────────────────────────────────────────────────

/**
 * Segmentation parameters. Frozen for the lifetime of one VadIterator.
 * Frame counts are in units of `frameSamples`.
 */
export interface VadConfig {
  /** Samples per frame. The engine rejects frames of any other length. */
  frameSamples: number;
  /** Samples per second, used only to derive event timestamps. */
  sampleRate: number;
  /** Probability at or above this marks a frame speech-positive. */
  positiveSpeechThreshold: number;
  /** Probability below this marks a frame speech-negative. Must be <= positiveSpeechThreshold. */
  negativeSpeechThreshold: number;
  /** Consecutive negative frames tolerated during speech before the episode ends. */
  redemptionFrames: number;
  /** Capacity of the pre-roll ring buffer. */
  preSpeechPadFrames: number;
  /** Positive frames required before an episode counts as real speech. */
  minSpeechFrames: number;
}

export type VadPreset = "v5" | "legacy";

// ─── Probability Banding ────────────────────────────────────────────────────────

export type ProbabilityBand = "positive" | "negative" | "intermediate";

export interface SpeechProbabilities {
  isSpeech: number;
  notSpeech: number;
}

// ─── Engine Events ──────────────────────────────────────────────────────────────

interface VadEventBase {
  /** Seconds of audio consumed when the event fired (currentSample / sampleRate). */
  timestamp: number;
  message: string;
}

export type VadEvent =
  | (VadEventBase & {
      type: "frame-processed";
      probabilities: SpeechProbabilities;
      /** Copy of the frame's samples; mutating it does not affect the engine. */
      frame: Float32Array;
    })
  | (VadEventBase & { type: "speech-start" })
  | (VadEventBase & { type: "speech-validated" })
  | (VadEventBase & {
      type: "speech-end";
      /** Whole episode as 16-bit little-endian PCM. */
      audio: Buffer;
    })
  | (VadEventBase & { type: "misfire" })
  | (VadEventBase & { type: "error" });

export type VadEventCallback = (event: VadEvent) => void;

/** Read-only view of the engine's mutable state. */
export interface VadIteratorSnapshot {
  speaking: boolean;
  redemptionCounter: number;
  speechPositiveFrameCount: number;
  speechRealStartFired: boolean;
  currentSample: number;
  totalFramesProcessed: number;
  preSpeechFrames: number;
  speechFrames: number;
  pendingBytes: number;
  released: boolean;
}

// ─── WebSocket Message Protocol ─────────────────────────────────────────────────

export type ClientMessage =
  | {
      type: "audio_format";
      channels: number;
      sampleRate: number;
      encoding: string;
    }
  | { type: "force_end" }
  | { type: "reset" }
  | { type: "set_telemetry"; enabled: boolean };

export type ServerMessage =
  | { type: "ready"; sessionId: string; config: VadConfig }
  | { type: "speech_start"; timestamp: number }
  | { type: "speech_validated"; timestamp: number }
  | {
      type: "speech_end";
      timestamp: number;
      /** Length of the binary PCM frame sent immediately after this message. */
      byteLength: number;
    }
  | { type: "misfire"; timestamp: number }
  | {
      type: "frame_processed";
      timestamp: number;
      isSpeech: number;
      notSpeech: number;
    }
  | { type: "reset_complete" }
  | { type: "error"; message: string; recoverable: boolean }
  | { type: "audio_format_error"; message: string };
