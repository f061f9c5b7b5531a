/**
 * Reassembles fixed-size float frames from arbitrarily sized PCM byte chunks.
 *
 * Bytes accumulate in a residual buffer and leave it only in whole-frame
 * multiples, so sample alignment survives odd-length chunks.
 */

import { pcm16ToFloat32 } from "./pcm.js";

export class FrameSlicer {
  private residual: Buffer;
  private readonly frameByteCount: number;

  constructor(frameSamples: number) {
    if (!Number.isInteger(frameSamples) || frameSamples <= 0) {
      throw new Error(`frameSamples must be a positive integer, got ${frameSamples}`);
    }
    this.frameByteCount = frameSamples * 2;
    this.residual = Buffer.alloc(0);
  }

  /** Add bytes to the residual accumulator. The chunk is copied. */
  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.residual = Buffer.concat([this.residual, chunk]);
  }

  /**
   * Remove and decode the next whole frame, or return null when fewer than
   * one frame's worth of bytes are buffered.
   */
  takeFrame(): Float32Array | null {
    if (this.residual.length < this.frameByteCount) {
      return null;
    }
    const frameBytes = this.residual.subarray(0, this.frameByteCount);
    this.residual = this.residual.subarray(this.frameByteCount);
    return pcm16ToFloat32(frameBytes);
  }

  /** Bytes waiting for the rest of their frame. */
  get pendingBytes(): number {
    return this.residual.length;
  }

  /** Discard any buffered bytes. */
  clear(): void {
    this.residual = Buffer.alloc(0);
  }
}
