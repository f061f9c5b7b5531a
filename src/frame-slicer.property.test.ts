// Property-Based Tests for FrameSlicer
// Chunk boundaries never change the decoded frame sequence.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { FrameSlicer } from "./frame-slicer.js";
import { pcm16ToFloat32 } from "./pcm.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** A byte stream plus the cut points used to split it into chunks. */
const arbitraryChunkedStream = fc
  .record({
    frameSamples: fc.integer({ min: 1, max: 16 }),
    bytes: fc.uint8Array({ minLength: 0, maxLength: 400 }),
    cuts: fc.array(fc.nat(), { maxLength: 20 }),
  })
  .map(({ frameSamples, bytes, cuts }) => {
    const points = [...new Set(cuts.map((c) => (bytes.length === 0 ? 0 : c % bytes.length)))].sort((a, b) => a - b);
    const chunks: Uint8Array[] = [];
    let start = 0;
    for (const p of points) {
      chunks.push(bytes.subarray(start, p));
      start = p;
    }
    chunks.push(bytes.subarray(start));
    return { frameSamples, bytes, chunks };
  });

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("FrameSlicer properties", () => {
  it("decodes the same frames however the stream is chunked", () => {
    fc.assert(
      fc.property(arbitraryChunkedStream, ({ frameSamples, bytes, chunks }) => {
        const slicer = new FrameSlicer(frameSamples);
        const frames: number[][] = [];
        for (const chunk of chunks) {
          slicer.append(chunk);
          let frame = slicer.takeFrame();
          while (frame !== null) {
            frames.push(Array.from(frame));
            frame = slicer.takeFrame();
          }
        }

        const frameBytes = frameSamples * 2;
        const wholeFrames = Math.floor(bytes.length / frameBytes);
        const expected: number[][] = [];
        for (let i = 0; i < wholeFrames; i++) {
          expected.push(Array.from(pcm16ToFloat32(bytes.subarray(i * frameBytes, (i + 1) * frameBytes))));
        }

        expect(frames).toEqual(expected);
        expect(slicer.pendingBytes).toBe(bytes.length % frameBytes);
      }),
      { numRuns: 200 },
    );
  });
});
