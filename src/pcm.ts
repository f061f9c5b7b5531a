/**
 * 16-bit PCM ⇄ Float32 conversion.
 *
 * Wire format everywhere in this project: signed 16-bit little-endian, mono.
 * Float samples are nominally in [-1, 1]; decoding divides by 32768.
 */

/** Scale between Int16 samples and normalized floats */
const PCM16_SCALE = 32768;

const INT16_MIN = -32768;
const INT16_MAX = 32767;

/**
 * Decode 16-bit LE PCM into floats. A trailing odd byte is ignored:
 * callers are expected to hand over whole samples.
 */
export function pcm16ToFloat32(bytes: Uint8Array): Float32Array {
  const sampleCount = Math.floor(bytes.length / 2);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    out[i] = view.getInt16(i * 2, true) / PCM16_SCALE;
  }
  return out;
}

/**
 * Quantize floats to 16-bit LE PCM: scale by 32768, clamp to the Int16
 * range (never wrap), round to nearest.
 */
export function float32ToPcm16(samples: Float32Array): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const scaled = samples[i] * PCM16_SCALE;
    const clamped = Math.max(INT16_MIN, Math.min(INT16_MAX, scaled));
    // NaN carries no signal; write silence
    buf.writeInt16LE(Number.isNaN(clamped) ? 0 : Math.round(clamped), i * 2);
  }
  return buf;
}

/** Concatenate frames, oldest first, into one contiguous sequence. */
export function concatFrames(frames: readonly Float32Array[]): Float32Array {
  let total = 0;
  for (const frame of frames) total += frame.length;

  const combined = new Float32Array(total);
  let offset = 0;
  for (const frame of frames) {
    combined.set(frame, offset);
    offset += frame.length;
  }
  return combined;
}

/** Finalize a speech episode: concatenate its frames and quantize to PCM. */
export function encodeSpeechFrames(frames: readonly Float32Array[]): Buffer {
  return float32ToPcm16(concatFrames(frames));
}

/** Root mean square of a float frame. Returns 0 for an empty frame. */
export function computeFrameRMS(frame: Float32Array): number {
  if (frame.length === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < frame.length; i++) {
    sumSquares += frame[i] * frame[i];
  }
  return Math.sqrt(sumSquares / frame.length);
}
