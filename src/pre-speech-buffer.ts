/**
 * Bounded pre-roll buffer for frames seen before speech starts.
 * Uses a circular buffer for O(1) push regardless of fill level; when full,
 * the oldest frame is evicted.
 */

export class PreSpeechBuffer {
  private buffer: (Float32Array | null)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`PreSpeechBuffer capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<Float32Array | null>(capacity).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }

  /**
   * Append a frame. If the buffer is full, drop the oldest frame first.
   * With zero capacity the frame is discarded.
   */
  push(frame: Float32Array): void {
    if (this.capacity === 0) return;

    if (this.count === this.capacity) {
      this.buffer[this.head] = null; // release reference to oldest
      this.head = (this.head + 1) % this.capacity;
      this.count--;
    }

    this.buffer[this.tail] = frame;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
  }

  /** Remove every frame, oldest first. */
  drain(): Float32Array[] {
    const frames: Float32Array[] = [];
    while (this.count > 0) {
      const frame = this.buffer[this.head];
      this.buffer[this.head] = null;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      if (frame) frames.push(frame);
    }
    this.head = 0;
    this.tail = 0;
    return frames;
  }

  get size(): number {
    return this.count;
  }

  /** Drop all frames and reset pointers. */
  clear(): void {
    for (let i = 0; i < this.capacity; i++) {
      this.buffer[i] = null;
    }
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
