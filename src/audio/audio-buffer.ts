/**
 * Audio Buffer
 * Ordered, fixed-size chunks of mono 16-bit PCM. Sealed once capture stops.
 */

import type { AudioFormat } from '../types';

export class AudioBuffer {
  private chunks: Int16Array[] = [];
  private sealed = false;

  constructor(readonly format: AudioFormat) {}

  /** Append one chunk of exactly `format.chunkSize` samples */
  append(chunk: Int16Array): void {
    if (this.sealed) {
      throw new Error('Cannot append to a sealed audio buffer');
    }
    if (chunk.length !== this.format.chunkSize) {
      throw new Error(`Audio chunk must hold ${this.format.chunkSize} samples, got ${chunk.length}`);
    }
    this.chunks.push(chunk.slice());
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  get sampleCount(): number {
    return this.chunks.length * this.format.chunkSize;
  }

  get durationMs(): number {
    return (this.sampleCount / this.format.sampleRate) * 1000;
  }

  /** All samples in capture order */
  toInt16(): Int16Array {
    const samples = new Int16Array(this.sampleCount);
    let offset = 0;
    for (const chunk of this.chunks) {
      samples.set(chunk, offset);
      offset += chunk.length;
    }
    return samples;
  }

  /** Samples scaled to [-1, 1) */
  toFloat32(): Float32Array {
    const samples = this.toInt16();
    const float32 = new Float32Array(samples.length);
    for (let i = 0; i < samples.length; i++) {
      float32[i] = samples[i] / 32768.0;
    }
    return float32;
  }
}
