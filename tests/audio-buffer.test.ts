import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AudioBuffer } from '../src/audio/audio-buffer';
import type { AudioFormat } from '../src/types';

const tiny: AudioFormat = { sampleRate: 8, channels: 1, bitDepth: 16, chunkSize: 4 };

describe('AudioBuffer', () => {
  it('concatenates chunks in append order', () => {
    const buffer = new AudioBuffer(tiny);
    buffer.append(Int16Array.from([1, 2, 3, 4]));
    buffer.append(Int16Array.from([5, 6, 7, 8]));

    assert.equal(buffer.chunkCount, 2);
    assert.equal(buffer.sampleCount, 8);
    assert.equal(buffer.durationMs, 1000);
    assert.deepEqual([...buffer.toInt16()], [1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('copies appended chunks', () => {
    const buffer = new AudioBuffer(tiny);
    const source = Int16Array.from([1, 2, 3, 4]);
    buffer.append(source);
    source[0] = 99;

    assert.equal(buffer.toInt16()[0], 1);
  });

  it('rejects chunks of the wrong size', () => {
    const buffer = new AudioBuffer(tiny);

    assert.throws(() => buffer.append(Int16Array.from([1, 2])), /must hold 4 samples, got 2/);
    assert.equal(buffer.chunkCount, 0);
  });

  it('rejects appends once sealed', () => {
    const buffer = new AudioBuffer(tiny);
    buffer.append(Int16Array.from([1, 2, 3, 4]));
    buffer.seal();

    assert.equal(buffer.isSealed(), true);
    assert.throws(() => buffer.append(Int16Array.from([1, 2, 3, 4])), /sealed/);
    assert.equal(buffer.chunkCount, 1);
  });

  it('scales samples to float', () => {
    const buffer = new AudioBuffer(tiny);
    buffer.append(Int16Array.from([0, 16384, -16384, -32768]));

    assert.deepEqual([...buffer.toFloat32()], [0, 0.5, -0.5, -1]);
  });
});
