/**
 * In-process stand-ins for the audio device, stop trigger and adapters
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import type { AudioBuffer } from '../src/audio/audio-buffer';
import type { RecorderProcess } from '../src/audio/recorder';
import type {
  AudioInputDevice,
  AudioInputStream,
  AudioPlayable,
  AudioResult,
  StopSignal,
  SynthesisAdapter,
  TranscriptionAdapter,
  TTSPipeline,
} from '../src/types';

export function chunk(value: number, size = 1024): Int16Array {
  return new Int16Array(size).fill(value);
}

/**
 * Serves the scripted chunks, then calls `onExhausted` and blocks until closed
 */
export class FakeInputStream implements AudioInputStream {
  closed = false;
  reads = 0;
  private release: ((value: null) => void) | null = null;

  constructor(private chunks: Int16Array[], private onExhausted: () => void = () => {}) {}

  read(_frames: number): Promise<Int16Array | null> {
    if (this.closed) return Promise.resolve(null);
    this.reads++;

    const next = this.chunks.shift();
    if (next) return Promise.resolve(next);

    const pending = new Promise<Int16Array | null>((resolve) => {
      this.release = resolve;
    });
    this.onExhausted();
    return pending;
  }

  close(): void {
    this.closed = true;
    this.release?.(null);
    this.release = null;
  }
}

export class FakeDevice implements AudioInputDevice {
  opens = 0;

  constructor(private makeStream: () => AudioInputStream) {}

  async open(): Promise<AudioInputStream> {
    this.opens++;
    return this.makeStream();
  }
}

export class FailingDevice implements AudioInputDevice {
  constructor(private error: Error) {}

  async open(): Promise<AudioInputStream> {
    throw this.error;
  }
}

/**
 * Stop trigger fired from test code. A trigger that arrives before
 * wait() is latched for the next wait.
 */
export class ManualStopSignal implements StopSignal {
  waits = 0;
  private resolveWait: (() => void) | null = null;
  private latched = false;

  trigger(): void {
    if (this.resolveWait) {
      const resolve = this.resolveWait;
      this.resolveWait = null;
      resolve();
    } else {
      this.latched = true;
    }
  }

  wait(signal: AbortSignal): Promise<void> {
    this.waits++;
    if (this.latched || signal.aborted) {
      this.latched = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.resolveWait = resolve;
      signal.addEventListener(
        'abort',
        () => {
          this.resolveWait = null;
          resolve();
        },
        { once: true }
      );
    });
  }
}

export class FakeTranscriber implements TranscriptionAdapter {
  buffers: AudioBuffer[] = [];

  constructor(private results: Array<string | Error>) {}

  async initialize(): Promise<void> {}

  async transcribe(buffer: AudioBuffer): Promise<string> {
    this.buffers.push(buffer);
    const next = this.results.shift();
    if (next === undefined) throw new Error('No scripted transcription left');
    if (next instanceof Error) throw next;
    return next;
  }

  isReady(): boolean {
    return true;
  }
}

export class FakeSynthesizer implements SynthesisAdapter {
  spoken: string[] = [];

  constructor(private failure: Error | null = null) {}

  async initialize(): Promise<void> {}

  async speak(text: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.spoken.push(text);
  }
}

export class FakePlayable implements AudioPlayable {
  played = false;
  stopped = false;

  getRawAudio(): AudioResult | null {
    return null;
  }

  async play(): Promise<void> {
    await new Promise((resolve) => setImmediate(resolve));
    this.played = true;
  }

  stop(): void {
    this.stopped = true;
  }
}

export class FakeTTS implements TTSPipeline {
  texts: string[] = [];
  playables: FakePlayable[] = [];

  constructor(private failure: Error | null = null) {}

  async initialize(): Promise<void> {}

  async synthesize(text: string): Promise<AudioPlayable> {
    if (this.failure) throw this.failure;
    this.texts.push(text);
    const playable = new FakePlayable();
    this.playables.push(playable);
    return playable;
  }

  isReady(): boolean {
    return true;
  }
}

/**
 * Child process stand-in for the recorder: tests write PCM to stdout and
 * emit 'close' themselves.
 */
export class FakeRecorderProcess extends EventEmitter implements RecorderProcess {
  stdout = new PassThrough();
  stderr = new PassThrough();
  signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    return true;
  }
}

/** Little-endian 16-bit PCM bytes */
export function pcm(...samples: number[]): Buffer {
  const bytes = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => bytes.writeInt16LE(sample, i * 2));
  return bytes;
}

/** Let pending stream events and timers of the current turn run */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
