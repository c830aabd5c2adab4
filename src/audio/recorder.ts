/**
 * Microphone input through a recorder binary (arecord or sox).
 * The recorder writes raw s16le PCM to stdout; the stream slices it into chunks.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { RecorderKind } from '../config';
import { CaptureDeviceError } from '../errors';
import type { AudioFormat, AudioInputDevice, AudioInputStream } from '../types';

export interface RecorderCommand {
  command: string;
  args: string[];
}

export function recorderCommand(kind: RecorderKind, format: AudioFormat): RecorderCommand {
  const rate = String(format.sampleRate);
  const channels = String(format.channels);

  switch (kind) {
    case 'arecord':
      return {
        command: 'arecord',
        args: ['-q', '-t', 'raw', '-f', 'S16_LE', '-r', rate, '-c', channels],
      };
    case 'sox':
      return {
        command: 'sox',
        args: ['-q', '-d', '-t', 'raw', '-b', '16', '-e', 'signed-integer', '-L', '-r', rate, '-c', channels, '-'],
      };
  }
}

/** The parts of a spawned recorder the stream reads from */
export interface RecorderProcess extends EventEmitter {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

interface PendingRead {
  bytes: number;
  resolve: (chunk: Int16Array | null) => void;
  reject: (error: Error) => void;
}

function toSamples(bytes: Buffer): Int16Array {
  const samples = new Int16Array(Math.floor(bytes.length / 2));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * 2);
  }
  return samples;
}

/**
 * Slices recorder stdout into reads of a fixed byte size.
 * The stream ends on the process 'close' event, which Node emits after the
 * process has exited and its stdio has drained. A non-zero exit code rejects
 * the next read once the buffered full chunks are consumed.
 */
export class ProcessAudioStream implements AudioInputStream {
  private pending: Buffer = Buffer.alloc(0);
  private waiting: PendingRead | null = null;
  private ended = false;
  private closed = false;
  private error: Error | null = null;
  private stderr = '';

  constructor(private proc: RecorderProcess, private command: string) {
    proc.stdout.on('data', (data: Buffer) => {
      this.pending = Buffer.concat([this.pending, data]);
      this.flush();
    });
    proc.stderr.on('data', (data: Buffer) => {
      this.stderr += data.toString();
    });
    proc.on('error', (err: Error) => {
      this.error = new CaptureDeviceError(`${this.command} failed: ${err.message}`, { cause: err });
      this.flush();
    });
    proc.on('close', (code: number | null) => {
      this.ended = true;
      if (!this.closed && code !== 0 && code !== null) {
        const detail = this.stderr.trim();
        this.error = new CaptureDeviceError(`${this.command} exited with code ${code}${detail ? `: ${detail}` : ''}`);
      }
      this.flush();
    });
  }

  read(frames: number): Promise<Int16Array | null> {
    return new Promise((resolve, reject) => {
      this.waiting = { bytes: frames * 2, resolve, reject };
      this.flush();
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.proc.kill('SIGTERM');
    this.flush();
  }

  private flush(): void {
    const waiting = this.waiting;
    if (!waiting) return;

    if (this.closed) {
      this.waiting = null;
      waiting.resolve(null);
      return;
    }

    if (this.pending.length >= waiting.bytes) {
      const bytes = this.pending.subarray(0, waiting.bytes);
      this.pending = this.pending.subarray(waiting.bytes);
      this.waiting = null;
      waiting.resolve(toSamples(bytes));
      return;
    }

    if (this.error) {
      this.waiting = null;
      waiting.reject(this.error);
      return;
    }

    if (this.ended) {
      // Hand back the short tail; the capture loop drops it
      const tail = this.pending;
      this.pending = Buffer.alloc(0);
      this.waiting = null;
      waiting.resolve(tail.length >= 2 ? toSamples(tail) : null);
    }
  }
}

/**
 * Audio input device backed by a recorder process.
 * open() rejects when the binary cannot be started.
 */
export class CommandAudioInput implements AudioInputDevice {
  constructor(private kind: RecorderKind = 'arecord') {}

  open(format: AudioFormat): Promise<AudioInputStream> {
    const { command, args } = recorderCommand(this.kind, format);

    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      const onError = (err: Error) => {
        reject(new CaptureDeviceError(`Failed to start ${command}: ${err.message}`, { cause: err }));
      };
      proc.once('error', onError);
      proc.once('spawn', () => {
        proc.off('error', onError);
        resolve(new ProcessAudioStream(proc, command));
      });
    });
  }
}
