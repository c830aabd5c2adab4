/**
 * Audio Capture
 * Records until an external stop signal, with two concurrent activities:
 *
 *   producer       reads fixed-size chunks from the input stream
 *   signal-waiter  waits for the operator's stop trigger
 *
 * Both share one AbortController. Whichever finishes first aborts it, the
 * abort closes the input stream, and capture() joins both before returning a
 * sealed buffer. A trailing partial chunk is dropped.
 */

import { AudioBuffer } from './audio-buffer';
import { AUDIO_FORMAT } from '../config';
import { CaptureDeviceError, toError } from '../errors';
import type { TurnLogger } from '../services/turn-logger';
import type { AudioFormat, AudioInputDevice, AudioInputStream, StopSignal } from '../types';

export interface AudioCaptureOptions {
  device: AudioInputDevice;
  stopSignal: StopSignal;
  format?: AudioFormat;
  /** Stop automatically after this long; no limit when unset */
  maxDurationMs?: number;
  logger?: TurnLogger;
}

export class AudioCapture {
  private device: AudioInputDevice;
  private stopSignal: StopSignal;
  private format: AudioFormat;
  private maxDurationMs: number | undefined;
  private logger: TurnLogger | undefined;

  constructor(options: AudioCaptureOptions) {
    this.device = options.device;
    this.stopSignal = options.stopSignal;
    this.format = options.format ?? AUDIO_FORMAT;
    this.maxDurationMs = options.maxDurationMs;
    this.logger = options.logger;
  }

  async capture(): Promise<AudioBuffer> {
    const buffer = new AudioBuffer(this.format);

    let stream: AudioInputStream;
    try {
      stream = await this.device.open(this.format);
    } catch (error) {
      if (error instanceof CaptureDeviceError) throw error;
      throw new CaptureDeviceError(`Failed to open audio input: ${toError(error).message}`, { cause: error });
    }

    const controller = new AbortController();
    const stop = () => controller.abort();
    controller.signal.addEventListener('abort', () => stream.close(), { once: true });

    const timer = this.maxDurationMs !== undefined ? setTimeout(stop, this.maxDurationMs) : undefined;

    this.logger?.log({ type: 'recording' });

    const producer = this.produce(stream, buffer, controller.signal).finally(stop);
    const waiter = this.stopSignal.wait(controller.signal).finally(stop);

    const [produced, waited] = await Promise.allSettled([producer, waiter]);
    clearTimeout(timer);
    buffer.seal();

    if (produced.status === 'rejected') {
      throw new CaptureDeviceError(`Audio input failed while recording: ${toError(produced.reason).message}`, {
        cause: produced.reason,
      });
    }
    if (waited.status === 'rejected') {
      throw new CaptureDeviceError(`Stop signal failed: ${toError(waited.reason).message}`, {
        cause: waited.reason,
      });
    }

    this.logger?.log({ type: 'recording_stopped', chunks: buffer.chunkCount, durationMs: buffer.durationMs });
    return buffer;
  }

  private async produce(stream: AudioInputStream, buffer: AudioBuffer, signal: AbortSignal): Promise<void> {
    const { chunkSize } = this.format;

    while (!signal.aborted) {
      const chunk = await stream.read(chunkSize);
      if (chunk === null || chunk.length < chunkSize) {
        return;
      }
      buffer.append(chunk);
    }
  }
}
