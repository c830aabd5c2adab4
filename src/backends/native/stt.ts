/**
 * Whisper STT (Native - whisper.cpp)
 * Requires the whisper-cli binary and a ggml model
 */

import { execFileSync } from 'child_process';
import { writeFileSync, unlinkSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { AudioBuffer } from '../../audio/audio-buffer';
import { encodeWav } from '../../audio/wav';
import { TranscriptionError, toError } from '../../errors';
import type { TranscriptionAdapter, NativeSTTConfig, ProgressCallback } from '../../types';

export class NativeWhisperSTT implements TranscriptionAdapter {
  private config: NativeSTTConfig;
  private ready = false;

  constructor(config: NativeSTTConfig) {
    this.config = config;
  }

  async initialize(onProgress?: ProgressCallback): Promise<void> {
    console.log('Initializing native STT (whisper.cpp)...');
    onProgress?.({ status: 'initiate', backend: 'whisper.cpp' });

    if (!existsSync(this.config.binaryPath)) {
      throw new Error(`whisper.cpp binary not found at: ${this.config.binaryPath}`);
    }
    if (!existsSync(this.config.modelPath)) {
      throw new Error(`Whisper model not found at: ${this.config.modelPath}`);
    }

    this.ready = true;
    onProgress?.({ status: 'ready', backend: 'whisper.cpp' });
    console.log('Native STT ready.');
  }

  async transcribe(buffer: AudioBuffer): Promise<string> {
    if (!this.ready) {
      throw new TranscriptionError('STT pipeline not initialized');
    }

    const tempPath = join(tmpdir(), `whisper-${Date.now()}-${Math.random().toString(36).slice(2)}.wav`);

    try {
      writeFileSync(tempPath, encodeWav(buffer.toInt16(), buffer.format.sampleRate));

      const result = execFileSync(
        this.config.binaryPath,
        [
          '-m', this.config.modelPath,
          '-l', this.config.language,
          '--no-timestamps',
          '--suppress-nst',  // Suppress non-speech tokens like "(upbeat music)"
          '-np',             // No prints except results
          '-f', tempPath,
        ],
        { encoding: 'utf-8', stdio: ['pipe', 'pipe', 'pipe'] }
      );

      return result.trim();
    } catch (error) {
      throw new TranscriptionError(`whisper.cpp failed: ${toError(error).message}`, { cause: error });
    } finally {
      if (existsSync(tempPath)) {
        unlinkSync(tempPath);
      }
    }
  }

  isReady(): boolean {
    return this.ready;
  }
}
