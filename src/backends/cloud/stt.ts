/**
 * Cloud Whisper STT (OpenAI-compatible transcription API)
 * Works with: Groq, OpenAI, and any endpoint serving /audio/transcriptions
 *
 * Uses native fetch and FormData - no external dependencies required.
 */

import type { AudioBuffer } from '../../audio/audio-buffer';
import { encodeWav } from '../../audio/wav';
import { TranscriptionError, toError } from '../../errors';
import type { CloudSTTConfig, ProgressCallback, TranscriptionAdapter } from '../../types';

export class CloudWhisperSTT implements TranscriptionAdapter {
  private config: CloudSTTConfig;
  private ready = false;

  constructor(config: CloudSTTConfig) {
    this.config = config;
  }

  async initialize(onProgress?: ProgressCallback): Promise<void> {
    console.log(`Initializing Cloud STT (${this.config.baseUrl})...`);
    console.log(`  Model: ${this.config.model}`);
    onProgress?.({ status: 'initiate', backend: 'cloud-stt' });

    if (!this.config.apiKey) {
      console.log('  Note: no API key configured (requests will be sent without Authorization)');
    }

    this.ready = true;
    onProgress?.({ status: 'ready', backend: 'cloud-stt' });
    console.log('Cloud STT ready.');
  }

  async transcribe(buffer: AudioBuffer): Promise<string> {
    if (!this.ready) {
      throw new TranscriptionError('STT pipeline not initialized');
    }

    const wav = encodeWav(buffer.toInt16(), buffer.format.sampleRate);

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(wav)], { type: 'audio/wav' }), 'audio.wav');
    form.append('model', this.config.model);
    form.append('response_format', 'text');
    if (this.config.language) {
      form.append('language', this.config.language);
    }

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/audio/transcriptions`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: form,
      });
    } catch (error) {
      throw new TranscriptionError(`Cloud STT request failed: ${toError(error).message}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new TranscriptionError(`Cloud STT API error (${response.status}): ${errorText}`);
    }

    return (await response.text()).trim();
  }

  isReady(): boolean {
    return this.ready;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }
    return headers;
  }
}
