/**
 * Speech Output
 * SynthesisAdapter over a TTS backend: clean the text, synthesize, play to the end.
 */

import { SynthesisError, toError } from '../errors';
import type { ProgressCallback, SynthesisAdapter, TTSPipeline } from '../types';
import { stripEmphasis, type TextNormalizer } from './text-normalizer';

export interface SpeechOutputConfig {
  tts: TTSPipeline;
  /** Spoken-form normalizer; when null only emphasis markers are stripped */
  normalizer?: TextNormalizer | null;
}

export class SpeechOutput implements SynthesisAdapter {
  private tts: TTSPipeline;
  private normalizer: TextNormalizer | null;

  constructor(config: SpeechOutputConfig) {
    this.tts = config.tts;
    this.normalizer = config.normalizer ?? null;
  }

  async initialize(onProgress?: ProgressCallback): Promise<void> {
    await this.tts.initialize(onProgress);
  }

  /** Text as it is handed to the TTS backend */
  prepare(text: string): string {
    return this.normalizer ? this.normalizer.normalize(text) : stripEmphasis(text).trim();
  }

  async speak(text: string): Promise<void> {
    try {
      const spoken = this.prepare(text);
      if (!spoken) return;

      const playable = await this.tts.synthesize(spoken);
      await playable.play();
    } catch (error) {
      if (error instanceof SynthesisError) throw error;
      throw new SynthesisError(`Speech output failed: ${toError(error).message}`, { cause: error });
    }
  }
}
