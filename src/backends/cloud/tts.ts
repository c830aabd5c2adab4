/**
 * Cloud TTS (ElevenLabs text-to-speech API)
 *
 * Returns an MP3 clip played through the AudioPlayer.
 */

import { SynthesisError, toError } from '../../errors';
import { AudioPlayer, ClipPlayable } from '../../services/audio-player';
import type { AudioPlayable, CloudTTSConfig, ProgressCallback, TTSPipeline } from '../../types';

export class CloudSpeechTTS implements TTSPipeline {
  private config: CloudTTSConfig;
  private player: AudioPlayer;
  private ready = false;

  constructor(config: CloudTTSConfig, player: AudioPlayer = new AudioPlayer()) {
    if (!config.outputFormat.startsWith('mp3_')) {
      throw new Error(`Unsupported output format: ${config.outputFormat} (expected mp3_*)`);
    }
    this.config = config;
    this.player = player;
  }

  async initialize(onProgress?: ProgressCallback): Promise<void> {
    console.log(`Initializing Cloud TTS (${this.config.baseUrl})...`);
    console.log(`  Voice: ${this.config.voiceId}, model: ${this.config.modelId}`);
    onProgress?.({ status: 'initiate', backend: 'cloud-tts' });

    if (!this.config.apiKey) {
      console.log('  Note: no API key configured');
    }

    this.ready = true;
    onProgress?.({ status: 'ready', backend: 'cloud-tts' });
    console.log('Cloud TTS ready.');
  }

  async synthesize(text: string): Promise<AudioPlayable> {
    if (!this.ready) {
      throw new SynthesisError('TTS pipeline not initialized');
    }

    const { voiceSettings } = this.config;
    const url =
      `${this.config.baseUrl}/v1/text-to-speech/${encodeURIComponent(this.config.voiceId)}` +
      `?output_format=${encodeURIComponent(this.config.outputFormat)}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          ...this.getHeaders(),
          'Content-Type': 'application/json',
          Accept: 'audio/mpeg',
        },
        body: JSON.stringify({
          text,
          model_id: this.config.modelId,
          voice_settings: {
            stability: voiceSettings.stability,
            similarity_boost: voiceSettings.similarityBoost,
            style: voiceSettings.style,
            use_speaker_boost: voiceSettings.useSpeakerBoost,
          },
        }),
      });
    } catch (error) {
      throw new SynthesisError(`Cloud TTS request failed: ${toError(error).message}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new SynthesisError(`Cloud TTS API error (${response.status}): ${errorText}`);
    }

    const clip = Buffer.from(await response.arrayBuffer());
    return new ClipPlayable(clip, 'mp3', this.player);
  }

  isReady(): boolean {
    return this.ready;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.config.apiKey) {
      headers['xi-api-key'] = this.config.apiKey;
    }
    return headers;
  }
}
