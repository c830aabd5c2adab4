/**
 * Backend selection for the CLI
 */

import type { RuntimeConfig } from '../config';
import type { AudioPlayer } from '../services/audio-player';
import type { TranscriptionAdapter, TTSPipeline } from '../types';
import { CloudSpeechTTS, CloudWhisperSTT } from './cloud';
import { NativeSherpaOnnxTTS, NativeWhisperSTT } from './native';

export * from './cloud';
export * from './native';

export function createTranscriber(config: RuntimeConfig['stt']): TranscriptionAdapter {
  return config.backend === 'native'
    ? new NativeWhisperSTT(config.native)
    : new CloudWhisperSTT(config.cloud);
}

export function createTTS(config: RuntimeConfig['tts'], player: AudioPlayer): TTSPipeline {
  return config.backend === 'native'
    ? new NativeSherpaOnnxTTS(config.native, player)
    : new CloudSpeechTTS(config.cloud, player);
}
