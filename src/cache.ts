/**
 * Cache utilities for taskist
 * Native binaries and models are stored in ~/.cache/taskist/ by default
 */

import { homedir } from 'os';
import { join } from 'path';

/**
 * Get the cache directory for native assets.
 * Default: ~/.cache/taskist
 * Override with TASKIST_CACHE environment variable.
 */
export function getCacheDir(): string {
  return process.env.TASKIST_CACHE || join(homedir(), '.cache', 'taskist');
}

export function getModelsDir(): string {
  return join(getCacheDir(), 'models');
}

export function getBinDir(): string {
  return join(getCacheDir(), 'bin');
}

/**
 * Default paths for native backends.
 * Use these when configuring NativeWhisperSTT and NativeSherpaOnnxTTS.
 */
export const defaultPaths = {
  get whisper() {
    return {
      binaryPath: join(getBinDir(), 'whisper-cli'),
      modelPath: join(getModelsDir(), 'whisper-large-v3-turbo-q8.bin'),
    };
  },
  get sherpaOnnxTts() {
    return {
      binaryPath: join(getBinDir(), 'sherpa-onnx-offline-tts'),
      modelDir: join(getModelsDir(), 'vits-piper-en_US-lessac-medium'),
    };
  },
};
