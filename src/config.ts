/**
 * Configuration
 *
 * Two layers:
 * - `Configuration`: the per-run record read by the interpreter. Resolved once
 *   per pipeline run, environment over caller overrides over defaults.
 * - `RuntimeConfig`: which backends and binaries the CLI wires up.
 */

import { defaultPaths } from './cache';
import type { AudioFormat, CloudSTTConfig, CloudTTSConfig, NativeSTTConfig, SherpaOnnxTTSConfig } from './types';

export type Env = Record<string, string | undefined>;

// ============ Per-run Configuration ============

export interface Configuration {
  readonly userId: string;
  readonly todoCategory: string;
  readonly taskistRole: string;
}

export type ConfigurationOverrides = Partial<Configuration>;

export const DEFAULT_TASKIST_ROLE =
  "You are a helpful task management assistant. You help create, organize, and manage the user's ToDo list.";

export const defaultConfiguration: Configuration = {
  userId: 'default-user',
  todoCategory: 'general',
  taskistRole: DEFAULT_TASKIST_ROLE,
};

/**
 * Resolve the per-run configuration.
 * An environment variable that is set (even to an empty string) wins.
 */
export function resolveConfiguration(
  overrides: ConfigurationOverrides = {},
  env: Env = process.env
): Configuration {
  return Object.freeze({
    userId: env.USER_ID ?? overrides.userId ?? defaultConfiguration.userId,
    todoCategory: env.TODO_CATEGORY ?? overrides.todoCategory ?? defaultConfiguration.todoCategory,
    taskistRole: env.TASKIST_ROLE ?? overrides.taskistRole ?? defaultConfiguration.taskistRole,
  });
}

// ============ Constants ============

export const AUDIO_FORMAT: AudioFormat = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16,
  chunkSize: 1024,
};

/** Utterance substituted when capture or transcription fails */
export const TRANSCRIPTION_PLACEHOLDER = 'Transcription failed. Please try again.';

// ============ Runtime Configuration ============

export type BackendKind = 'native' | 'cloud';
export type RecorderKind = 'arecord' | 'sox';

export interface RuntimeConfig {
  stt: {
    backend: BackendKind;
    native: NativeSTTConfig;
    cloud: CloudSTTConfig;
  };
  tts: {
    backend: BackendKind;
    native: SherpaOnnxTTSConfig;
    cloud: CloudTTSConfig;
    /** Run the TTS text normalizer (numbers to words, symbols) before synthesis */
    normalize: boolean;
  };
  recorder: RecorderKind;
  /** Stop recording automatically after this many milliseconds */
  maxRecordingMs?: number;
  /** Player binary override; auto-detected when unset */
  player?: string;
  logging: boolean;
}

function parseBackend(name: string, value: string | undefined, fallback: BackendKind): BackendKind {
  if (value === undefined || value === '') return fallback;
  if (value === 'native' || value === 'cloud') return value;
  throw new Error(`Invalid ${name}: ${value} (expected "native" or "cloud")`);
}

function parseRecorder(value: string | undefined): RecorderKind {
  if (value === undefined || value === '') return 'arecord';
  if (value === 'arecord' || value === 'sox') return value;
  throw new Error(`Invalid TASKIST_RECORDER: ${value} (expected "arecord" or "sox")`);
}

function parseDuration(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new Error(`Invalid TASKIST_MAX_RECORD_MS: ${value} (expected a positive integer)`);
  }
  return ms;
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  return {
    stt: {
      backend: parseBackend('TASKIST_STT', env.TASKIST_STT, 'cloud'),
      native: {
        ...defaultPaths.whisper,
        language: 'en',
      },
      cloud: {
        baseUrl: env.TASKIST_STT_URL || 'https://api.groq.com/openai/v1',
        apiKey: env.GROQ_API_KEY,
        model: 'whisper-large-v3-turbo',
        language: 'en',
      },
    },
    tts: {
      backend: parseBackend('TASKIST_TTS', env.TASKIST_TTS, 'cloud'),
      native: {
        ...defaultPaths.sherpaOnnxTts,
      },
      cloud: {
        baseUrl: env.TASKIST_TTS_URL || 'https://api.elevenlabs.io',
        apiKey: env.ELEVENLABS_API_KEY,
        voiceId: env.ELEVENLABS_VOICE_ID || 'Xb7hH8MSUJpSbSDYk0k2',
        modelId: 'eleven_flash_v2_5',
        outputFormat: 'mp3_22050_32',
        voiceSettings: {
          stability: 0.0,
          similarityBoost: 1.0,
          style: 0.0,
          useSpeakerBoost: true,
        },
      },
      normalize: env.TASKIST_NORMALIZE !== 'off',
    },
    recorder: parseRecorder(env.TASKIST_RECORDER),
    maxRecordingMs: parseDuration(env.TASKIST_MAX_RECORD_MS),
    player: env.TASKIST_PLAYER || undefined,
    logging: env.TASKIST_LOG !== 'off',
  };
}
