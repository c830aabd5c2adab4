/**
 * Taskist - Type Definitions
 */

import type { AudioBuffer } from './audio/audio-buffer';

// ============ Message Types ============

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * Conversation state for a single pipeline run.
 * Append-only; created empty at the start of every run.
 */
export type ConversationState = Message[];

// ============ Audio Types ============

/** Fixed capture format: mono, signed 16-bit PCM */
export interface AudioFormat {
  sampleRate: number;
  channels: 1;
  bitDepth: 16;
  /** Samples per chunk read from the input stream */
  chunkSize: number;
}

export interface AudioResult {
  audio: Float32Array;
  sampleRate: number;
}

/**
 * AudioPlayable - Uniform interface for TTS output
 */
export interface AudioPlayable {
  /** Get raw audio data (null if the backend produced an encoded clip, e.g. MP3) */
  getRawAudio(): AudioResult | null;

  /** Play the audio, resolving once playback has finished */
  play(): Promise<void>;

  /** Stop playback */
  stop(): void;
}

// ============ Audio Input ============

/**
 * An opened input stream. `read` resolves with exactly `frames` samples,
 * fewer when the stream ends mid-chunk, or null once it is closed or ended.
 */
export interface AudioInputStream {
  read(frames: number): Promise<Int16Array | null>;
  close(): void;
}

export interface AudioInputDevice {
  open(format: AudioFormat): Promise<AudioInputStream>;
}

/**
 * External trigger that ends a recording.
 * Resolves when the trigger fires, or as soon as `signal` is aborted.
 */
export interface StopSignal {
  wait(signal: AbortSignal): Promise<void>;
}

// ============ Pipeline Interfaces ============

export interface ProgressInfo {
  status: 'initiate' | 'ready';
  backend: string;
}

export type ProgressCallback = (progress: ProgressInfo) => void;

/**
 * Speech-to-text collaborator. Rejects with TranscriptionError.
 */
export interface TranscriptionAdapter {
  initialize(onProgress?: ProgressCallback): Promise<void>;
  transcribe(buffer: AudioBuffer): Promise<string>;
  isReady(): boolean;
}

/**
 * Text-to-speech engine producing a playable clip
 */
export interface TTSPipeline {
  initialize(onProgress?: ProgressCallback): Promise<void>;
  synthesize(text: string): Promise<AudioPlayable>;
  isReady(): boolean;
}

/**
 * Speaks a response. Resolves only after playback completes.
 * Rejects with SynthesisError.
 */
export interface SynthesisAdapter {
  initialize(onProgress?: ProgressCallback): Promise<void>;
  speak(text: string): Promise<void>;
}

// ============ Backend Config Types ============

export interface NativeSTTConfig {
  binaryPath: string;
  modelPath: string;
  language: string;
}

export interface CloudSTTConfig {
  baseUrl: string;           // OpenAI-compatible base URL (e.g. "https://api.groq.com/openai/v1")
  apiKey?: string;
  model: string;             // e.g. "whisper-large-v3-turbo"
  language?: string;
}

export interface SherpaOnnxTTSConfig {
  binaryPath: string;
  modelDir: string;  // Directory containing .onnx, tokens.txt, espeak-ng-data/
  speakerId?: number;
  speedScale?: number;
}

export interface VoiceSettings {
  stability: number;
  similarityBoost: number;
  style: number;
  useSpeakerBoost: boolean;
}

export interface CloudTTSConfig {
  baseUrl: string;
  apiKey?: string;
  voiceId: string;
  modelId: string;
  outputFormat: string;
  voiceSettings: VoiceSettings;
}
