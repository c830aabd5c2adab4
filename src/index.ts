/**
 * Taskist Library
 * Voice-driven to-do list: capture → interpret → speak
 */

// Main orchestrator
export { PipelineOrchestrator } from './pipeline';
export type { PipelineConfig, PipelineCallbacks, PipelineStage } from './pipeline';

// Commands and tasks
export { TaskStore, normalizeTask } from './task-store';
export { interpret, parseCommand, executeCommand } from './command-interpreter';
export type { Command } from './command-interpreter';

// Configuration
export {
  resolveConfiguration,
  loadRuntimeConfig,
  defaultConfiguration,
  AUDIO_FORMAT,
  TRANSCRIPTION_PLACEHOLDER,
} from './config';
export type { Configuration, ConfigurationOverrides, RuntimeConfig, Env } from './config';

// Errors
export { CaptureDeviceError, TranscriptionError, SynthesisError } from './errors';

// Types
export type * from './types';

// Audio
export { AudioBuffer } from './audio/audio-buffer';
export { AudioCapture } from './audio/audio-capture';
export type { AudioCaptureOptions } from './audio/audio-capture';
export { CommandAudioInput, ProcessAudioStream, recorderCommand } from './audio/recorder';
export type { RecorderProcess } from './audio/recorder';
export { LineStopSignal, STOP_PROMPT } from './audio/stop-signal';
export { encodeWav, parseWav } from './audio/wav';

// State
export { PipelineStateManager, STATE_LABELS } from './state/pipeline-state';
export type { PipelineState, StateChangeCallback } from './state/pipeline-state';

// Backends
export * from './backends';

// Services
export * from './services';

// Cache utilities (for native backends)
export { getCacheDir, getModelsDir, getBinDir, defaultPaths } from './cache';
