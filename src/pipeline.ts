/**
 * Pipeline Orchestrator
 * One run: capture → interpret → speak
 *
 * Every run starts with an empty conversation and always visits all three
 * stages. Adapter failures never escape a run: a failed capture or
 * transcription becomes the placeholder utterance, a failed playback is logged.
 * The task store is shared by all runs; the conversation is not.
 */

import type { AudioBuffer } from './audio/audio-buffer';
import type { AudioCapture } from './audio/audio-capture';
import { interpret } from './command-interpreter';
import { resolveConfiguration, TRANSCRIPTION_PLACEHOLDER, type Configuration, type ConfigurationOverrides, type Env } from './config';
import { TranscriptionError, toError } from './errors';
import { getDefaultLogger, type TurnLogger } from './services/turn-logger';
import { PipelineStateManager, type PipelineState, type StateChangeCallback } from './state/pipeline-state';
import type { TaskStore } from './task-store';
import type { ConversationState, ProgressCallback, SynthesisAdapter, TranscriptionAdapter } from './types';

export type PipelineStage = 'capture' | 'transcribe' | 'speak';

export interface PipelineConfig {
  capture: AudioCapture;
  transcriber: TranscriptionAdapter;
  synthesizer: SynthesisAdapter;
  /** Shared task lists, created once by the caller */
  store: TaskStore;
  /** Environment consulted on every run (process.env by default) */
  env?: Env;
  logger?: TurnLogger;
}

export interface PipelineCallbacks {
  onStateChange?: StateChangeCallback;
  onTranscript?: (text: string) => void;
  onResponse?: (text: string) => void;
  /** Called for every absorbed adapter failure */
  onError?: (error: Error, stage: PipelineStage) => void;
}

export class PipelineOrchestrator {
  private capture: AudioCapture;
  private transcriber: TranscriptionAdapter;
  private synthesizer: SynthesisAdapter;
  private store: TaskStore;
  private env: Env;
  private logger: TurnLogger;
  private state = new PipelineStateManager();
  private running = false;
  private runCount = 0;

  constructor(config: PipelineConfig) {
    this.capture = config.capture;
    this.transcriber = config.transcriber;
    this.synthesizer = config.synthesizer;
    this.store = config.store;
    this.env = config.env ?? process.env;
    this.logger = config.logger ?? getDefaultLogger();
  }

  async initialize(onProgress?: ProgressCallback): Promise<void> {
    await Promise.all([
      this.transcriber.initialize(onProgress),
      this.synthesizer.initialize(onProgress),
    ]);
  }

  getState(): PipelineState {
    return this.state.getState();
  }

  subscribe(callback: StateChangeCallback): () => void {
    return this.state.subscribe(callback);
  }

  /**
   * Execute one full run and return its conversation
   */
  async run(overrides: ConfigurationOverrides = {}, callbacks: PipelineCallbacks = {}): Promise<ConversationState> {
    if (this.running) {
      throw new Error('A pipeline run is already in progress');
    }
    this.running = true;

    const unsubscribe = callbacks.onStateChange ? this.state.subscribe(callbacks.onStateChange) : null;

    try {
      const config = resolveConfiguration(overrides, this.env);
      const conversation: ConversationState = [];

      this.runCount++;
      this.logger.log({ type: 'run_start', run: this.runCount, userId: config.userId, category: config.todoCategory });

      this.state.setState('capture');
      const utterance = await this.captureUtterance(callbacks);
      conversation.push({ role: 'user', content: utterance });
      callbacks.onTranscript?.(utterance);

      this.state.setState('interpret');
      const response = this.interpretLatest(conversation, config);
      conversation.push({ role: 'assistant', content: response });
      callbacks.onResponse?.(response);

      this.state.setState('speak');
      await this.speakLatest(conversation, callbacks);

      this.state.setState('done');
      this.logger.log({ type: 'run_end' });
      return conversation;
    } finally {
      if (!this.state.is('done')) {
        this.state.reset();
      }
      unsubscribe?.();
      this.running = false;
    }
  }

  /**
   * Record and transcribe; any failure yields the placeholder utterance
   */
  private async captureUtterance(callbacks: PipelineCallbacks): Promise<string> {
    let buffer: AudioBuffer;
    try {
      buffer = await this.capture.capture();
    } catch (error) {
      this.reportError('capture', error, callbacks);
      return this.placeholder();
    }

    try {
      if (buffer.chunkCount === 0) {
        throw new TranscriptionError('No audio captured');
      }
      const transcript = (await this.transcriber.transcribe(buffer)).trim();
      if (!transcript) {
        throw new TranscriptionError('Could not transcribe audio');
      }
      this.logger.log({ type: 'transcript', content: transcript });
      return transcript;
    } catch (error) {
      this.reportError('transcribe', error, callbacks);
      return this.placeholder();
    }
  }

  private interpretLatest(conversation: ConversationState, config: Configuration): string {
    const latest = conversation.at(-1);
    if (!latest) {
      throw new Error('Conversation is empty at interpret');
    }

    this.logger.log({ type: 'context', role: config.taskistRole, userId: config.userId, category: config.todoCategory });
    const response = interpret(latest.content, config, this.store);
    this.logger.log({ type: 'response', content: response });
    return response;
  }

  /**
   * Speak the latest entry. Playback failures are logged and the run continues.
   */
  private async speakLatest(conversation: ConversationState, callbacks: PipelineCallbacks): Promise<void> {
    const latest = conversation.at(-1);
    if (!latest) {
      throw new Error('Conversation is empty at speak');
    }

    try {
      await this.synthesizer.speak(latest.content);
    } catch (error) {
      this.reportError('speak', error, callbacks);
    }
  }

  private placeholder(): string {
    this.logger.log({ type: 'transcript', content: TRANSCRIPTION_PLACEHOLDER });
    return TRANSCRIPTION_PLACEHOLDER;
  }

  private reportError(stage: PipelineStage, error: unknown, callbacks: PipelineCallbacks): void {
    const err = toError(error);
    this.logger.log({ type: 'error', stage, message: `${err.name}: ${err.message}` });
    callbacks.onError?.(err, stage);
  }
}
