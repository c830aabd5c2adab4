/**
 * Sherpa-ONNX TTS (Native)
 * Requires the sherpa-onnx-offline-tts binary and a Piper VITS model directory.
 *
 * See: https://github.com/k2-fsa/sherpa-onnx
 */

import { execFileSync } from 'child_process';
import { existsSync, readFileSync, unlinkSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseWav } from '../../audio/wav';
import { SynthesisError, toError } from '../../errors';
import { AudioPlayer, ClipPlayable } from '../../services/audio-player';
import type { TTSPipeline, SherpaOnnxTTSConfig, ProgressCallback, AudioPlayable } from '../../types';

export class NativeSherpaOnnxTTS implements TTSPipeline {
  private config: SherpaOnnxTTSConfig;
  private player: AudioPlayer;
  private ready = false;
  private modelPath = '';
  private tokensPath = '';
  private dataDir = '';

  constructor(config: SherpaOnnxTTSConfig, player: AudioPlayer = new AudioPlayer()) {
    this.config = {
      speakerId: 0,
      speedScale: 1.0,
      ...config,
    };
    this.player = player;
  }

  async initialize(onProgress?: ProgressCallback): Promise<void> {
    console.log('Initializing native TTS (sherpa-onnx)...');
    onProgress?.({ status: 'initiate', backend: 'sherpa-onnx' });

    if (!existsSync(this.config.binaryPath)) {
      throw new Error(`sherpa-onnx-offline-tts binary not found at: ${this.config.binaryPath}`);
    }
    if (!existsSync(this.config.modelDir)) {
      throw new Error(`TTS model directory not found at: ${this.config.modelDir}`);
    }

    const modelDir = this.config.modelDir;

    const onnxFiles = ['en_US-lessac-medium.onnx', 'model.onnx']
      .map(f => join(modelDir, f))
      .filter(f => existsSync(f));

    if (onnxFiles.length === 0) {
      throw new Error(`No .onnx model file found in: ${modelDir}`);
    }
    this.modelPath = onnxFiles[0];

    this.tokensPath = join(modelDir, 'tokens.txt');
    if (!existsSync(this.tokensPath)) {
      throw new Error(`tokens.txt not found in: ${modelDir}`);
    }

    this.dataDir = join(modelDir, 'espeak-ng-data');
    if (!existsSync(this.dataDir)) {
      throw new Error(`espeak-ng-data directory not found in: ${modelDir}`);
    }

    this.ready = true;
    onProgress?.({ status: 'ready', backend: 'sherpa-onnx' });
    console.log('Native TTS (sherpa-onnx) ready.');
  }

  async synthesize(text: string): Promise<AudioPlayable> {
    if (!this.ready) {
      throw new SynthesisError('TTS pipeline not initialized');
    }

    // sherpa-onnx only writes to a file
    const tmpFile = join(tmpdir(), `sherpa-tts-${Date.now()}.wav`);

    try {
      execFileSync(
        this.config.binaryPath,
        [
          `--vits-model=${this.modelPath}`,
          `--vits-tokens=${this.tokensPath}`,
          `--vits-data-dir=${this.dataDir}`,
          `--vits-length-scale=${1 / (this.config.speedScale ?? 1.0)}`,
          `--sid=${this.config.speakerId}`,
          `--output-filename=${tmpFile}`,
          text,
        ],
        { stdio: ['pipe', 'pipe', 'pipe'], maxBuffer: 50 * 1024 * 1024 }
      );

      const wav = readFileSync(tmpFile);
      return new ClipPlayable(wav, 'wav', this.player, parseWav(wav));
    } catch (error) {
      throw new SynthesisError(`sherpa-onnx failed: ${toError(error).message}`, { cause: error });
    } finally {
      if (existsSync(tmpFile)) {
        unlinkSync(tmpFile);
      }
    }
  }

  isReady(): boolean {
    return this.ready;
  }
}
