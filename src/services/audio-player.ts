/**
 * Audio Player Service
 * Plays synthesized clips through a command-line player (ffplay, afplay, aplay, mpg123).
 * play() resolves when the player exits, so consecutive responses never overlap.
 */

import { spawn, type ChildProcess } from 'child_process';
import { unlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { AudioPlayable, AudioResult } from '../types';

export type ClipFormat = 'wav' | 'mp3';

export interface AudioPlayerOptions {
  /** Player binary; defaults to afplay on macOS and ffplay elsewhere */
  player?: string;
}

export interface PlayerCommand {
  command: string;
  args: string[];
}

export function playerCommand(player: string, file: string): PlayerCommand {
  switch (player) {
    case 'ffplay':
      return { command: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'quiet', file] };
    case 'aplay':
      return { command: 'aplay', args: ['-q', file] };
    case 'mpg123':
      return { command: 'mpg123', args: ['-q', file] };
    default:
      return { command: player, args: [file] };
  }
}

export class AudioPlayer {
  private player: string;
  private current: ChildProcess | null = null;

  constructor(options: AudioPlayerOptions = {}) {
    this.player = options.player ?? (process.platform === 'darwin' ? 'afplay' : 'ffplay');
  }

  /** Play an encoded clip and wait for playback to finish */
  async play(clip: Buffer, format: ClipFormat): Promise<void> {
    if (clip.length === 0) return;

    const file = join(tmpdir(), `taskist-${Date.now()}-${Math.random().toString(36).slice(2)}.${format}`);
    await writeFile(file, clip);

    try {
      await this.run(playerCommand(this.player, file));
    } finally {
      await unlink(file);
    }
  }

  /** Stop the clip that is currently playing */
  stop(): void {
    this.current?.kill('SIGTERM');
    this.current = null;
  }

  private run({ command, args }: PlayerCommand): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'ignore' });
      this.current = child;

      child.on('error', (err) => {
        this.current = null;
        reject(new Error(`Failed to run ${command}: ${err.message}`));
      });

      child.on('close', (code, signal) => {
        this.current = null;
        if (code === 0 || signal === 'SIGTERM') {
          resolve();
        } else {
          reject(new Error(`${command} exited with code ${code}`));
        }
      });
    });
  }
}

/**
 * ClipPlayable - An encoded clip played through the AudioPlayer.
 * Used by: Native TTS (WAV), Cloud TTS (MP3)
 */
export class ClipPlayable implements AudioPlayable {
  constructor(
    private clip: Buffer,
    private format: ClipFormat,
    private player: AudioPlayer,
    private raw: AudioResult | null = null
  ) {}

  getRawAudio(): AudioResult | null {
    return this.raw;
  }

  play(): Promise<void> {
    return this.player.play(this.clip, this.format);
  }

  stop(): void {
    this.player.stop();
  }
}
