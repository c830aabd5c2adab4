#!/usr/bin/env node
/**
 * Taskist CLI
 *
 * Usage:
 *   npm start -- [--user <id>] [--category <name>]   - Run the voice command loop
 *   npm start -- help                                - Show help
 */

import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { parseArgs } from 'util';
import { AudioCapture } from './audio/audio-capture';
import { CommandAudioInput } from './audio/recorder';
import { LineStopSignal } from './audio/stop-signal';
import { createTranscriber, createTTS } from './backends';
import { getCacheDir } from './cache';
import { loadRuntimeConfig, type ConfigurationOverrides } from './config';
import { PipelineOrchestrator } from './pipeline';
import { AudioPlayer } from './services/audio-player';
import { SpeechOutput } from './services/speech-output';
import { TextNormalizer } from './services/text-normalizer';
import { TurnLogger } from './services/turn-logger';
import { TaskStore } from './task-store';

// ============ Help ============

function printHelp(): void {
  console.log(`
taskist - Voice-driven to-do list (record → transcribe → interpret → speak)

Commands:
  run (default)           Start the command loop
  help                    Show this help message

Options:
  -u, --user <id>         User id (env USER_ID wins)
  -c, --category <name>   To-do category (env TODO_CATEGORY wins)

Spoken commands:
  add <task>              Add a task to the current category
  list                    Read back the tasks
  remove <task>           Remove the first matching task

Recording stops when you press Enter.

Environment:
  TASKIST_STT             native | cloud (default: cloud, Groq Whisper)
  TASKIST_TTS             native | cloud (default: cloud, ElevenLabs)
  GROQ_API_KEY            Key for cloud transcription
  ELEVENLABS_API_KEY      Key for cloud speech
  ELEVENLABS_VOICE_ID     Voice for cloud speech
  TASKIST_RECORDER        arecord | sox (default: arecord)
  TASKIST_PLAYER          Player binary (default: afplay on macOS, ffplay elsewhere)
  TASKIST_MAX_RECORD_MS   Stop recording automatically after this long
  TASKIST_NORMALIZE       off to speak responses verbatim
  TASKIST_LOG             off to silence turn logging
  TASKIST_ROLE            Assistant role description

Native binaries and models: ${getCacheDir()}
  Override with: export TASKIST_CACHE=/path/to/cache
`);
}

// ============ Command Loop ============

async function runLoop(overrides: ConfigurationOverrides): Promise<void> {
  const runtime = loadRuntimeConfig();
  const logger = new TurnLogger({ enabled: runtime.logging });
  const player = new AudioPlayer({ player: runtime.player });
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const pipeline = new PipelineOrchestrator({
      capture: new AudioCapture({
        device: new CommandAudioInput(runtime.recorder),
        stopSignal: new LineStopSignal(rl),
        maxDurationMs: runtime.maxRecordingMs,
        logger,
      }),
      transcriber: createTranscriber(runtime.stt),
      synthesizer: new SpeechOutput({
        tts: createTTS(runtime.tts, player),
        normalizer: runtime.tts.normalize ? new TextNormalizer() : null,
      }),
      store: new TaskStore(),
      logger,
    });

    await pipeline.initialize();

    for (;;) {
      await pipeline.run(overrides);

      const answer = await rl.question('Continue? (y/n): ');
      if (answer.trim().toLowerCase() !== 'y') {
        break;
      }
    }
  } finally {
    player.stop();
    rl.close();
  }
}

// ============ Main ============

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      user: { type: 'string', short: 'u' },
      category: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });

  const command = values.help ? 'help' : positionals[0];

  switch (command) {
    case 'run':
    case undefined:
      await runLoop({ userId: values.user, todoCategory: values.category });
      break;

    case 'help':
      printHelp();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
