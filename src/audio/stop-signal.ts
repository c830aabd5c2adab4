/**
 * Stop signal read from the terminal: recording ends on the next line (Enter).
 */

import type { Interface } from 'readline/promises';
import type { StopSignal } from '../types';

export const STOP_PROMPT = 'Press Enter to stop recording. ';

export class LineStopSignal implements StopSignal {
  constructor(private rl: Interface, private prompt = STOP_PROMPT) {}

  async wait(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;

    try {
      await this.rl.question(this.prompt, { signal });
    } catch (error) {
      // Capture finished on its own and cancelled the question
      if (signal.aborted) return;
      throw error;
    }
  }
}
