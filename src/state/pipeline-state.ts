/**
 * Pipeline State Management
 * Linear state machine for one run: capture -> interpret -> speak -> done
 */

export type PipelineState = 'idle' | 'capture' | 'interpret' | 'speak' | 'done';

export type StateChangeCallback = (state: PipelineState, previousState: PipelineState) => void;

/** Display labels for each state */
export const STATE_LABELS: Record<PipelineState, string> = {
  idle: 'Idle',
  capture: 'Listening...',
  interpret: 'Processing...',
  speak: 'Speaking...',
  done: 'Done',
};

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ['capture'],
  capture: ['interpret'],
  interpret: ['speak'],
  speak: ['done'],
  done: ['capture'],
};

export class PipelineStateManager {
  private state: PipelineState = 'idle';
  private listeners: StateChangeCallback[] = [];

  getState(): PipelineState {
    return this.state;
  }

  /** Transition to the next state; throws on a skipped or backward step */
  setState(newState: PipelineState): void {
    if (this.state === newState) return;

    if (!TRANSITIONS[this.state].includes(newState)) {
      throw new Error(`Invalid pipeline transition: ${this.state} -> ${newState}`);
    }

    this.notify(newState);
  }

  /** Return to idle after an aborted run */
  reset(): void {
    if (this.state === 'idle') return;
    this.notify('idle');
  }

  subscribe(callback: StateChangeCallback): () => void {
    this.listeners.push(callback);

    return () => {
      const index = this.listeners.indexOf(callback);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  is(state: PipelineState): boolean {
    return this.state === state;
  }

  /** Whether a run is between capture and done */
  isRunning(): boolean {
    return this.state === 'capture' || this.state === 'interpret' || this.state === 'speak';
  }

  private notify(newState: PipelineState): void {
    const previousState = this.state;
    this.state = newState;

    for (const listener of this.listeners) {
      listener(newState, previousState);
    }
  }
}
