/**
 * Turn Logger
 *
 * Structured console logging for pipeline runs.
 * The pipeline emits events, the logger handles all formatting.
 */

// ============================================================================
// Structured Log Events
// ============================================================================

export type TurnLogEvent =
  | { type: 'run_start'; run: number; userId: string; category: string }
  | { type: 'recording' }
  | { type: 'recording_stopped'; chunks: number; durationMs: number }
  | { type: 'transcript'; content: string }
  | { type: 'context'; role: string; userId: string; category: string }
  | { type: 'response'; content: string }
  | { type: 'error'; stage: string; message: string }
  | { type: 'run_end' };

export interface TurnLoggerOptions {
  enabled?: boolean;
  colors?: boolean;
  /** Line sink, console.log by default */
  write?: (line: string) => void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  magenta: '\x1b[35m',
  red: '\x1b[31m',
};

type Palette = Record<keyof typeof COLORS, string>;

const NO_COLORS: Palette = {
  reset: '',
  dim: '',
  cyan: '',
  yellow: '',
  green: '',
  magenta: '',
  red: '',
};

const ICONS = {
  mic: '🎙',
  system: '⚙',
  user: '👤',
  response: '💬',
  error: '✗',
};

export class TurnLogger {
  private enabled: boolean;
  private palette: Palette;
  private write: (line: string) => void;

  constructor(options: TurnLoggerOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.palette = (options.colors ?? true) ? COLORS : NO_COLORS;
    this.write = options.write ?? ((line) => console.log(line));
  }

  log(event: TurnLogEvent): void {
    if (!this.enabled) return;

    const C = this.palette;
    const bar = `${C.dim}│${C.reset}`;

    switch (event.type) {
      case 'run_start':
        this.write(`\n${C.cyan}━━━━━━━━━━━━━━ TASKIST #${event.run} ━━━━━━━━━━━━━━${C.reset}`);
        this.write(`${C.dim}┌ ${event.userId} / ${event.category}${C.reset}`);
        break;

      case 'recording':
        this.write(`${bar} ${ICONS.mic} ${C.yellow}Recording your instruction...${C.reset}`);
        break;

      case 'recording_stopped':
        this.write(`${bar} ${C.dim}captured ${event.chunks} chunks (${(event.durationMs / 1000).toFixed(1)}s)${C.reset}`);
        break;

      case 'transcript':
        this.write(`${bar} ${ICONS.user} ${C.yellow}USER${C.reset}: ${event.content}`);
        break;

      case 'context':
        this.write(`${bar} ${ICONS.system} ${C.magenta}ROLE${C.reset}: ${C.dim}${event.role}${C.reset}`);
        this.write(`${bar}   ${C.dim}user=${event.userId} category=${event.category}${C.reset}`);
        break;

      case 'response': {
        const [first, ...rest] = event.content.split('\n');
        this.write(`${bar} ${ICONS.response} ${C.green}TASKIST${C.reset}: ${first}`);
        for (const line of rest) {
          this.write(`${bar}    ${line}`);
        }
        break;
      }

      case 'error':
        this.write(`${bar} ${ICONS.error} ${C.red}ERROR${C.reset} (${event.stage}): ${event.message}`);
        break;

      case 'run_end':
        this.write(`${C.dim}└───────────────────────────────────────────────${C.reset}\n`);
        break;
    }
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}

// ============================================================================
// Singleton instance for convenience
// ============================================================================

let defaultLogger: TurnLogger | null = null;

export function getDefaultLogger(): TurnLogger {
  if (!defaultLogger) {
    defaultLogger = new TurnLogger();
  }
  return defaultLogger;
}
