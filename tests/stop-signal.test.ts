import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createInterface } from 'readline/promises';
import { PassThrough } from 'stream';
import { LineStopSignal, STOP_PROMPT } from '../src/audio/stop-signal';
import { settle } from './fakes';

function terminal() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (data: Buffer) => {
    written += data.toString();
  });
  const rl = createInterface({ input, output, terminal: false });
  return { input, rl, written: () => written };
}

describe('LineStopSignal', () => {
  it('prints the stop prompt and resolves on Enter', async () => {
    const { input, rl, written } = terminal();
    const controller = new AbortController();

    const waiting = new LineStopSignal(rl).wait(controller.signal);
    input.write('\n');
    await waiting;
    await settle();

    assert.equal(written(), STOP_PROMPT);
    assert.equal(STOP_PROMPT, 'Press Enter to stop recording. ');
    rl.close();
  });

  it('resolves when capture aborts before Enter', async () => {
    const { rl } = terminal();
    const controller = new AbortController();

    const waiting = new LineStopSignal(rl).wait(controller.signal);
    controller.abort();

    await waiting;
    rl.close();
  });

  it('returns at once for an already aborted capture', async () => {
    const { rl, written } = terminal();
    const controller = new AbortController();
    controller.abort();

    await new LineStopSignal(rl).wait(controller.signal);
    await settle();

    assert.equal(written(), '');
    rl.close();
  });
});
