import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PipelineStateManager, type PipelineState } from '../src/state/pipeline-state';

describe('PipelineStateManager', () => {
  it('walks capture, interpret, speak, done and back to capture', () => {
    const manager = new PipelineStateManager();
    const seen: Array<[PipelineState, PipelineState]> = [];
    manager.subscribe((state, previous) => seen.push([state, previous]));

    manager.setState('capture');
    manager.setState('interpret');
    manager.setState('speak');
    manager.setState('done');
    manager.setState('capture');

    assert.deepEqual(seen, [
      ['capture', 'idle'],
      ['interpret', 'capture'],
      ['speak', 'interpret'],
      ['done', 'speak'],
      ['capture', 'done'],
    ]);
  });

  it('refuses to skip a stage', () => {
    const manager = new PipelineStateManager();

    assert.throws(() => manager.setState('interpret'), /Invalid pipeline transition: idle -> interpret/);
    manager.setState('capture');
    assert.throws(() => manager.setState('speak'), /Invalid pipeline transition: capture -> speak/);
    assert.equal(manager.getState(), 'capture');
  });

  it('ignores a transition to the current state', () => {
    const manager = new PipelineStateManager();
    let calls = 0;
    manager.subscribe(() => calls++);

    manager.setState('capture');
    manager.setState('capture');

    assert.equal(calls, 1);
  });

  it('reports whether a run is in progress and can reset to idle', () => {
    const manager = new PipelineStateManager();
    assert.equal(manager.isRunning(), false);

    manager.setState('capture');
    manager.setState('interpret');
    assert.equal(manager.isRunning(), true);

    manager.reset();
    assert.equal(manager.is('idle'), true);
    assert.equal(manager.isRunning(), false);
  });

  it('stops notifying after unsubscribe', () => {
    const manager = new PipelineStateManager();
    let calls = 0;
    const unsubscribe = manager.subscribe(() => calls++);

    manager.setState('capture');
    unsubscribe();
    manager.setState('interpret');

    assert.equal(calls, 1);
  });
});
