import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TaskStore, normalizeTask } from '../src/task-store';

describe('TaskStore', () => {
  it('reads an unseen user/category as an empty list and creates it', () => {
    const store = new TaskStore();

    assert.deepEqual(store.tasks('ss', 'personal'), []);
    assert.deepEqual(store.users(), ['ss']);
    assert.deepEqual(store.categories('ss'), ['personal']);
  });

  it('keeps insertion order and duplicates', () => {
    const store = new TaskStore();
    store.add('ss', 'personal', 'buy milk');
    store.add('ss', 'personal', 'call mom');
    store.add('ss', 'personal', 'buy milk');

    assert.deepEqual(store.tasks('ss', 'personal'), ['buy milk', 'call mom', 'buy milk']);
  });

  it('removes only the first normalized match and returns the stored text', () => {
    const store = new TaskStore();
    store.add('ss', 'personal', 'Buy Milk');
    store.add('ss', 'personal', 'call mom');
    store.add('ss', 'personal', 'buy milk');

    assert.equal(store.remove('ss', 'personal', '  BUY milk '), 'Buy Milk');
    assert.deepEqual(store.tasks('ss', 'personal'), ['call mom', 'buy milk']);
  });

  it('returns undefined and leaves the list alone when nothing matches', () => {
    const store = new TaskStore();
    store.add('ss', 'personal', 'call mom');

    assert.equal(store.remove('ss', 'personal', 'eggs'), undefined);
    assert.deepEqual(store.tasks('ss', 'personal'), ['call mom']);
  });

  it('keeps users and categories apart', () => {
    const store = new TaskStore();
    store.add('ss', 'personal', 'buy milk');
    store.add('ss', 'work', 'send report');
    store.add('jo', 'personal', 'water plants');

    assert.deepEqual(store.tasks('ss', 'personal'), ['buy milk']);
    assert.deepEqual(store.tasks('ss', 'work'), ['send report']);
    assert.deepEqual(store.tasks('jo', 'personal'), ['water plants']);
    assert.deepEqual(store.categories('ss'), ['personal', 'work']);
  });

  it('normalizes by lowercasing and trimming', () => {
    assert.equal(normalizeTask('  Buy MILK \n'), 'buy milk');
  });
});
