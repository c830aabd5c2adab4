import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_TASKIST_ROLE, loadRuntimeConfig, resolveConfiguration } from '../src/config';

describe('resolveConfiguration', () => {
  it('falls back to the defaults', () => {
    assert.deepEqual(resolveConfiguration({}, {}), {
      userId: 'default-user',
      todoCategory: 'general',
      taskistRole: DEFAULT_TASKIST_ROLE,
    });
  });

  it('uses caller overrides when the environment is silent', () => {
    const config = resolveConfiguration({ userId: 'ss', todoCategory: 'personal' }, {});

    assert.equal(config.userId, 'ss');
    assert.equal(config.todoCategory, 'personal');
    assert.equal(config.taskistRole, DEFAULT_TASKIST_ROLE);
  });

  it('lets environment variables win over overrides', () => {
    const config = resolveConfiguration(
      { userId: 'ss', taskistRole: 'caller role' },
      { USER_ID: 'env-user', TASKIST_ROLE: 'env role' }
    );

    assert.equal(config.userId, 'env-user');
    assert.equal(config.taskistRole, 'env role');
  });

  it('treats an empty environment value as set', () => {
    const config = resolveConfiguration({ todoCategory: 'personal' }, { TODO_CATEGORY: '' });

    assert.equal(config.todoCategory, '');
  });

  it('returns a frozen record', () => {
    assert.equal(Object.isFrozen(resolveConfiguration({}, {})), true);
  });
});

describe('loadRuntimeConfig', () => {
  it('defaults to the cloud backends and arecord', () => {
    const runtime = loadRuntimeConfig({});

    assert.equal(runtime.stt.backend, 'cloud');
    assert.equal(runtime.stt.cloud.baseUrl, 'https://api.groq.com/openai/v1');
    assert.equal(runtime.stt.cloud.model, 'whisper-large-v3-turbo');
    assert.equal(runtime.tts.backend, 'cloud');
    assert.equal(runtime.tts.cloud.voiceId, 'Xb7hH8MSUJpSbSDYk0k2');
    assert.equal(runtime.tts.normalize, true);
    assert.equal(runtime.recorder, 'arecord');
    assert.equal(runtime.maxRecordingMs, undefined);
    assert.equal(runtime.player, undefined);
    assert.equal(runtime.logging, true);
  });

  it('reads backend choices, keys and limits from the environment', () => {
    const runtime = loadRuntimeConfig({
      TASKIST_STT: 'native',
      TASKIST_TTS: 'native',
      TASKIST_RECORDER: 'sox',
      TASKIST_MAX_RECORD_MS: '5000',
      TASKIST_LOG: 'off',
      TASKIST_NORMALIZE: 'off',
      TASKIST_PLAYER: 'mpg123',
      GROQ_API_KEY: 'test-key',
      ELEVENLABS_API_KEY: 'test-secret',
    });

    assert.equal(runtime.stt.backend, 'native');
    assert.equal(runtime.tts.backend, 'native');
    assert.equal(runtime.recorder, 'sox');
    assert.equal(runtime.maxRecordingMs, 5000);
    assert.equal(runtime.logging, false);
    assert.equal(runtime.tts.normalize, false);
    assert.equal(runtime.player, 'mpg123');
    assert.equal(runtime.stt.cloud.apiKey, 'test-key');
    assert.equal(runtime.tts.cloud.apiKey, 'test-secret');
  });

  it('rejects unknown backend names', () => {
    assert.throws(() => loadRuntimeConfig({ TASKIST_STT: 'local' }), /Invalid TASKIST_STT: local/);
    assert.throws(() => loadRuntimeConfig({ TASKIST_RECORDER: 'mic' }), /Invalid TASKIST_RECORDER: mic/);
  });

  it('rejects a non-positive recording limit', () => {
    assert.throws(() => loadRuntimeConfig({ TASKIST_MAX_RECORD_MS: 'soon' }), /Invalid TASKIST_MAX_RECORD_MS/);
    assert.throws(() => loadRuntimeConfig({ TASKIST_MAX_RECORD_MS: '0' }), /Invalid TASKIST_MAX_RECORD_MS/);
  });
});
