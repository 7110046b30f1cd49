import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { resolveConfig, validateConfig } from './config';

describe('resolveConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = resolveConfig({});

    expect(config.hotkey).toBe('CommandOrControl+Shift+Space');
    expect(config.provider).toBe('worker-batch');
    expect(config.pythonBin).toBe('python3');
    expect(config.language).toBe('en-US');
    expect(config.enforceOffline).toBe(true);
    expect(config.frameDurationMs).toBe(100);
    expect(config.vadPreset).toBe('default');
    expect(config.vadThreshold).toBeUndefined();
    expect(config.autoEnd).toBe('default');
    expect(config.chunkDurationSeconds).toBe(60);
    expect(config.maxFinishRetries).toBe(30);
    expect(config.workerScriptPath.endsWith(path.join('python', 'transcribe_worker.py'))).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = resolveConfig({
      VOXPIPE_PROVIDER: 'worker-stream',
      VOXPIPE_HOTKEY: 'Alt+Shift+D',
      VOXPIPE_LANGUAGE: 'de-DE',
      VOXPIPE_ENFORCE_OFFLINE: 'FALSE',
      VOXPIPE_VAD_PRESET: 'strict',
      VOXPIPE_VAD_THRESHOLD: '0.65',
      VOXPIPE_AUTO_END: 'quick',
      VOXPIPE_CHUNK_SECONDS: '45',
      VOXPIPE_FFMPEG_INPUT: 'hw:1',
      VOXPIPE_LOG_DIR: '/tmp/voxpipe-logs'
    });

    expect(config.provider).toBe('worker-stream');
    expect(config.hotkey).toBe('Alt+Shift+D');
    expect(config.language).toBe('de-DE');
    expect(config.enforceOffline).toBe(false);
    expect(config.vadPreset).toBe('strict');
    expect(config.vadThreshold).toBe(0.65);
    expect(config.autoEnd).toBe('quick');
    expect(config.chunkDurationSeconds).toBe(45);
    expect(config.ffmpegInputDevice).toBe('hw:1');
    expect(config.logDir).toBe('/tmp/voxpipe-logs');
  });

  it('ignores values it does not recognise', () => {
    const config = resolveConfig({
      VOXPIPE_PROVIDER: 'cloud',
      VOXPIPE_VAD_PRESET: 'loud',
      VOXPIPE_AUTO_END: 'never',
      VOXPIPE_CHUNK_SECONDS: '50',
      VOXPIPE_FRAME_MS: 'fast',
      VOXPIPE_VAD_THRESHOLD: 'high'
    });

    expect(config.provider).toBe('worker-batch');
    expect(config.vadPreset).toBe('default');
    expect(config.autoEnd).toBe('default');
    expect(config.chunkDurationSeconds).toBe(60);
    expect(config.frameDurationMs).toBe(100);
    expect(config.vadThreshold).toBeUndefined();
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(resolveConfig({}))).toEqual([]);
  });

  it('reports every field out of range', () => {
    const config = {
      ...resolveConfig({}),
      hotkey: ' ',
      frameDurationMs: 10,
      vadThreshold: 1,
      vadMinSilenceMs: 100,
      maxFinishRetries: 0
    };

    expect(validateConfig(config)).toEqual([
      'VOXPIPE_HOTKEY must not be empty.',
      'VOXPIPE_FRAME_MS must be between 20 and 500 milliseconds.',
      'VOXPIPE_VAD_THRESHOLD must be greater than 0 and less than 1.',
      'VOXPIPE_VAD_MIN_SILENCE_MS must be between 200 and 10000 milliseconds.',
      'VOXPIPE_MAX_FINISH_RETRIES must be between 1 and 120.'
    ]);
  });
});
