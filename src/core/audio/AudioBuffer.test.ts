import { describe, expect, it, vi } from 'vitest';
import { createTestLogger } from '../../testing/testLogger';
import { AudioBuffer } from './AudioBuffer';

const frames = (length: number, value = 0.1): Float32Array => new Float32Array(length).fill(value);

describe('AudioBuffer', () => {
  it('tracks duration and speech ratio across appends', () => {
    const buffer = new AudioBuffer(16000);

    buffer.append(frames(16000), true);
    buffer.append(frames(48000), false);

    expect(buffer.sampleCount).toBe(64000);
    expect(buffer.duration).toBe(4);
    expect(buffer.speechRatio).toBe(0.25);
  });

  it('drains everything in append order and resets', () => {
    const buffer = new AudioBuffer(16000);
    buffer.append(Float32Array.from([0.25, 0.5]), true);
    buffer.append(Float32Array.from([-0.5]), false);

    const drained = buffer.takeAll();

    expect(Array.from(drained.samples)).toEqual([0.25, 0.5, -0.5]);
    expect(drained.speechRatio).toBeCloseTo(2 / 3, 10);
    expect(buffer.sampleCount).toBe(0);
    expect(buffer.speechRatio).toBe(0);
    expect(buffer.takeAll().samples.length).toBe(0);
  });

  it('copies appended frames so later caller writes do not leak in', () => {
    const buffer = new AudioBuffer(16000);
    const source = Float32Array.from([0.5, 0.5]);

    buffer.append(source, false);
    source[0] = 1;

    expect(Array.from(buffer.takeAll().samples)).toEqual([0.5, 0.5]);
  });

  it('treats an empty batch as a no-op', () => {
    const buffer = new AudioBuffer(16000);

    expect(buffer.append(new Float32Array(0), true)).toBe(true);
    expect(buffer.sampleCount).toBe(0);
  });

  it('drops batches past capacity and warns once', async () => {
    const logger = await createTestLogger();
    const warn = vi.spyOn(logger, 'warn');
    // 1 s at 10 Hz with 10% headroom gives 11 samples.
    const buffer = new AudioBuffer(10, logger, 1);

    expect(buffer.append(frames(10), true)).toBe(true);
    expect(buffer.append(frames(2), true)).toBe(false);
    expect(buffer.append(frames(2), true)).toBe(false);
    expect(buffer.sampleCount).toBe(10);
    expect(buffer.append(frames(1), true)).toBe(true);
    expect(buffer.isAtCapacity).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
