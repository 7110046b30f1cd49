import { describe, expect, it } from 'vitest';
import { FfmpegCaptureSource, normalizeMicError } from './FfmpegCaptureSource';

describe('normalizeMicError', () => {
  it('recognises permission failures', () => {
    expect(normalizeMicError('[avfoundation] Operation not permitted')).toBe(
      'Microphone permission denied. Grant microphone access to your terminal, then try again.'
    );
  });

  it('points at the input settings when the device is missing', () => {
    expect(normalizeMicError('default: No such file or directory\nexit code=1')).toBe(
      'Microphone input device is unavailable. Check VOXPIPE_FFMPEG_INPUT and VOXPIPE_FFMPEG_FORMAT.'
    );
  });

  it('passes other ffmpeg output through', () => {
    expect(normalizeMicError('  Unknown input format: pulsex  ')).toBe(
      'Microphone capture failed: Unknown input format: pulsex'
    );
    expect(normalizeMicError('   ')).toBe(
      'Microphone capture failed. Verify ffmpeg availability and microphone permissions.'
    );
  });
});

describe('FfmpegCaptureSource', () => {
  it('rejects frame durations outside 20 to 500 ms before spawning', async () => {
    const source = new FfmpegCaptureSource({ inputFormat: 'pulse', inputDevice: 'default' });

    await expect(
      source.start({ sampleRate: 16000, frameDurationMs: 10, onFrames: () => undefined })
    ).rejects.toThrow('frameDurationMs must be between 20 and 500.');
    expect(source.isCapturing()).toBe(false);
  });

  it('ignores audio that arrives before capture starts', () => {
    const source = new FfmpegCaptureSource({ inputFormat: 'pulse', inputDevice: 'default' });

    expect(() => source.handleAudioData(Buffer.alloc(640))).not.toThrow();
  });
});
