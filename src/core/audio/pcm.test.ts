import { describe, expect, it } from 'vitest';
import { calculateRms, encodeWav, float32ToPcm16, pcm16ToFloat32, rmsToDbfs } from './pcm';

describe('pcm helpers', () => {
  it('computes RMS and dBFS', () => {
    expect(calculateRms(Float32Array.from([0.5, -0.5, 0.5, -0.5]))).toBe(0.5);
    expect(calculateRms(new Float32Array(0))).toBe(0);
    expect(rmsToDbfs(1)).toBe(0);
    expect(rmsToDbfs(0)).toBe(-120);
    expect(rmsToDbfs(1e-9)).toBe(-120);
  });

  it('clamps out-of-range samples when converting to 16-bit', () => {
    const pcm = float32ToPcm16(Float32Array.from([2, -2, 0.5, -0.5, 0]));

    expect(pcm.readInt16LE(0)).toBe(32767);
    expect(pcm.readInt16LE(2)).toBe(-32768);
    expect(pcm.readInt16LE(4)).toBe(16384);
    expect(pcm.readInt16LE(6)).toBe(-16384);
    expect(pcm.readInt16LE(8)).toBe(0);
  });

  it('reads little-endian 16-bit PCM as floats', () => {
    const pcm = Buffer.alloc(6);
    pcm.writeInt16LE(-32768, 0);
    pcm.writeInt16LE(16384, 2);
    pcm.writeInt16LE(0, 4);

    expect(Array.from(pcm16ToFloat32(pcm))).toEqual([-1, 0.5, 0]);
  });

  it('writes a mono 16-bit WAV header', () => {
    const wav = encodeWav(new Float32Array(100), 16000);

    expect(wav.length).toBe(244);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(236);
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.toString('ascii', 12, 16)).toBe('fmt ');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(200);
  });
});
