const PCM16_MAX = 32767;
const PCM16_MIN = -32768;

export const calculateRms = (samples: Float32Array): number => {
  if (samples.length === 0) {
    return 0;
  }

  let sumSquares = 0;
  for (let index = 0; index < samples.length; index += 1) {
    const value = samples[index];
    sumSquares += value * value;
  }

  return Math.sqrt(sumSquares / samples.length);
};

export const rmsToDbfs = (rms: number): number => {
  if (rms <= 0) {
    return -120;
  }

  return Math.max(-120, 20 * Math.log10(rms));
};

export const pcm16ToFloat32 = (pcm: Buffer): Float32Array => {
  const sampleCount = Math.floor(pcm.length / 2);
  const output = new Float32Array(sampleCount);

  for (let index = 0; index < sampleCount; index += 1) {
    output[index] = pcm.readInt16LE(index * 2) / 32768;
  }

  return output;
};

export const float32ToPcm16 = (samples: Float32Array): Buffer => {
  const output = Buffer.alloc(samples.length * 2);

  for (let index = 0; index < samples.length; index += 1) {
    const clamped = Math.max(-1, Math.min(1, samples[index]));
    const scaled = clamped < 0 ? Math.round(clamped * 32768) : Math.round(clamped * PCM16_MAX);
    output.writeInt16LE(Math.max(PCM16_MIN, Math.min(PCM16_MAX, scaled)), index * 2);
  }

  return output;
};

/** Mono 16-bit PCM WAV with the canonical 44-byte header. */
export const encodeWav = (samples: Float32Array, sampleRate: number): Buffer => {
  const pcm = float32ToPcm16(samples);
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
};
