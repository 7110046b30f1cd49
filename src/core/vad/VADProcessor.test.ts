import { describe, expect, it } from 'vitest';
import { createVADProcessor } from './createVADProcessor';
import { DisabledVADProcessor } from './DisabledVADProcessor';
import { EnergySpeechModel } from './EnergySpeechModel';
import { ModelSupport, SpeechEvent, SpeechProbabilityModel, VAD_PRESETS, VADError } from './types';
import { VADProcessor } from './VADProcessor';

class ScriptedModel implements SpeechProbabilityModel {
  public readonly name = 'scripted';
  public loads = 0;

  public constructor(
    private readonly probabilities: number[],
    private readonly supportResult: ModelSupport = { supported: true }
  ) {}

  public support(): ModelSupport {
    return this.supportResult;
  }

  public async load(): Promise<void> {
    this.loads += 1;
  }

  public predict(): number {
    const next = this.probabilities.shift();
    if (next === undefined) {
      throw new Error('script exhausted');
    }

    return next;
  }
}

const batch = (): Float32Array => new Float32Array(1600).fill(0.1);

const feed = async (processor: VADProcessor, count: number): Promise<SpeechEvent[]> => {
  const events: SpeechEvent[] = [];
  for (let index = 0; index < count; index += 1) {
    const result = await processor.processChunk(batch());
    if (result.event) {
      events.push(result.event);
    }
  }

  return events;
};

describe('VADProcessor', () => {
  it('emits one start and one end for 0.3 s of speech followed by 1.2 s of silence', async () => {
    const model = new ScriptedModel([
      ...new Array<number>(3).fill(0.8),
      ...new Array<number>(12).fill(0.1)
    ]);
    const processor = new VADProcessor(model);
    await processor.initialize();

    const events = await feed(processor, 15);

    expect(events).toEqual([
      { type: 'started', at: 0.3 },
      { type: 'ended', at: 1.3 }
    ]);
    expect(processor.isSpeaking).toBe(false);
  });

  it('ignores speech bursts shorter than the minimum duration', async () => {
    const model = new ScriptedModel([0.9, 0.9, 0.1, 0.9, 0.9, 0.1]);
    const processor = new VADProcessor(model);
    await processor.initialize();

    expect(await feed(processor, 6)).toEqual([]);
    expect(processor.lastSpeechStartTime).toBeUndefined();
  });

  it('keeps speaking through a pause shorter than the silence window', async () => {
    const model = new ScriptedModel([
      ...new Array<number>(3).fill(0.8),
      ...new Array<number>(9).fill(0.1),
      0.8,
      ...new Array<number>(9).fill(0.1)
    ]);
    const processor = new VADProcessor(model);
    await processor.initialize();

    const events = await feed(processor, 22);

    expect(events).toEqual([{ type: 'started', at: 0.3 }]);
    expect(processor.isSpeaking).toBe(true);
  });

  it('counts a probability equal to the threshold as speech', async () => {
    const model = new ScriptedModel([0.7, 0.7, 0.7]);
    const processor = new VADProcessor(model, VAD_PRESETS.strict);
    await processor.initialize();

    expect(await feed(processor, 3)).toEqual([{ type: 'started', at: 0.3 }]);
  });

  it('uses the sensitive preset threshold', async () => {
    const model = new ScriptedModel([0.35, 0.35, 0.35]);
    const processor = new VADProcessor(model, VAD_PRESETS.sensitive);
    await processor.initialize();

    expect(await feed(processor, 3)).toHaveLength(1);
    expect(VAD_PRESETS.sensitive.threshold).toBe(0.3);
    expect(VAD_PRESETS.strict.threshold).toBe(0.7);
  });

  it('rejects processing before initialize()', async () => {
    const processor = new VADProcessor(new ScriptedModel([0.5]));

    await expect(processor.processChunk(batch())).rejects.toMatchObject({
      kind: 'notInitialized',
      message: 'VAD processor used before initialize()'
    });
  });

  it('reports model failures and non-finite output as processingFailed and keeps going', async () => {
    const model = new ScriptedModel([Number.NaN]);
    const processor = new VADProcessor(model);
    await processor.initialize();

    const nan = processor.processChunk(batch());
    const exhausted = processor.processChunk(batch());

    await expect(nan).rejects.toMatchObject({
      kind: 'processingFailed',
      message: 'VAD processing failed: model returned NaN'
    });
    await expect(exhausted).rejects.toMatchObject({
      kind: 'processingFailed',
      message: 'VAD processing failed: script exhausted'
    });
    expect(processor.averageSpeechProbability).toBe(0);
  });

  it('clamps probabilities and averages them for significant speech', async () => {
    const model = new ScriptedModel([1.5, -0.5, 0.2]);
    const processor = new VADProcessor(model);
    await processor.initialize();

    expect(processor.hasSignificantSpeech()).toBe(false);

    const first = await processor.processChunk(batch());
    await processor.processChunk(batch());
    await processor.processChunk(batch());

    expect(first.probability).toBe(1);
    expect(processor.averageSpeechProbability).toBeCloseTo(0.4, 10);
    expect(processor.hasSignificantSpeech()).toBe(true);
    expect(processor.hasSignificantSpeech(0.5)).toBe(false);
  });

  it('returns probability 0 for an empty batch without counting it', async () => {
    const processor = new VADProcessor(new ScriptedModel([]));
    await processor.initialize();

    const result = await processor.processChunk(new Float32Array(0));

    expect(result.probability).toBe(0);
    expect(processor.hasSignificantSpeech(0)).toBe(false);
  });

  it('measures silence since speech ended on the injected clock', async () => {
    let now = 10_000;
    const model = new ScriptedModel([
      ...new Array<number>(3).fill(0.9),
      ...new Array<number>(10).fill(0)
    ]);
    const processor = new VADProcessor(model, undefined, { sampleRate: 16000, now: () => now });
    await processor.initialize();

    expect(processor.currentSilenceDuration).toBeUndefined();

    await feed(processor, 3);
    expect(processor.lastSpeechStartTime).toBe(10_000);
    expect(processor.currentSilenceDuration).toBeUndefined();

    now = 11_000;
    await feed(processor, 10);
    expect(processor.lastSpeechEndTime).toBe(11_000);

    now = 13_500;
    expect(processor.currentSilenceDuration).toBe(2.5);

    processor.resetSession();
    expect(processor.currentSilenceDuration).toBeUndefined();
    expect(processor.isSpeaking).toBe(false);
  });

  it('fails initialize() when the model cannot run', async () => {
    const model = new ScriptedModel([], { supported: false, reason: 'no accelerator' });
    const processor = new VADProcessor(model);

    await expect(processor.initialize()).rejects.toMatchObject({
      kind: 'unsupportedPlatform',
      message: 'VAD is not available: no accelerator'
    });
    expect(model.loads).toBe(0);
  });
});

describe('createVADProcessor', () => {
  it('returns the disabled variant when VAD is turned off', async () => {
    const vad = createVADProcessor(
      { ...VAD_PRESETS.default, enabled: false },
      new EnergySpeechModel(),
      { sampleRate: 16000 }
    );

    expect(vad).toBeInstanceOf(DisabledVADProcessor);
    expect(vad.isAvailable).toBe(false);
    expect(vad.hasSignificantSpeech()).toBe(false);
    await expect(vad.processChunk(batch())).rejects.toBeInstanceOf(VADError);
  });

  it('returns the disabled variant when the model is unsupported', async () => {
    const vad = createVADProcessor(
      VAD_PRESETS.default,
      new ScriptedModel([], { supported: false, reason: 'missing runtime' }),
      { sampleRate: 16000 }
    );

    await expect(vad.initialize()).rejects.toThrow('VAD is not available: missing runtime');
  });

  it('builds a working processor otherwise', () => {
    const vad = createVADProcessor(VAD_PRESETS.default, new EnergySpeechModel(), {
      sampleRate: 16000
    });

    expect(vad).toBeInstanceOf(VADProcessor);
    expect(vad.isAvailable).toBe(true);
  });
});

describe('EnergySpeechModel', () => {
  it('maps the midpoint level to 0.5 and silence to nearly 0', () => {
    const model = new EnergySpeechModel({ midpointDbfs: -20, slopeDb: 3 });

    expect(model.predict(new Float32Array(160).fill(0.1))).toBeCloseTo(0.5, 6);
    expect(model.predict(new Float32Array(160))).toBeLessThan(1e-6);
    expect(model.predict(new Float32Array(160).fill(1))).toBeGreaterThan(0.99);
  });
});
