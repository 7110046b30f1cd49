import { calculateRms, rmsToDbfs } from '../audio/pcm';
import { ModelSupport, SpeechProbabilityModel } from './types';

export interface EnergySpeechModelOptions {
  /** Level that maps to probability 0.5. */
  midpointDbfs: number;
  /** dB per logistic unit; smaller is a harder switch. */
  slopeDb: number;
}

const DEFAULT_OPTIONS: EnergySpeechModelOptions = {
  midpointDbfs: -42,
  slopeDb: 3
};

/** Logistic curve over batch loudness in dBFS. Pure JS, so `support()` always succeeds. */
export class EnergySpeechModel implements SpeechProbabilityModel {
  public readonly name = 'energy-dbfs';

  public constructor(private readonly options: EnergySpeechModelOptions = DEFAULT_OPTIONS) {}

  public support(): ModelSupport {
    return { supported: true };
  }

  public async load(): Promise<void> {}

  public predict(samples: Float32Array): number {
    const dbfs = rmsToDbfs(calculateRms(samples));
    return 1 / (1 + Math.exp(-(dbfs - this.options.midpointDbfs) / this.options.slopeDb));
  }
}
