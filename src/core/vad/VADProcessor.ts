import { performance } from 'node:perf_hooks';
import { StructuredLogger } from '../../logging/StructuredLogger';
import {
  DEFAULT_VAD_CONFIGURATION,
  SpeechEvent,
  SpeechProbabilityModel,
  VADConfiguration,
  VADError,
  VADResult,
  VoiceActivityDetector
} from './types';

export interface VADProcessorOptions {
  sampleRate: number;
  /** Wall clock in milliseconds, used for speech start/end timestamps. */
  now?: () => number;
  logger?: StructuredLogger;
}

const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

/**
 * Two-state speech detector (`silent` / `speaking`) with hysteresis.
 *
 * Runs are measured in samples rather than batches, so the switching delay does not depend on
 * how the capture source slices audio. Batches are processed strictly one after another.
 */
export class VADProcessor implements VoiceActivityDetector {
  public readonly isAvailable = true;

  private initialized = false;
  private initPromise: Promise<void> | undefined;
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => number;
  private readonly minSpeechSamples: number;
  private readonly minSilenceSamples: number;

  private speaking = false;
  private speechRunSamples = 0;
  private silenceRunSamples = 0;
  private samplesProcessed = 0;
  private cumulativeProbability = 0;
  private processedChunks = 0;
  private speechStartedAt: number | undefined;
  private speechEndedAt: number | undefined;

  public constructor(
    private readonly model: SpeechProbabilityModel,
    private readonly config: VADConfiguration = DEFAULT_VAD_CONFIGURATION,
    private readonly options: VADProcessorOptions = { sampleRate: 16000 }
  ) {
    this.now = options.now ?? Date.now;
    this.minSpeechSamples = Math.max(1, Math.round(config.minSpeechDuration * options.sampleRate));
    this.minSilenceSamples = Math.max(1, Math.round(config.minSilenceAfterSpeech * options.sampleRate));
  }

  public get isSpeaking(): boolean {
    return this.speaking;
  }

  public get averageSpeechProbability(): number {
    return this.processedChunks > 0 ? this.cumulativeProbability / this.processedChunks : 0;
  }

  public get lastSpeechStartTime(): number | undefined {
    return this.speechStartedAt;
  }

  public get lastSpeechEndTime(): number | undefined {
    return this.speechEndedAt;
  }

  public get currentSilenceDuration(): number | undefined {
    if (this.speaking || this.speechEndedAt === undefined) {
      return undefined;
    }

    return Math.max(0, this.now() - this.speechEndedAt) / 1000;
  }

  public async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    if (!this.initPromise) {
      this.initPromise = this.loadModel();
    }

    try {
      await this.initPromise;
    } finally {
      this.initPromise = undefined;
    }
  }

  public processChunk(samples: Float32Array): Promise<VADResult> {
    const run = this.queue.then(() => this.processNow(samples));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  public hasSignificantSpeech(threshold = 0.3): boolean {
    return this.processedChunks > 0 && this.averageSpeechProbability >= threshold;
  }

  public resetSession(): void {
    this.speaking = false;
    this.speechRunSamples = 0;
    this.silenceRunSamples = 0;
    this.samplesProcessed = 0;
    this.cumulativeProbability = 0;
    this.processedChunks = 0;
    this.speechStartedAt = undefined;
    this.speechEndedAt = undefined;
  }

  private async loadModel(): Promise<void> {
    const support = this.model.support();
    if (!support.supported) {
      throw new VADError('unsupportedPlatform', support.reason);
    }

    await this.model.load();
    this.initialized = true;
    this.options.logger?.info('VAD initialized', {
      model: this.model.name,
      threshold: this.config.threshold,
      minSpeechDuration: this.config.minSpeechDuration,
      minSilenceAfterSpeech: this.config.minSilenceAfterSpeech
    });
  }

  private async processNow(samples: Float32Array): Promise<VADResult> {
    if (!this.initialized) {
      throw new VADError('notInitialized');
    }

    const startedAt = performance.now();

    if (samples.length === 0) {
      return { probability: 0, isSpeaking: this.speaking, processingTimeMs: 0 };
    }

    let raw: number;
    try {
      raw = await this.model.predict(samples, this.options.sampleRate);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new VADError('processingFailed', detail);
    }

    if (!Number.isFinite(raw)) {
      throw new VADError('processingFailed', `model returned ${String(raw)}`);
    }

    const probability = clamp(raw, 0, 1);
    this.cumulativeProbability += probability;
    this.processedChunks += 1;
    this.samplesProcessed += samples.length;

    const event = this.advance(probability >= this.config.threshold, samples.length);

    return {
      probability,
      isSpeaking: this.speaking,
      event,
      processingTimeMs: performance.now() - startedAt
    };
  }

  private advance(aboveThreshold: boolean, sampleCount: number): SpeechEvent | undefined {
    const at = this.samplesProcessed / this.options.sampleRate;

    if (!this.speaking) {
      if (!aboveThreshold) {
        this.speechRunSamples = 0;
        return undefined;
      }

      this.speechRunSamples += sampleCount;
      if (this.speechRunSamples < this.minSpeechSamples) {
        return undefined;
      }

      this.speaking = true;
      this.speechRunSamples = 0;
      this.silenceRunSamples = 0;
      this.speechStartedAt = this.now();
      return { type: 'started', at };
    }

    if (aboveThreshold) {
      this.silenceRunSamples = 0;
      return undefined;
    }

    this.silenceRunSamples += sampleCount;
    if (this.silenceRunSamples < this.minSilenceSamples) {
      return undefined;
    }

    this.speaking = false;
    this.silenceRunSamples = 0;
    this.speechRunSamples = 0;
    this.speechEndedAt = this.now();
    return { type: 'ended', at };
  }
}
