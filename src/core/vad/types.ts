export interface VADConfiguration {
  /** Probability at or above which a batch counts as speech. */
  threshold: number;
  /** Seconds of sustained silence before `speaking` falls back to `silent`. */
  minSilenceAfterSpeech: number;
  /** Seconds of sustained speech before `silent` switches to `speaking`. */
  minSpeechDuration: number;
  enabled: boolean;
}

export const DEFAULT_VAD_CONFIGURATION: VADConfiguration = {
  threshold: 0.5,
  minSilenceAfterSpeech: 1.0,
  minSpeechDuration: 0.25,
  enabled: true
};

export const VAD_PRESETS = {
  default: DEFAULT_VAD_CONFIGURATION,
  sensitive: { ...DEFAULT_VAD_CONFIGURATION, threshold: 0.3 },
  strict: { ...DEFAULT_VAD_CONFIGURATION, threshold: 0.7 }
} satisfies Record<string, VADConfiguration>;

/** `at` is stream time in seconds, measured at the end of the batch that caused the transition. */
export type SpeechEvent = { type: 'started'; at: number } | { type: 'ended'; at: number };

export interface VADResult {
  probability: number;
  isSpeaking: boolean;
  event?: SpeechEvent;
  processingTimeMs: number;
}

export type VADErrorKind = 'notInitialized' | 'unsupportedPlatform' | 'processingFailed';

export class VADError extends Error {
  public constructor(
    public readonly kind: VADErrorKind,
    detail?: string
  ) {
    super(VADError.describe(kind, detail));
    this.name = 'VADError';
  }

  private static describe(kind: VADErrorKind, detail?: string): string {
    if (kind === 'notInitialized') {
      return 'VAD processor used before initialize()';
    }

    if (kind === 'unsupportedPlatform') {
      return `VAD is not available: ${detail ?? 'unsupported platform'}`;
    }

    return `VAD processing failed: ${detail ?? 'unknown error'}`;
  }
}

export type ModelSupport = { supported: true } | { supported: false; reason: string };

/** Anything that can turn a batch of samples into a speech probability. */
export interface SpeechProbabilityModel {
  readonly name: string;
  support(): ModelSupport;
  load(): Promise<void>;
  predict(samples: Float32Array, sampleRate: number): Promise<number> | number;
}

export interface VoiceActivityDetector {
  readonly isAvailable: boolean;
  readonly isSpeaking: boolean;
  readonly averageSpeechProbability: number;
  readonly lastSpeechStartTime: number | undefined;
  readonly lastSpeechEndTime: number | undefined;
  /** Seconds since speech last ended; undefined while speaking or before any speech. */
  readonly currentSilenceDuration: number | undefined;
  initialize(): Promise<void>;
  processChunk(samples: Float32Array): Promise<VADResult>;
  hasSignificantSpeech(threshold?: number): boolean;
  resetSession(): void;
}
