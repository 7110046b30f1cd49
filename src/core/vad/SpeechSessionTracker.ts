import { SpeechEvent } from './types';

export interface AutoEndConfiguration {
  enabled: boolean;
  /** Seconds of silence after speech that end the session. */
  silenceDuration: number;
  minSessionDuration: number;
  requireSpeechFirst: boolean;
  /** Seconds to wait for any speech before giving up on the session. */
  noSpeechTimeout: number;
}

const MIN_AUTO_END_SILENCE_SECONDS = 3;

export const DEFAULT_AUTO_END_CONFIGURATION: AutoEndConfiguration = {
  enabled: true,
  silenceDuration: 5,
  minSessionDuration: 2,
  requireSpeechFirst: true,
  noSpeechTimeout: 10
};

export const AUTO_END_PRESETS = {
  default: DEFAULT_AUTO_END_CONFIGURATION,
  quick: { ...DEFAULT_AUTO_END_CONFIGURATION, silenceDuration: 3 },
  relaxed: { ...DEFAULT_AUTO_END_CONFIGURATION, silenceDuration: 10 },
  disabled: { ...DEFAULT_AUTO_END_CONFIGURATION, enabled: false }
} satisfies Record<string, AutoEndConfiguration>;

export interface SpeechSessionTrackerOptions {
  /** Seconds a chunk must run before a pause may close it. */
  maxChunkDuration: number;
  minSilenceAfterSpeech: number;
  autoEnd: AutoEndConfiguration;
  now?: () => number;
}

export interface SpeechSessionSnapshot {
  sessionSeconds: number;
  chunkSeconds: number;
  hasSpoken: boolean;
  isSpeaking: boolean;
  silenceSeconds: number | undefined;
}

/** Turns VAD boundary events into "close this chunk" and "end this session" decisions. */
export class SpeechSessionTracker {
  private readonly now: () => number;
  private readonly autoEnd: AutoEndConfiguration;
  private sessionStartedAt = 0;
  private chunkStartedAt = 0;
  private spoken = false;
  private speaking = false;
  private lastSpeechEndedAt: number | undefined;

  public constructor(private readonly options: SpeechSessionTrackerOptions) {
    this.now = options.now ?? Date.now;
    this.autoEnd = options.autoEnd.enabled
      ? {
          ...options.autoEnd,
          silenceDuration: Math.max(MIN_AUTO_END_SILENCE_SECONDS, options.autoEnd.silenceDuration)
        }
      : options.autoEnd;
  }

  public get effectiveAutoEnd(): AutoEndConfiguration {
    return this.autoEnd;
  }

  public startSession(): void {
    const now = this.now();
    this.sessionStartedAt = now;
    this.chunkStartedAt = now;
    this.spoken = false;
    this.speaking = false;
    this.lastSpeechEndedAt = undefined;
  }

  public onSpeechEvent(event: SpeechEvent): void {
    if (event.type === 'started') {
      this.speaking = true;
      this.spoken = true;
      return;
    }

    this.speaking = false;
    this.lastSpeechEndedAt = this.now();
  }

  public chunkSent(): void {
    this.chunkStartedAt = this.now();
  }

  public shouldSendChunk(): boolean {
    if (this.secondsSince(this.chunkStartedAt) < this.options.maxChunkDuration) {
      return false;
    }

    if (this.speaking) {
      return false;
    }

    if (this.lastSpeechEndedAt === undefined) {
      return true;
    }

    return this.secondsSince(this.lastSpeechEndedAt) >= this.options.minSilenceAfterSpeech;
  }

  public shouldAutoEndSession(): boolean {
    if (!this.autoEnd.enabled) {
      return false;
    }

    const sessionSeconds = this.secondsSince(this.sessionStartedAt);

    const noSpeechTimedOut =
      this.autoEnd.noSpeechTimeout > 0 && sessionSeconds >= this.autoEnd.noSpeechTimeout;
    if (!this.spoken && noSpeechTimedOut) {
      return true;
    }

    if (this.autoEnd.requireSpeechFirst && !this.spoken) {
      return false;
    }

    if (this.speaking || sessionSeconds < this.autoEnd.minSessionDuration) {
      return false;
    }

    if (this.lastSpeechEndedAt !== undefined) {
      return this.secondsSince(this.lastSpeechEndedAt) >= this.autoEnd.silenceDuration;
    }

    return sessionSeconds >= this.autoEnd.silenceDuration + this.autoEnd.minSessionDuration;
  }

  public snapshot(): SpeechSessionSnapshot {
    return {
      sessionSeconds: this.secondsSince(this.sessionStartedAt),
      chunkSeconds: this.secondsSince(this.chunkStartedAt),
      hasSpoken: this.spoken,
      isSpeaking: this.speaking,
      silenceSeconds:
        this.speaking || this.lastSpeechEndedAt === undefined
          ? undefined
          : this.secondsSince(this.lastSpeechEndedAt)
    };
  }

  private secondsSince(timestamp: number): number {
    return Math.max(0, this.now() - timestamp) / 1000;
  }
}
