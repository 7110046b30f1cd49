import { VADError, VADResult, VoiceActivityDetector } from './types';

/** Stand-in used when VAD is switched off or the speech model cannot run here. */
export class DisabledVADProcessor implements VoiceActivityDetector {
  public readonly isAvailable = false;
  public readonly isSpeaking = false;
  public readonly averageSpeechProbability = 0;
  public readonly lastSpeechStartTime = undefined;
  public readonly lastSpeechEndTime = undefined;
  public readonly currentSilenceDuration = undefined;

  public constructor(public readonly reason: string) {}

  public async initialize(): Promise<void> {
    throw new VADError('unsupportedPlatform', this.reason);
  }

  public async processChunk(_samples: Float32Array): Promise<VADResult> {
    throw new VADError('unsupportedPlatform', this.reason);
  }

  public hasSignificantSpeech(_threshold?: number): boolean {
    return false;
  }

  public resetSession(): void {}
}
