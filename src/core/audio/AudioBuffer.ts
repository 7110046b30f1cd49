import { StructuredLogger } from '../../logging/StructuredLogger';

export const MAX_FULL_RECORDING_SECONDS = 3600;
const CAPACITY_HEADROOM = 1.1;

export interface DrainedAudio {
  samples: Float32Array;
  speechRatio: number;
}

/**
 * Append-only sample store for one recording session.
 *
 * Both `append` and `takeAll` complete synchronously, so a frame batch delivered
 * while a drain is in progress lands either in the drained batch or in the next one.
 */
export class AudioBuffer {
  private segments: Float32Array[] = [];
  private storedSamples = 0;
  private speechFrameCount = 0;
  private totalFrameCount = 0;
  private droppedWarningLogged = false;
  private readonly maxSamples: number;

  public constructor(
    public readonly sampleRate: number,
    private readonly logger?: StructuredLogger,
    maxDurationSeconds = MAX_FULL_RECORDING_SECONDS
  ) {
    this.maxSamples = Math.floor(maxDurationSeconds * sampleRate * CAPACITY_HEADROOM);
  }

  public get sampleCount(): number {
    return this.storedSamples;
  }

  public get duration(): number {
    return this.storedSamples / this.sampleRate;
  }

  public get speechRatio(): number {
    return this.totalFrameCount > 0 ? this.speechFrameCount / this.totalFrameCount : 0;
  }

  public get isAtCapacity(): boolean {
    return this.storedSamples >= this.maxSamples;
  }

  /** Returns false when the batch was dropped because the buffer is full. */
  public append(frames: Float32Array, hasSpeech: boolean): boolean {
    if (frames.length === 0) {
      return true;
    }

    if (this.storedSamples + frames.length > this.maxSamples) {
      if (!this.droppedWarningLogged) {
        this.droppedWarningLogged = true;
        this.logger?.warn('Audio buffer at capacity; dropping frames', {
          maxSamples: this.maxSamples,
          storedSamples: this.storedSamples
        });
      }

      return false;
    }

    this.segments.push(Float32Array.from(frames));
    this.storedSamples += frames.length;
    this.totalFrameCount += frames.length;
    if (hasSpeech) {
      this.speechFrameCount += frames.length;
    }

    return true;
  }

  public takeAll(): DrainedAudio {
    const samples = new Float32Array(this.storedSamples);
    let offset = 0;
    for (const segment of this.segments) {
      samples.set(segment, offset);
      offset += segment.length;
    }

    const drained: DrainedAudio = {
      samples,
      speechRatio: this.speechRatio
    };

    this.reset();
    return drained;
  }

  public reset(): void {
    this.segments = [];
    this.storedSamples = 0;
    this.speechFrameCount = 0;
    this.totalFrameCount = 0;
    this.droppedWarningLogged = false;
  }
}
