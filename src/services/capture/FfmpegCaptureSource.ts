import { ChildProcess, spawn } from 'node:child_process';
import { pcm16ToFloat32 } from '../../core/audio/pcm';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { CaptureSource, CaptureStartOptions } from './CaptureSource';

const START_STABILITY_DELAY_MS = 300;
const BYTES_PER_SAMPLE = 2; // s16le mono

export const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant microphone access to your terminal, then try again.';
  }

  if (/Input\/output error|No such file|device not found|could not find/i.test(detail)) {
    return 'Microphone input device is unavailable. Check VOXPIPE_FFMPEG_INPUT and VOXPIPE_FFMPEG_FORMAT.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

export interface FfmpegCaptureOptions {
  inputFormat: string;
  inputDevice: string;
  ffmpegBin?: string;
}

/**
 * Captures the microphone through an ffmpeg child process and hands out mono float frames
 * of `frameDurationMs` each. Bytes that do not fill a whole frame wait for the next read.
 */
export class FfmpegCaptureSource implements CaptureSource {
  private process: ChildProcess | undefined;
  private pending: Buffer = Buffer.alloc(0);
  private frameByteSize = 0;
  private onFrames: ((frames: Float32Array) => void) | undefined;

  public constructor(
    private readonly options: FfmpegCaptureOptions,
    private readonly logger?: StructuredLogger
  ) {}

  public isCapturing(): boolean {
    return Boolean(this.process);
  }

  public async start(options: CaptureStartOptions): Promise<void> {
    if (this.process) {
      throw new Error('Capture is already active');
    }

    if (options.frameDurationMs < 20 || options.frameDurationMs > 500) {
      throw new Error('frameDurationMs must be between 20 and 500.');
    }

    this.onFrames = options.onFrames;
    this.pending = Buffer.alloc(0);
    this.frameByteSize = Math.max(
      BYTES_PER_SAMPLE,
      Math.floor((options.sampleRate * options.frameDurationMs) / 1000) * BYTES_PER_SAMPLE
    );

    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.options.inputFormat,
      '-i',
      this.options.inputDevice,
      '-ac',
      '1',
      '-ar',
      String(options.sampleRate),
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      'pipe:1'
    ];

    const ffmpeg = spawn(this.options.ffmpegBin ?? 'ffmpeg', args, {
      stdio: ['ignore', 'pipe', 'pipe']
    });
    let stderrLog = '';
    let settled = false;

    ffmpeg.on('close', () => {
      if (this.process === ffmpeg) {
        this.process = undefined;
      }
    });

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk: Buffer) => {
      this.handleAudioData(chunk);
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new Error(normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.logger?.info('Capture started', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: options.sampleRate,
      frameByteSize: this.frameByteSize
    });
  }

  public async stop(): Promise<void> {
    const current = this.process;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      current.once('close', (code) => {
        this.process = undefined;
        if (code === 0 || code === 255 || code === null) {
          resolve();
          return;
        }

        reject(new Error(`ffmpeg exited with code ${code}`));
      });

      current.once('error', (error) => {
        this.process = undefined;
        reject(error);
      });

      current.kill('SIGINT');
    });

    this.flushTail();
    this.pending = Buffer.alloc(0);
    this.onFrames = undefined;

    this.logger?.info('Capture stopped');
  }

  /** ffmpeg stdout lands here; whole frames go out, the remainder waits. */
  public handleAudioData(chunk: Buffer): void {
    if (!this.onFrames || chunk.length === 0 || this.frameByteSize <= 0) {
      return;
    }

    this.pending = Buffer.concat([this.pending, chunk]);

    while (this.pending.length >= this.frameByteSize) {
      const frame = this.pending.subarray(0, this.frameByteSize);
      this.pending = this.pending.subarray(this.frameByteSize);
      this.deliver(frame);
    }
  }

  private flushTail(): void {
    const usable = this.pending.length - (this.pending.length % BYTES_PER_SAMPLE);
    if (usable <= 0) {
      return;
    }

    this.deliver(this.pending.subarray(0, usable));
  }

  private deliver(bytes: Buffer): void {
    if (!this.onFrames) {
      return;
    }

    try {
      this.onFrames(pcm16ToFloat32(bytes));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Capture frame callback failed', { detail });
    }
  }
}
