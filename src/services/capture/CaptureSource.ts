export interface CaptureStartOptions {
  sampleRate: number;
  frameDurationMs: number;
  onFrames: (frames: Float32Array) => void;
}

export interface CaptureSource {
  isCapturing(): boolean;
  start(options: CaptureStartOptions): Promise<void>;
  /** Resolves after the last buffered frames have been delivered. */
  stop(): Promise<void>;
}
