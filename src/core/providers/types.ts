export type ProviderMode = 'batch' | 'streaming';

export interface TranscriptionResult {
  transcript: string;
  isFinal: boolean;
  speechFinal?: boolean;
  confidence?: number;
}

export type TranscriptionEvent =
  | { type: 'interim'; result: TranscriptionResult }
  | { type: 'finalResult'; result: TranscriptionResult }
  | { type: 'speechStarted' }
  | { type: 'utteranceEnd' }
  | { type: 'error'; error: Error }
  | { type: 'closed' };

export interface StreamingSessionConfig {
  language: string;
  sampleRate: number;
  encoding: 'linear16';
  interimResults: boolean;
  endpointingMs: number;
}

export const DEFAULT_STREAMING_SESSION_CONFIG: StreamingSessionConfig = {
  language: 'en-US',
  sampleRate: 16000,
  encoding: 'linear16',
  interimResults: true,
  endpointingMs: 300
};

export interface StreamingSession {
  sendAudio(pcm16: Buffer): Promise<void>;
  /** Asks the backend to flush whatever it still holds as final results. */
  finalize(): Promise<void>;
  close(): Promise<void>;
  subscribe(listener: (event: TranscriptionEvent) => void): () => void;
}

export interface BatchRequestOptions {
  sampleRate: number;
  signal: AbortSignal;
}

interface ProviderBase {
  readonly id: string;
  readonly displayName: string;
  isConfigured(): boolean;
  warmup?(): Promise<void>;
  shutdown?(): Promise<void>;
}

export interface BatchTranscriptionProvider extends ProviderBase {
  readonly mode: 'batch';
  /** `audio` is a complete WAV file. */
  transcribe(audio: Buffer, options: BatchRequestOptions): Promise<string>;
}

export interface StreamingTranscriptionProvider extends ProviderBase {
  readonly mode: 'streaming';
  buildSessionConfig(overrides?: Partial<StreamingSessionConfig>): StreamingSessionConfig;
  startSession(config: StreamingSessionConfig): Promise<StreamingSession>;
}

export type TranscriptionProvider = BatchTranscriptionProvider | StreamingTranscriptionProvider;

export type ProviderErrorCode = 'notConfigured' | 'connectionFailed' | 'streamFailed';

export class ProviderError extends Error {
  public constructor(
    public readonly code: ProviderErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}
