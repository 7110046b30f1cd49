import {
  DEFAULT_STREAMING_SESSION_CONFIG,
  ProviderError,
  StreamingSession,
  StreamingSessionConfig,
  StreamingTranscriptionProvider,
  TranscriptionEvent
} from '../../core/providers/types';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { JsonWorkerClient, WorkerRequest } from '../process/PersistentJsonWorker';
import { WorkerTranscript, parseWorkerTranscript, toWorkerLanguage } from './speechWorker';

const STREAM_CONTROL_TIMEOUT_MS = 10000;
const STREAM_PUSH_TIMEOUT_MS = 60000;

export interface WorkerStreamingProviderOptions {
  language: string;
  isConfigured: () => boolean;
}

/**
 * One utterance-at-a-time stream over the speech worker. Each push answers with the current
 * hypothesis; the worker marks it final when its own endpointing closes an utterance.
 */
export class WorkerStreamingSession implements StreamingSession {
  private readonly listeners = new Set<(event: TranscriptionEvent) => void>();
  private closed = false;
  private lastInterim = '';

  public constructor(
    private readonly worker: JsonWorkerClient,
    private readonly config: StreamingSessionConfig,
    private readonly logger?: StructuredLogger
  ) {}

  public subscribe(listener: (event: TranscriptionEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public async sendAudio(pcm16: Buffer): Promise<void> {
    if (this.closed) {
      return;
    }

    const result = await this.call(
      {
        action: 'stream_push',
        audioBase64: pcm16.toString('base64'),
        sampleRate: this.config.sampleRate
      },
      STREAM_PUSH_TIMEOUT_MS
    );

    this.publish(parseWorkerTranscript(result));
  }

  public async finalize(): Promise<void> {
    if (this.closed) {
      return;
    }

    const result = await this.call({ action: 'stream_flush' }, STREAM_PUSH_TIMEOUT_MS);
    this.publish({ ...parseWorkerTranscript(result), isFinal: true, speechFinal: true });
    await this.close();
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    try {
      await this.worker.request({ action: 'stream_close' }, STREAM_CONTROL_TIMEOUT_MS);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Speech worker stream_close failed', { detail });
    }

    this.emit({ type: 'closed' });
    this.listeners.clear();
  }

  private async call(payload: WorkerRequest, timeoutMs: number): Promise<unknown> {
    try {
      return await this.worker.request(payload, timeoutMs);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ProviderError('streamFailed', `Speech worker stream failed: ${detail}`, {
        cause: error
      });
    }
  }

  private publish(transcript: WorkerTranscript): void {
    if (transcript.isFinal) {
      if (!transcript.text && !this.lastInterim) {
        return;
      }

      this.lastInterim = '';
      this.emit({
        type: 'finalResult',
        result: {
          transcript: transcript.text,
          isFinal: true,
          speechFinal: transcript.speechFinal
        }
      });
      return;
    }

    if (!transcript.text || transcript.text === this.lastInterim) {
      return;
    }

    if (!this.lastInterim) {
      this.emit({ type: 'speechStarted' });
    }

    this.lastInterim = transcript.text;
    this.emit({
      type: 'interim',
      result: { transcript: transcript.text, isFinal: false }
    });
  }

  private emit(event: TranscriptionEvent): void {
    for (const listener of Array.from(this.listeners)) {
      listener(event);
    }
  }
}

export class WorkerStreamingProvider implements StreamingTranscriptionProvider {
  public readonly id = 'worker-stream';
  public readonly displayName = 'Local speech worker (streaming)';
  public readonly mode = 'streaming';

  public constructor(
    private readonly worker: JsonWorkerClient,
    private readonly options: WorkerStreamingProviderOptions,
    private readonly logger?: StructuredLogger
  ) {}

  public isConfigured(): boolean {
    return this.options.isConfigured();
  }

  public async warmup(): Promise<void> {
    await this.worker.start();
    await this.worker.request({ action: 'warmup' }, 60000);
    this.logger?.info('Speech worker warmed up', { provider: this.id });
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }

  public buildSessionConfig(overrides: Partial<StreamingSessionConfig> = {}): StreamingSessionConfig {
    return {
      ...DEFAULT_STREAMING_SESSION_CONFIG,
      language: this.options.language,
      ...overrides
    };
  }

  public async startSession(config: StreamingSessionConfig): Promise<StreamingSession> {
    await this.worker.request(
      {
        action: 'stream_reset',
        sampleRate: config.sampleRate,
        language: toWorkerLanguage(config.language),
        endpointingMs: config.endpointingMs
      },
      STREAM_CONTROL_TIMEOUT_MS
    );

    return new WorkerStreamingSession(this.worker, config, this.logger);
  }
}
