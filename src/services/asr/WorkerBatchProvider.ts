import { BatchRequestOptions, BatchTranscriptionProvider } from '../../core/providers/types';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { JsonWorkerClient } from '../process/PersistentJsonWorker';
import { parseWorkerTranscript, requestTimeoutMs, toWorkerLanguage } from './speechWorker';

export interface WorkerBatchProviderOptions {
  language: string;
  isConfigured: () => boolean;
}

export class WorkerBatchProvider implements BatchTranscriptionProvider {
  public readonly id = 'worker-batch';
  public readonly displayName = 'Local speech worker';
  public readonly mode = 'batch';

  public constructor(
    private readonly worker: JsonWorkerClient,
    private readonly options: WorkerBatchProviderOptions,
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

  public async transcribe(audio: Buffer, options: BatchRequestOptions): Promise<string> {
    if (options.signal.aborted) {
      throw new Error('Transcription request was cancelled');
    }

    let result: unknown;
    try {
      result = await this.worker.request(
        {
          action: 'transcribe',
          audioBase64: audio.toString('base64'),
          format: 'wav',
          sampleRate: options.sampleRate,
          language: toWorkerLanguage(this.options.language)
        },
        requestTimeoutMs(audio.length),
        options.signal
      );
    } catch (error) {
      if (options.signal.aborted) {
        throw new Error('Transcription request was cancelled');
      }

      throw error;
    }

    return parseWorkerTranscript(result).text;
  }
}
