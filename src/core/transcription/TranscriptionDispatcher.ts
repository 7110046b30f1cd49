import { StructuredLogger } from '../../logging/StructuredLogger';
import { LatencyTracker } from '../../perf/LatencyTracker';
import { encodeWav } from '../audio/pcm';
import { BatchTranscriptionProvider } from '../providers/types';
import { UsageStatistics } from '../UsageStatistics';
import { TranscriptionQueueBridge, TranscriptionTicket } from './TranscriptionQueueBridge';

export interface AudioChunk {
  samples: Float32Array;
  sampleRate: number;
  speechRatio: number;
}

export interface TranscriptionDispatcherDependencies {
  bridge: TranscriptionQueueBridge;
  statistics?: UsageStatistics;
  latency?: LatencyTracker;
}

const ticketKey = (ticket: TranscriptionTicket): string => `${ticket.session}:${ticket.seq}`;

/**
 * Sends chunks to a batch provider and settles each one in the bridge.
 * A failed chunk resolves as empty text so the rest of the session still completes.
 */
export class TranscriptionDispatcher {
  private readonly inFlight = new Map<string, AbortController>();

  public constructor(
    private readonly deps: TranscriptionDispatcherDependencies,
    private readonly logger?: StructuredLogger
  ) {}

  public get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Settles once the chunk is resolved in the bridge; never rejects. */
  public async dispatch(
    ticket: TranscriptionTicket,
    chunk: AudioChunk,
    provider: BatchTranscriptionProvider
  ): Promise<void> {
    const key = ticketKey(ticket);
    const controller = new AbortController();
    this.inFlight.set(key, controller);

    const audioMs = Math.round((chunk.samples.length / chunk.sampleRate) * 1000);
    const startedAt = Date.now();
    this.deps.statistics?.recordApiCall();

    this.logger?.info('Dispatching chunk', {
      seq: ticket.seq,
      session: ticket.session,
      provider: provider.id,
      audioMs,
      speechRatio: Number(chunk.speechRatio.toFixed(3))
    });

    try {
      const wav = encodeWav(chunk.samples, chunk.sampleRate);
      const text = await provider.transcribe(wav, {
        sampleRate: chunk.sampleRate,
        signal: controller.signal
      });

      if (controller.signal.aborted) {
        this.logger?.debug('Discarding result for cancelled chunk', { seq: ticket.seq });
        return;
      }

      const requestMs = Date.now() - startedAt;
      this.deps.statistics?.recordTranscription(text, audioMs / 1000);
      this.deps.latency?.push({ audioMs, requestMs, ok: true });
      this.logger?.info('Chunk transcribed', {
        seq: ticket.seq,
        requestMs,
        textLength: text.length
      });

      this.deps.bridge.submitTicketResult(ticket, text);
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger?.debug('Chunk request aborted', { seq: ticket.seq });
        return;
      }

      const detail = error instanceof Error ? error.message : String(error);
      this.deps.latency?.push({ audioMs, requestMs: Date.now() - startedAt, ok: false });
      this.logger?.warn('Chunk transcription failed; continuing without it', {
        seq: ticket.seq,
        detail
      });

      this.deps.bridge.markTicketFailed(ticket);
    } finally {
      this.inFlight.delete(key);
    }
  }

  public cancelAll(): void {
    if (this.inFlight.size === 0) {
      return;
    }

    this.logger?.info('Cancelling in-flight chunk requests', { count: this.inFlight.size });

    for (const controller of this.inFlight.values()) {
      controller.abort();
    }

    this.inFlight.clear();
  }
}
