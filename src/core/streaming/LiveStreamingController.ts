import { StructuredLogger } from '../../logging/StructuredLogger';
import { TextInserter } from '../collaborators';
import {
  ProviderError,
  StreamingSession,
  StreamingSessionConfig,
  StreamingTranscriptionProvider,
  TranscriptionEvent
} from '../providers/types';

export type LiveStreamingUpdate =
  | { type: 'interim'; text: string }
  | { type: 'final'; text: string; speechFinal: boolean }
  | { type: 'speechStarted' }
  | { type: 'utteranceEnd' }
  | { type: 'error'; error: Error }
  | { type: 'closed' };

export type LiveStreamingSink = (update: LiveStreamingUpdate) => void;

type ControllerState = 'idle' | 'connecting' | 'active' | 'finishing' | 'closed' | 'failed' | 'cancelled';

export interface LiveStreamingControllerOptions {
  /** How long `finish()` waits for the backend to close after finalize. */
  finalizeTimeoutMs: number;
  /** Audio waiting behind the in-flight send is capped here; the oldest frames go first. */
  maxQueuedAudioBytes: number;
}

export const DEFAULT_LIVE_STREAMING_OPTIONS: LiveStreamingControllerOptions = {
  finalizeTimeoutMs: 2000,
  // 30 s of 16 kHz mono PCM16.
  maxQueuedAudioBytes: 960000
};

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Drives a single streaming transcription session. Use one instance per recording session;
 * every update goes to the sink passed at construction.
 */
export class LiveStreamingController {
  private state: ControllerState = 'idle';
  private session: StreamingSession | undefined;
  private unsubscribe: (() => void) | undefined;
  private sendChain: Promise<void> = Promise.resolve();
  private queuedAudio: Buffer[] = [];
  private queuedBytes = 0;
  private insertChain: Promise<void> = Promise.resolve();
  private finalParts: string[] = [];
  private partialVisible = false;
  private closeReceived = false;
  private releaseCloseWait: (() => void) | undefined;

  public constructor(
    private readonly sink: LiveStreamingSink,
    private readonly textInserter: TextInserter,
    private readonly logger?: StructuredLogger,
    private readonly options: LiveStreamingControllerOptions = DEFAULT_LIVE_STREAMING_OPTIONS
  ) {}

  public get isActive(): boolean {
    return this.state === 'active';
  }

  public getTranscript(): string {
    return this.finalParts.join(' ');
  }

  public async start(
    provider: StreamingTranscriptionProvider,
    config: StreamingSessionConfig
  ): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error('Live streaming controller has already been started');
    }

    this.state = 'connecting';

    let session: StreamingSession;
    try {
      session = await provider.startSession(config);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      if (this.state === 'connecting') {
        this.state = 'failed';
      }
      throw new ProviderError(
        'connectionFailed',
        `Could not start a ${provider.displayName} session: ${detail}`,
        { cause: error }
      );
    }

    if (this.state !== 'connecting') {
      // Cancelled while connecting.
      await this.closeSession(session);
      return;
    }

    this.session = session;
    this.unsubscribe = session.subscribe((event) => {
      this.handleEvent(event);
    });
    this.state = 'active';

    this.logger?.info('Streaming session started', {
      provider: provider.id,
      language: config.language,
      sampleRate: config.sampleRate
    });
  }

  /** One send is in flight at a time; frames that arrive meanwhile are joined into the next send. */
  public sendAudio(pcm16: Buffer): void {
    const session = this.session;
    if (this.state !== 'active' || !session || pcm16.length === 0) {
      return;
    }

    this.queuedAudio.push(pcm16);
    this.queuedBytes += pcm16.length;
    this.trimQueuedAudio();

    // Only the first frame of a batch schedules a send; the rest ride along with it.
    if (this.queuedAudio.length === 1) {
      this.sendChain = this.sendChain
        .then(() => this.sendQueuedAudio(session))
        .catch((error: unknown) => {
          this.handleEvent({ type: 'error', error: toError(error) });
        });
    }
  }

  public handleEvent(event: TranscriptionEvent): void {
    if (this.state !== 'active' && this.state !== 'finishing') {
      this.logger?.debug('Dropping streaming event after session ended', {
        event: event.type,
        state: this.state
      });
      return;
    }

    switch (event.type) {
      case 'interim': {
        const text = event.result.transcript.trim();
        if (!text) {
          return;
        }

        this.partialVisible = true;
        this.enqueueInsert(text, false);
        this.sink({ type: 'interim', text });
        return;
      }
      case 'finalResult': {
        const text = event.result.transcript.trim();
        if (text) {
          this.finalParts.push(text);
        }

        if (text || this.partialVisible) {
          this.partialVisible = false;
          this.enqueueInsert(text, true);
        }

        this.sink({ type: 'final', text, speechFinal: event.result.speechFinal ?? false });
        return;
      }
      case 'speechStarted':
      case 'utteranceEnd':
        this.sink({ type: event.type });
        return;
      case 'error': {
        this.state = 'failed';
        this.releaseCloseWait?.();
        this.logger?.warn('Streaming session reported an error', { detail: event.error.message });
        this.sink({ type: 'error', error: event.error });
        void this.teardown();
        return;
      }
      case 'closed': {
        if (this.state === 'finishing') {
          this.closeReceived = true;
          this.releaseCloseWait?.();
          return;
        }

        this.state = 'closed';
        this.logger?.warn('Streaming session closed by provider');
        this.sink({ type: 'closed' });
        void this.teardown();
        return;
      }
    }
  }

  /** Flushes outstanding audio, finalizes, waits for the backend to close (bounded), then closes. */
  public async finish(): Promise<void> {
    const session = this.session;
    if (this.state !== 'active' || !session) {
      await this.insertChain;
      return;
    }

    this.state = 'finishing';
    await this.sendChain;

    try {
      await session.finalize();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Streaming finalize failed', { detail });
    }

    // The backend may already have closed while finalize() was running.
    if (this.state === 'finishing' && !this.closeReceived) {
      await this.waitForClose(this.options.finalizeTimeoutMs);
    }

    if (this.state === 'finishing') {
      this.state = 'closed';
      await this.teardown();
    }

    await this.insertChain;
  }

  public async cancel(): Promise<void> {
    if (this.state === 'cancelled' || this.state === 'closed') {
      return;
    }

    this.state = 'cancelled';
    this.releaseCloseWait?.();
    this.logger?.info('Streaming session cancelled');
    await this.teardown();
  }

  private async sendQueuedAudio(session: StreamingSession): Promise<void> {
    const frames = this.queuedAudio;
    this.queuedAudio = [];
    this.queuedBytes = 0;

    if (frames.length === 0 || (this.state !== 'active' && this.state !== 'finishing')) {
      return;
    }

    if (frames.length > 1) {
      this.logger?.debug('Joined queued audio into one send', { frames: frames.length });
    }

    await session.sendAudio(frames.length === 1 ? frames[0] : Buffer.concat(frames));
  }

  private trimQueuedAudio(): void {
    let dropped = 0;
    while (this.queuedBytes > this.options.maxQueuedAudioBytes && this.queuedAudio.length > 1) {
      const oldest = this.queuedAudio.shift();
      if (!oldest) {
        break;
      }

      this.queuedBytes -= oldest.length;
      dropped += oldest.length;
    }

    if (dropped > 0) {
      this.logger?.warn('Streaming backend is behind; dropped queued audio', {
        droppedBytes: dropped,
        queuedBytes: this.queuedBytes
      });
    }
  }

  private enqueueInsert(text: string, isFinal: boolean): void {
    this.insertChain = this.insertChain
      .then(async () => {
        if (this.state === 'cancelled') {
          return;
        }

        await this.textInserter.insert(text, isFinal);
      })
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Text insertion failed', { detail, isFinal });
      });
  }

  private waitForClose(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.releaseCloseWait = undefined;
        this.logger?.info('Streaming session did not close before timeout; closing it', {
          timeoutMs
        });
        resolve();
      }, timeoutMs);

      this.releaseCloseWait = () => {
        clearTimeout(timer);
        this.releaseCloseWait = undefined;
        resolve();
      };
    });
  }

  private async teardown(): Promise<void> {
    this.queuedAudio = [];
    this.queuedBytes = 0;
    this.unsubscribe?.();
    this.unsubscribe = undefined;

    const session = this.session;
    this.session = undefined;
    if (session) {
      await this.closeSession(session);
    }
  }

  private async closeSession(session: StreamingSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Failed to close streaming session', { detail });
    }
  }
}
