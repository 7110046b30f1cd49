import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker } from '../perf/LatencyTracker';
import { CaptureSource } from '../services/capture/CaptureSource';
import { CompletedTranscript, FailedSession, RecordingState } from '../types';
import { AudioBuffer } from './audio/AudioBuffer';
import { calculateRms, float32ToPcm16 } from './audio/pcm';
import { BannerPresenter, KeyInterceptor, SoundPlayer, TextInserter } from './collaborators';
import { ProviderRegistry } from './providers/ProviderRegistry';
import { ProviderMode, TranscriptionProvider } from './providers/types';
import {
  DEFAULT_LIVE_STREAMING_OPTIONS,
  LiveStreamingController,
  LiveStreamingUpdate
} from './streaming/LiveStreamingController';
import { TranscriptionDispatcher } from './transcription/TranscriptionDispatcher';
import { TranscriptionQueueBridge } from './transcription/TranscriptionQueueBridge';
import { UsageStatistics } from './UsageStatistics';
import {
  AutoEndConfiguration,
  DEFAULT_AUTO_END_CONFIGURATION,
  SpeechSessionTracker
} from './vad/SpeechSessionTracker';
import { VADError, VoiceActivityDetector } from './vad/types';

export const NO_PROVIDER_MESSAGE = 'Set up a transcription provider to start dictating';

/** `detail` of the `recording` state while the microphone and provider are still opening. */
export const STARTING_DETAIL = 'starting';

export type StopReason = 'toggle' | 'manual' | 'submit' | 'autoEnd' | 'streamClosed' | 'shutdown';

export interface RecordingOptions {
  providerId: string;
  language: string;
  sampleRate: number;
  frameDurationMs: number;
  /** Seconds of audio per chunk before a pause may close it. */
  maxChunkDuration: number;
  /** Non-final chunks shorter than this many seconds are dropped. */
  minChunkDuration: number;
  /** The final chunk is dropped below this length. */
  minRecordingDurationMs: number;
  /** With VAD active, a chunk is sent regardless of speech once it reaches this multiple of `maxChunkDuration`. */
  forceSendChunkMultiplier: number;
  skipSilentChunks: boolean;
  minSpeechRatio: number;
  /** Frame RMS above which a frame batch is flagged as speech in the buffer. */
  silenceRmsThreshold: number;
  minSilenceAfterSpeech: number;
  autoEnd: AutoEndConfiguration;
  chunkCheckIntervalMs: number;
  /** Wait after the final chunk before counting stragglers. A heuristic, not a guarantee. */
  finalizeTimeoutMs: number;
  finishRetryDelayMs: number;
  maxFinishRetries: number;
  streamFinalizeTimeoutMs: number;
}

export const DEFAULT_RECORDING_OPTIONS: RecordingOptions = {
  providerId: 'worker-batch',
  language: 'en-US',
  sampleRate: 16000,
  frameDurationMs: 100,
  maxChunkDuration: 60,
  minChunkDuration: 1,
  minRecordingDurationMs: 250,
  forceSendChunkMultiplier: 2,
  skipSilentChunks: true,
  minSpeechRatio: 0.03,
  silenceRmsThreshold: 0.003,
  minSilenceAfterSpeech: 1,
  autoEnd: DEFAULT_AUTO_END_CONFIGURATION,
  chunkCheckIntervalMs: 500,
  finalizeTimeoutMs: 1000,
  finishRetryDelayMs: 2000,
  maxFinishRetries: 30,
  streamFinalizeTimeoutMs: 2000
};

export interface RecordingControllerDependencies {
  capture: CaptureSource;
  providers: ProviderRegistry;
  vad: VoiceActivityDetector;
  textInserter: TextInserter;
  banner: BannerPresenter;
  keyInterceptor: KeyInterceptor;
  sounds: SoundPlayer;
  statistics?: UsageStatistics;
  now?: () => number;
}

interface ActiveSession {
  id: string;
  stage: 'recording' | 'processingFinal';
  mode: ProviderMode;
  provider: TranscriptionProvider;
  startedAt: number;
  transcriptParts: string[];
  capturing: boolean;
  vadActive: boolean;
  completing: boolean;
  /** True until capture (and the stream, if any) is open; stops wait for it. */
  starting: boolean;
  pendingStop?: StopReason;
  submitOnComplete: boolean;
  live?: LiveStreamingController;
  sessionTimer?: NodeJS.Timeout;
  finishTimer?: NodeJS.Timeout;
}

export declare interface RecordingController {
  on(event: 'stateChanged', listener: (state: RecordingState) => void): this;
  on(event: 'transcriptCompleted', listener: (result: CompletedTranscript) => void): this;
  on(event: 'sessionFailed', listener: (failure: FailedSession) => void): this;
}

export class RecordingController extends EventEmitter {
  private state: RecordingState = { stage: 'idle' };
  private session: ActiveSession | undefined;
  private vadChain: Promise<void> = Promise.resolve();
  private insertChain: Promise<void> = Promise.resolve();
  private readonly now: () => number;
  private readonly buffer: AudioBuffer;
  private readonly bridge: TranscriptionQueueBridge;
  private readonly dispatcher: TranscriptionDispatcher;
  private readonly tracker: SpeechSessionTracker;
  private readonly latency = new LatencyTracker();

  public constructor(
    private readonly deps: RecordingControllerDependencies,
    private readonly logger?: StructuredLogger,
    private readonly options: RecordingOptions = DEFAULT_RECORDING_OPTIONS
  ) {
    super();
    this.now = deps.now ?? Date.now;
    this.buffer = new AudioBuffer(options.sampleRate, logger);
    this.bridge = new TranscriptionQueueBridge(logger);
    this.dispatcher = new TranscriptionDispatcher(
      { bridge: this.bridge, statistics: deps.statistics, latency: this.latency },
      logger
    );
    this.tracker = new SpeechSessionTracker({
      maxChunkDuration: options.maxChunkDuration,
      minSilenceAfterSpeech: options.minSilenceAfterSpeech,
      autoEnd: options.autoEnd,
      now: this.now
    });

    this.bridge.on('text', (text) => {
      this.handleChunkText(text);
    });
    this.bridge.on('allComplete', () => {
      this.handleAllChunksComplete();
    });
  }

  public getState(): RecordingState {
    return this.state;
  }

  public async toggle(): Promise<void> {
    if (this.session?.stage === 'recording') {
      await this.stopRecording('toggle');
      return;
    }

    await this.startRecording();
  }

  /** Resolves to true once audio is flowing. */
  public async startRecording(): Promise<boolean> {
    if (this.session?.stage === 'processingFinal') {
      this.logger?.info('Start rejected while the previous session is finishing', {
        sessionId: this.session.id
      });
      this.deps.sounds.play('error');
      return false;
    }

    if (this.session) {
      this.logger?.info('Start ignored; a session is already active', {
        stage: this.session.stage
      });
      return false;
    }

    const provider = this.deps.providers.get(this.options.providerId);
    if (!provider || !provider.isConfigured()) {
      this.logger?.warn('No transcription provider configured', {
        providerId: this.options.providerId
      });
      this.deps.banner.show(NO_PROVIDER_MESSAGE, 'error');
      this.deps.sounds.play('error');
      return false;
    }

    const session: ActiveSession = {
      id: randomUUID(),
      stage: 'recording',
      mode: provider.mode,
      provider,
      startedAt: this.now(),
      transcriptParts: [],
      capturing: false,
      vadActive: false,
      completing: false,
      starting: true,
      submitOnComplete: false
    };
    this.session = session;

    this.buffer.reset();
    this.bridge.reset();
    this.latency.reset();
    this.deps.vad.resetSession();
    this.tracker.startSession();

    this.deps.textInserter.captureTarget();
    this.deps.sounds.play('start');
    this.deps.keyInterceptor.start({
      onEscape: () => {
        this.handleEscape(session.id);
      },
      onEnter: () => {
        this.handleEnter(session.id);
      }
    });
    this.setState({ stage: 'recording', sessionId: session.id, detail: STARTING_DETAIL });

    session.vadActive = await this.initializeVad();

    try {
      if (provider.mode === 'streaming' && this.session === session) {
        const live = new LiveStreamingController(
          (update) => {
            this.handleLiveUpdate(session.id, update);
          },
          this.deps.textInserter,
          this.logger,
          {
            ...DEFAULT_LIVE_STREAMING_OPTIONS,
            finalizeTimeoutMs: this.options.streamFinalizeTimeoutMs
          }
        );
        session.live = live;
        await live.start(
          provider,
          provider.buildSessionConfig({
            language: this.options.language,
            sampleRate: this.options.sampleRate
          })
        );
      }

      if (this.session !== session) {
        return false;
      }

      session.capturing = true;
      await this.deps.capture.start({
        sampleRate: this.options.sampleRate,
        frameDurationMs: this.options.frameDurationMs,
        onFrames: (frames) => {
          this.handleFrames(session.id, frames);
        }
      });
    } catch (error) {
      await this.failSession(session.id, error);
      return false;
    }

    if (this.session !== session) {
      // Cancelled while the microphone was opening.
      await this.stopCapture();
      return false;
    }

    session.starting = false;
    session.sessionTimer = setInterval(() => {
      this.evaluateSession(session.id);
    }, this.options.chunkCheckIntervalMs);

    this.setState({ stage: 'recording', sessionId: session.id, detail: provider.displayName });
    this.logger?.info('Recording started', {
      sessionId: session.id,
      provider: provider.id,
      mode: provider.mode,
      vadActive: session.vadActive,
      maxChunkDuration: this.options.maxChunkDuration
    });

    if (session.pendingStop) {
      await this.stopRecording(session.pendingStop);
    }

    return true;
  }

  public async stopRecording(reason: StopReason = 'manual'): Promise<void> {
    const session = this.session;
    if (!session || session.stage !== 'recording') {
      this.logger?.debug('Stop ignored; not recording', { reason });
      return;
    }

    if (session.starting) {
      this.logger?.info('Stop deferred until capture has started', {
        sessionId: session.id,
        reason
      });
      session.pendingStop = session.pendingStop ?? reason;
      return;
    }

    session.stage = 'processingFinal';
    // Escape is released here; Enter stays armed so it can still ask for a submit.
    this.deps.keyInterceptor.stop();
    this.deps.keyInterceptor.start({
      onEnter: () => {
        this.handleEnter(session.id);
      }
    });
    this.clearTimers(session);
    this.setState({ stage: 'processingFinal', sessionId: session.id, detail: reason });
    this.logger?.info('Recording stopped', {
      sessionId: session.id,
      reason,
      durationSeconds: (this.now() - session.startedAt) / 1000
    });

    await this.stopCapture();
    session.capturing = false;
    await this.vadChain;

    if (this.session !== session) {
      return;
    }

    if (session.mode === 'streaming') {
      const leftover = this.buffer.takeAll();
      this.logger?.debug('Released buffered audio after streaming session', {
        samples: leftover.samples.length
      });

      await session.live?.finish();
      if (this.session !== session) {
        return;
      }

      await this.completeSession(session.id);
      return;
    }

    this.dispatchBufferedChunk(session, true);
    this.scheduleFinishCheck(session, 0, this.options.finalizeTimeoutMs);
  }

  /** Stops like `stopRecording`, then presses Enter once the transcript has been typed. */
  public async stopRecordingAndSubmit(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }

    session.submitOnComplete = true;
    await this.stopRecording('submit');
  }

  public async cancelRecording(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }

    this.detachSession(session);
    this.deps.sounds.play('cancel');
    this.setState({ stage: 'idle', detail: 'cancelled' });
    this.logger?.info('Recording cancelled', {
      sessionId: session.id,
      stage: session.stage
    });

    await this.releaseSessionResources(session);
  }

  public async shutdown(): Promise<void> {
    if (this.session) {
      await this.cancelRecording();
    }

    this.dispatcher.cancelAll();
    await this.insertChain;
  }

  private async initializeVad(): Promise<boolean> {
    if (!this.deps.vad.isAvailable) {
      return false;
    }

    try {
      await this.deps.vad.initialize();
      return true;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('VAD unavailable; recording without speech boundaries', { detail });
      return false;
    }
  }

  private handleFrames(sessionId: string, frames: Float32Array): void {
    const session = this.session;
    if (!session || session.id !== sessionId || !session.capturing || frames.length === 0) {
      return;
    }

    const hasSpeech = calculateRms(frames) > this.options.silenceRmsThreshold;
    this.buffer.append(frames, hasSpeech);

    session.live?.sendAudio(float32ToPcm16(frames));

    if (session.vadActive) {
      this.enqueueVad(sessionId, frames);
    }
  }

  private enqueueVad(sessionId: string, frames: Float32Array): void {
    this.vadChain = this.vadChain
      .then(async () => {
        const session = this.session;
        if (!session || session.id !== sessionId || !session.vadActive) {
          return;
        }

        try {
          const result = await this.deps.vad.processChunk(frames);
          if (result.event && this.session === session) {
            this.tracker.onSpeechEvent(result.event);
            this.logger?.debug('Speech boundary', {
              event: result.event.type,
              at: result.event.at,
              probability: Number(result.probability.toFixed(3))
            });
          }
        } catch (error) {
          this.handleVadError(session, error);
        }
      })
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('VAD queue failed', { detail });
      });
  }

  private handleVadError(session: ActiveSession, error: unknown): void {
    const detail = error instanceof Error ? error.message : String(error);

    if (error instanceof VADError && error.kind === 'processingFailed') {
      this.logger?.warn('VAD frame failed; continuing', { detail });
      return;
    }

    if (error instanceof VADError && error.kind === 'notInitialized') {
      this.logger?.error('VAD used before initialization; disabling for this session', {
        detail
      });
    } else {
      this.logger?.warn('VAD disabled for this session', { detail });
    }

    session.vadActive = false;
  }

  private evaluateSession(sessionId: string): void {
    const session = this.session;
    if (!session || session.id !== sessionId || session.stage !== 'recording') {
      return;
    }

    if (!session.vadActive) {
      if (session.mode === 'batch' && this.buffer.duration >= this.options.maxChunkDuration) {
        this.dispatchBufferedChunk(session, false);
      }
      return;
    }

    if (session.mode === 'batch') {
      const forceSend =
        this.buffer.duration >= this.options.maxChunkDuration * this.options.forceSendChunkMultiplier;
      if (forceSend || this.tracker.shouldSendChunk()) {
        this.dispatchBufferedChunk(session, false);
      }
    }

    if (this.tracker.shouldAutoEndSession()) {
      this.logger?.info('Auto-ending session after silence', { ...this.tracker.snapshot() });
      this.runDetached(this.stopRecording('autoEnd'), 'Auto-end stop failed');
    }
  }

  private dispatchBufferedChunk(session: ActiveSession, isFinal: boolean): boolean {
    const drained = this.buffer.takeAll();
    this.tracker.chunkSent();

    const provider = session.provider;
    if (provider.mode !== 'batch') {
      return false;
    }

    const seconds = drained.samples.length / this.options.sampleRate;
    const minSeconds = isFinal
      ? this.options.minRecordingDurationMs / 1000
      : this.options.minChunkDuration;

    if (seconds < minSeconds) {
      this.logger?.info('Skipping chunk below minimum duration', { seconds, minSeconds, isFinal });
      return false;
    }

    if (this.options.skipSilentChunks && !this.chunkHasSpeech(session, drained.speechRatio, isFinal)) {
      this.logger?.info('Skipping silent chunk', {
        seconds,
        speechRatio: Number(drained.speechRatio.toFixed(3)),
        isFinal
      });
      return false;
    }

    const ticket = this.bridge.issueTicket();
    void this.dispatcher
      .dispatch(
        ticket,
        {
          samples: drained.samples,
          sampleRate: this.options.sampleRate,
          speechRatio: drained.speechRatio
        },
        provider
      )
      .then(
        () => {
          this.handleChunkSettled(session.id);
        },
        (error: unknown) => {
          const detail = error instanceof Error ? error.message : String(error);
          this.logger?.error('Chunk dispatch failed unexpectedly', { detail, seq: ticket.seq });
        }
      );

    return true;
  }

  private chunkHasSpeech(session: ActiveSession, speechRatio: number, isFinal: boolean): boolean {
    if (speechRatio >= this.options.minSpeechRatio) {
      return true;
    }

    return isFinal && session.vadActive && this.deps.vad.hasSignificantSpeech();
  }

  private handleChunkText(text: string): void {
    const session = this.session;
    if (!session) {
      return;
    }

    const spaced = session.transcriptParts.length > 0 ? ` ${text}` : text;
    session.transcriptParts.push(text);
    this.enqueueInsert(session.id, spaced);
  }

  private handleChunkSettled(sessionId: string): void {
    const session = this.session;
    if (!session || session.id !== sessionId || session.stage !== 'processingFinal') {
      return;
    }

    this.bridge.checkCompletion();
  }

  private handleAllChunksComplete(): void {
    const session = this.session;
    if (!session || session.mode !== 'batch' || session.stage !== 'processingFinal') {
      return;
    }

    this.runDetached(this.completeSession(session.id), 'Session completion failed');
  }

  private scheduleFinishCheck(session: ActiveSession, attempt: number, delayMs: number): void {
    session.finishTimer = setTimeout(() => {
      this.finishIfDone(session.id, attempt);
    }, delayMs);
  }

  private finishIfDone(sessionId: string, attempt: number): void {
    const session = this.session;
    if (!session || session.id !== sessionId || session.stage !== 'processingFinal') {
      return;
    }

    session.finishTimer = undefined;
    const pending = this.bridge.getPendingCount();

    if (pending > 0) {
      if (attempt + 1 >= this.options.maxFinishRetries) {
        this.logger?.warn('Giving up on straggling chunks', { pending, attempts: attempt + 1 });
        this.dispatcher.cancelAll();
        this.runDetached(this.completeSession(sessionId), 'Session completion failed');
        return;
      }

      this.logger?.info('Waiting for pending chunks', { pending, attempt: attempt + 1 });
      this.scheduleFinishCheck(session, attempt + 1, this.options.finishRetryDelayMs);
      return;
    }

    if (this.bridge.getIssuedCount() === 0) {
      this.runDetached(this.completeSession(sessionId), 'Session completion failed');
      return;
    }

    this.bridge.checkCompletion();
  }

  private async completeSession(sessionId: string): Promise<void> {
    const session = this.session;
    if (!session || session.id !== sessionId || session.completing) {
      return;
    }

    session.completing = true;
    this.clearTimers(session);
    await this.insertChain;

    if (this.session !== session) {
      return;
    }

    const transcript =
      session.mode === 'streaming'
        ? session.live?.getTranscript() ?? ''
        : session.transcriptParts.join(' ');
    const durationSeconds = (this.now() - session.startedAt) / 1000;
    this.session = undefined;
    this.deps.keyInterceptor.stop();

    if (transcript) {
      this.deps.sounds.play('stop');
      this.emit('transcriptCompleted', { sessionId, transcript, durationSeconds });
    }

    this.logger?.info('Session completed', {
      sessionId,
      mode: session.mode,
      transcriptLength: transcript.length,
      chunks: this.bridge.getIssuedCount(),
      latencySummary: this.latency.summarize()
    });
    this.setState({ stage: 'idle', detail: transcript ? undefined : 'No speech transcribed' });

    if (session.submitOnComplete) {
      await this.submit(sessionId);
    }
  }

  private async submit(sessionId: string): Promise<void> {
    try {
      await this.deps.textInserter.submit();
      this.logger?.info('Submitted dictated text', { sessionId });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Submit keystroke failed', { sessionId, detail });
    }
  }

  private async failSession(sessionId: string, error: unknown): Promise<void> {
    const session = this.session;
    if (!session || session.id !== sessionId) {
      return;
    }

    const detail = error instanceof Error ? error.message : String(error);
    this.detachSession(session);
    this.deps.banner.show(detail, 'error');
    this.deps.sounds.play('error');
    this.logger?.error('Recording session failed', { sessionId, detail });
    this.emit('sessionFailed', { sessionId, detail });
    this.setState({ stage: 'idle', detail });

    await this.releaseSessionResources(session);
  }

  private handleLiveUpdate(sessionId: string, update: LiveStreamingUpdate): void {
    const session = this.session;
    if (!session || session.id !== sessionId) {
      return;
    }

    switch (update.type) {
      case 'error':
        this.runDetached(this.failSession(sessionId, update.error), 'Streaming failure cleanup failed');
        return;
      case 'closed':
        if (session.stage === 'recording') {
          this.runDetached(this.stopRecording('streamClosed'), 'Stop after stream close failed');
        }
        return;
      case 'final':
        this.logger?.debug('Streaming final result', {
          textLength: update.text.length,
          speechFinal: update.speechFinal
        });
        return;
      case 'speechStarted':
      case 'utteranceEnd':
        this.logger?.debug('Streaming speech marker', { event: update.type });
        return;
      case 'interim':
        return;
    }
  }

  private handleEscape(sessionId: string): void {
    const session = this.session;
    if (!session || session.id !== sessionId || session.stage !== 'recording') {
      return;
    }

    this.logger?.info('Escape pressed; cancelling recording', { sessionId });
    this.runDetached(this.cancelRecording(), 'Escape cancel failed');
  }

  /** Enter while recording stops and submits; while finishing it only asks for the submit. */
  private handleEnter(sessionId: string): void {
    const session = this.session;
    if (!session || session.id !== sessionId) {
      return;
    }

    if (session.stage === 'recording') {
      this.logger?.info('Enter pressed; stopping and submitting', { sessionId });
      this.runDetached(this.stopRecordingAndSubmit(), 'Stop and submit failed');
      return;
    }

    this.logger?.info('Enter pressed while finishing; submitting on completion', { sessionId });
    session.submitOnComplete = true;
  }

  private enqueueInsert(sessionId: string, text: string): void {
    this.insertChain = this.insertChain
      .then(async () => {
        if (this.session?.id !== sessionId) {
          return;
        }

        await this.deps.textInserter.insert(text, true);
      })
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Text insertion failed', { detail });
      });
  }

  /** Synchronous part of tearing a session down; after this no late result can reach the user. */
  private detachSession(session: ActiveSession): void {
    this.session = undefined;
    this.deps.keyInterceptor.stop();
    this.clearTimers(session);
    this.buffer.reset();
    this.bridge.reset();
    this.dispatcher.cancelAll();
    this.deps.textInserter.cancel();
  }

  private async releaseSessionResources(session: ActiveSession): Promise<void> {
    const wasCapturing = session.capturing;
    session.capturing = false;

    await Promise.all([
      wasCapturing ? this.stopCapture() : Promise.resolve(),
      session.live ? session.live.cancel() : Promise.resolve()
    ]);
  }

  private async stopCapture(): Promise<void> {
    try {
      await this.deps.capture.stop();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Failed to stop audio capture cleanly', { detail });
    }
  }

  private clearTimers(session: ActiveSession): void {
    if (session.sessionTimer) {
      clearInterval(session.sessionTimer);
      session.sessionTimer = undefined;
    }

    if (session.finishTimer) {
      clearTimeout(session.finishTimer);
      session.finishTimer = undefined;
    }
  }

  private runDetached(task: Promise<void>, label: string): void {
    task.catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error(label, { detail });
    });
  }

  private setState(next: RecordingState): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('State changed', {
      stage: next.stage,
      sessionId: next.sessionId,
      detail: next.detail
    });
  }
}
