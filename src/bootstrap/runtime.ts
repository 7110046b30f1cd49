import { GlobalKeyboardListener } from 'node-global-key-listener';
import { ProviderRegistry } from '../core/providers/ProviderRegistry';
import { DEFAULT_RECORDING_OPTIONS, RecordingController, RecordingOptions } from '../core/RecordingController';
import { UsageStatistics } from '../core/UsageStatistics';
import { createVADProcessor } from '../core/vad/createVADProcessor';
import { EnergySpeechModel } from '../core/vad/EnergySpeechModel';
import { AUTO_END_PRESETS } from '../core/vad/SpeechSessionTracker';
import { VADConfiguration, VAD_PRESETS } from '../core/vad/types';
import { StructuredLogger } from '../logging/StructuredLogger';
import { createSpeechWorker, isWorkerConfigured } from '../services/asr/speechWorker';
import { WorkerBatchProvider } from '../services/asr/WorkerBatchProvider';
import { WorkerStreamingProvider } from '../services/asr/WorkerStreamingProvider';
import { FfmpegCaptureSource } from '../services/capture/FfmpegCaptureSource';
import { SystemSoundPlayer } from '../services/feedback/SystemSoundPlayer';
import { TerminalBannerPresenter } from '../services/feedback/TerminalBannerPresenter';
import { SessionKeyInterceptor } from '../services/hotkey/SessionKeyInterceptor';
import { KeyboardListener } from '../services/hotkey/keys';
import { TerminalTextInserter } from '../services/inject/TerminalTextInserter';
import { AppConfig } from '../types';

export const vadConfigurationFromConfig = (config: AppConfig): VADConfiguration => {
  const preset = VAD_PRESETS[config.vadPreset];

  return {
    ...preset,
    threshold: config.vadThreshold ?? preset.threshold,
    minSpeechDuration: config.vadMinSpeechMs / 1000,
    minSilenceAfterSpeech: config.vadMinSilenceMs / 1000,
    enabled: config.vadEnabled
  };
};

export const recordingOptionsFromConfig = (config: AppConfig): RecordingOptions => ({
  ...DEFAULT_RECORDING_OPTIONS,
  providerId: config.provider,
  language: config.language,
  frameDurationMs: config.frameDurationMs,
  maxChunkDuration: config.chunkDurationSeconds,
  skipSilentChunks: config.skipSilentChunks,
  minSilenceAfterSpeech: config.vadMinSilenceMs / 1000,
  autoEnd: AUTO_END_PRESETS[config.autoEnd],
  finalizeTimeoutMs: config.finalizeTimeoutMs,
  finishRetryDelayMs: config.finishRetryDelayMs,
  maxFinishRetries: config.maxFinishRetries,
  streamFinalizeTimeoutMs: config.streamFinalizeTimeoutMs
});

export interface RuntimeOptions {
  /** Where dictated text is typed and where banners go. */
  output?: { write(chunk: string): unknown };
  keyboard?: KeyboardListener & { kill(): void };
}

export interface Runtime {
  controller: RecordingController;
  providers: ProviderRegistry;
  statistics: UsageStatistics;
  keyboard: KeyboardListener;
  shutdown(): Promise<void>;
}

export const createRuntime = (
  config: AppConfig,
  logger: StructuredLogger,
  options: RuntimeOptions = {}
): Runtime => {
  const recordingOptions = recordingOptionsFromConfig(config);
  const keyboard = options.keyboard ?? new GlobalKeyboardListener();
  const output = options.output ?? process.stdout;

  const worker = createSpeechWorker(config, logger);
  const workerReady = (): boolean => isWorkerConfigured(config);
  const providers = new ProviderRegistry();
  providers.register(
    new WorkerBatchProvider(worker, { language: config.language, isConfigured: workerReady }, logger)
  );
  providers.register(
    new WorkerStreamingProvider(
      worker,
      { language: config.language, isConfigured: workerReady },
      logger
    )
  );

  const statistics = new UsageStatistics();
  const vad = createVADProcessor(vadConfigurationFromConfig(config), new EnergySpeechModel(), {
    sampleRate: recordingOptions.sampleRate,
    logger
  });

  const controller = new RecordingController(
    {
      capture: new FfmpegCaptureSource(
        { inputFormat: config.ffmpegInputFormat, inputDevice: config.ffmpegInputDevice },
        logger
      ),
      providers,
      vad,
      textInserter: new TerminalTextInserter(output, logger),
      banner: new TerminalBannerPresenter(output),
      keyInterceptor: new SessionKeyInterceptor(keyboard, logger),
      sounds: new SystemSoundPlayer({ enabled: config.soundsEnabled }, logger),
      statistics
    },
    logger,
    recordingOptions
  );

  return {
    controller,
    providers,
    statistics,
    keyboard,
    shutdown: async () => {
      await controller.shutdown();
      await providers.shutdownAll();
      keyboard.kill();
    }
  };
};
