import os from 'node:os';
import path from 'node:path';
import {
  AppConfig,
  AutoEndPreset,
  CHUNK_DURATION_OPTIONS,
  ChunkDurationSeconds,
  ProviderId,
  VadPreset
} from './types';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrUndefined = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const resolveProvider = (value: string | undefined): ProviderId => {
  if (value === 'worker-stream') {
    return 'worker-stream';
  }

  return 'worker-batch';
};

const resolveVadPreset = (value: string | undefined): VadPreset => {
  if (value === 'sensitive' || value === 'strict') {
    return value;
  }

  return 'default';
};

const resolveAutoEndPreset = (value: string | undefined): AutoEndPreset => {
  if (value === 'quick' || value === 'relaxed' || value === 'disabled') {
    return value;
  }

  return 'default';
};

const resolveChunkDuration = (value: string | undefined): ChunkDurationSeconds => {
  const parsed = parseIntOrDefault(value, 60);
  const match = CHUNK_DURATION_OPTIONS.find((option) => option === parsed);
  return match ?? 60;
};

export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');
  const isMac = process.platform === 'darwin';

  return {
    hotkey: env.VOXPIPE_HOTKEY ?? 'CommandOrControl+Shift+Space',
    provider: resolveProvider(env.VOXPIPE_PROVIDER),
    pythonBin: env.VOXPIPE_PYTHON_BIN ?? 'python3',
    workerScriptPath:
      env.VOXPIPE_WORKER_SCRIPT ?? path.join(rootDir, 'python', 'transcribe_worker.py'),
    asrModel: env.VOXPIPE_MODEL ?? 'small.en',
    asrDevice: env.VOXPIPE_ASR_DEVICE ?? 'cpu',
    asrComputeType: env.VOXPIPE_ASR_COMPUTE_TYPE ?? 'int8',
    language: env.VOXPIPE_LANGUAGE ?? 'en-US',
    enforceOffline: parseBoolOrDefault(env.VOXPIPE_ENFORCE_OFFLINE, true),
    ffmpegInputFormat: env.VOXPIPE_FFMPEG_FORMAT ?? (isMac ? 'avfoundation' : 'pulse'),
    ffmpegInputDevice: env.VOXPIPE_FFMPEG_INPUT ?? (isMac ? ':0' : 'default'),
    frameDurationMs: parseIntOrDefault(env.VOXPIPE_FRAME_MS, 100),
    vadEnabled: parseBoolOrDefault(env.VOXPIPE_VAD_ENABLED, true),
    vadPreset: resolveVadPreset(env.VOXPIPE_VAD_PRESET),
    vadThreshold: parseFloatOrUndefined(env.VOXPIPE_VAD_THRESHOLD),
    vadMinSpeechMs: parseIntOrDefault(env.VOXPIPE_VAD_MIN_SPEECH_MS, 250),
    vadMinSilenceMs: parseIntOrDefault(env.VOXPIPE_VAD_MIN_SILENCE_MS, 1000),
    autoEnd: resolveAutoEndPreset(env.VOXPIPE_AUTO_END),
    chunkDurationSeconds: resolveChunkDuration(env.VOXPIPE_CHUNK_SECONDS),
    skipSilentChunks: parseBoolOrDefault(env.VOXPIPE_SKIP_SILENT_CHUNKS, true),
    finalizeTimeoutMs: parseIntOrDefault(env.VOXPIPE_FINALIZE_TIMEOUT_MS, 1000),
    finishRetryDelayMs: parseIntOrDefault(env.VOXPIPE_FINISH_RETRY_DELAY_MS, 2000),
    maxFinishRetries: parseIntOrDefault(env.VOXPIPE_MAX_FINISH_RETRIES, 30),
    streamFinalizeTimeoutMs: parseIntOrDefault(env.VOXPIPE_STREAM_FINALIZE_TIMEOUT_MS, 2000),
    soundsEnabled: parseBoolOrDefault(env.VOXPIPE_SOUNDS, true),
    logDir: env.VOXPIPE_LOG_DIR ?? path.join(os.homedir(), '.voxpipe', 'logs')
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!['worker-batch', 'worker-stream'].includes(config.provider)) {
    errors.push('VOXPIPE_PROVIDER must be one of: worker-batch, worker-stream.');
  }

  if (!config.hotkey.trim()) {
    errors.push('VOXPIPE_HOTKEY must not be empty.');
  }

  if (!config.pythonBin.trim()) {
    errors.push('VOXPIPE_PYTHON_BIN must not be empty.');
  }

  if (!config.workerScriptPath.trim()) {
    errors.push('VOXPIPE_WORKER_SCRIPT must not be empty.');
  }

  if (!config.ffmpegInputDevice.trim()) {
    errors.push('VOXPIPE_FFMPEG_INPUT must not be empty.');
  }

  if (config.frameDurationMs < 20 || config.frameDurationMs > 500) {
    errors.push('VOXPIPE_FRAME_MS must be between 20 and 500 milliseconds.');
  }

  if (config.vadThreshold !== undefined && (config.vadThreshold <= 0 || config.vadThreshold >= 1)) {
    errors.push('VOXPIPE_VAD_THRESHOLD must be greater than 0 and less than 1.');
  }

  if (config.vadMinSpeechMs < 50 || config.vadMinSpeechMs > 2000) {
    errors.push('VOXPIPE_VAD_MIN_SPEECH_MS must be between 50 and 2000 milliseconds.');
  }

  if (config.vadMinSilenceMs < 200 || config.vadMinSilenceMs > 10000) {
    errors.push('VOXPIPE_VAD_MIN_SILENCE_MS must be between 200 and 10000 milliseconds.');
  }

  if (config.finalizeTimeoutMs < 100 || config.finalizeTimeoutMs > 30000) {
    errors.push('VOXPIPE_FINALIZE_TIMEOUT_MS must be between 100 and 30000 milliseconds.');
  }

  if (config.finishRetryDelayMs < 100 || config.finishRetryDelayMs > 30000) {
    errors.push('VOXPIPE_FINISH_RETRY_DELAY_MS must be between 100 and 30000 milliseconds.');
  }

  if (config.maxFinishRetries < 1 || config.maxFinishRetries > 120) {
    errors.push('VOXPIPE_MAX_FINISH_RETRIES must be between 1 and 120.');
  }

  if (config.streamFinalizeTimeoutMs < 100 || config.streamFinalizeTimeoutMs > 30000) {
    errors.push('VOXPIPE_STREAM_FINALIZE_TIMEOUT_MS must be between 100 and 30000 milliseconds.');
  }

  if (!config.logDir.trim()) {
    errors.push('VOXPIPE_LOG_DIR must not be empty.');
  }

  return errors;
};
