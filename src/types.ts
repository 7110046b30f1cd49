export type ProviderId = 'worker-batch' | 'worker-stream';
export type VadPreset = 'default' | 'sensitive' | 'strict';
export type AutoEndPreset = 'default' | 'quick' | 'relaxed' | 'disabled';

/** Allowed chunk lengths in seconds; 3600 means "send the whole recording as one chunk". */
export const CHUNK_DURATION_OPTIONS = [15, 30, 45, 60, 120, 300, 600, 900, 3600] as const;
export type ChunkDurationSeconds = (typeof CHUNK_DURATION_OPTIONS)[number];

export type RecordingStage = 'idle' | 'recording' | 'processingFinal';

export interface RecordingState {
  stage: RecordingStage;
  sessionId?: string;
  detail?: string;
}

export interface CompletedTranscript {
  sessionId: string;
  transcript: string;
  durationSeconds: number;
}

export interface FailedSession {
  sessionId: string;
  detail: string;
}

export interface AppConfig {
  hotkey: string;
  provider: ProviderId;
  pythonBin: string;
  workerScriptPath: string;
  asrModel: string;
  asrDevice: string;
  asrComputeType: string;
  language: string;
  enforceOffline: boolean;
  ffmpegInputFormat: string;
  ffmpegInputDevice: string;
  frameDurationMs: number;
  vadEnabled: boolean;
  vadPreset: VadPreset;
  vadThreshold: number | undefined;
  vadMinSpeechMs: number;
  vadMinSilenceMs: number;
  autoEnd: AutoEndPreset;
  chunkDurationSeconds: ChunkDurationSeconds;
  skipSilentChunks: boolean;
  finalizeTimeoutMs: number;
  finishRetryDelayMs: number;
  maxFinishRetries: number;
  streamFinalizeTimeoutMs: number;
  soundsEnabled: boolean;
  logDir: string;
}
