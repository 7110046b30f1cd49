import fs from 'node:fs';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AppConfig } from '../../types';
import { PersistentJsonWorker } from '../process/PersistentJsonWorker';

export interface WorkerTranscript {
  text: string;
  isFinal: boolean;
  speechFinal: boolean;
}

const WAV_HEADER_BYTES = 44;
const BYTES_PER_SECOND_16K_MONO = 32000;
const MIN_REQUEST_TIMEOUT_MS = 10000;
const MAX_REQUEST_TIMEOUT_MS = 120000;

export const makeOfflineEnv = (enforceOffline: boolean): NodeJS.ProcessEnv => {
  if (!enforceOffline) {
    return { ...process.env };
  }

  return {
    ...process.env,
    HF_HUB_OFFLINE: '1',
    TRANSFORMERS_OFFLINE: '1'
  };
};

/** The worker takes ISO 639-1 codes, so `en-US` becomes `en`. */
export const toWorkerLanguage = (language: string): string =>
  language.split(/[-_]/)[0].toLowerCase() || 'en';

/** Longer audio gets a longer deadline: 10 s plus 1.5 s per second of audio, capped at 2 minutes. */
export const requestTimeoutMs = (wavByteLength: number): number => {
  const audioSeconds = Math.max(0, wavByteLength - WAV_HEADER_BYTES) / BYTES_PER_SECOND_16K_MONO;
  return Math.round(
    Math.min(MAX_REQUEST_TIMEOUT_MS, MIN_REQUEST_TIMEOUT_MS + audioSeconds * 1500)
  );
};

export const parseWorkerTranscript = (value: unknown): WorkerTranscript => {
  if (typeof value !== 'object' || value === null) {
    throw new Error('Speech worker returned an empty result');
  }

  const text = 'text' in value ? value.text : undefined;
  if (typeof text !== 'string') {
    throw new Error('Speech worker result is missing text');
  }

  const isFinal = 'isFinal' in value && value.isFinal === true;
  const speechFinal = 'speechFinal' in value && value.speechFinal === true;

  return { text: text.trim(), isFinal, speechFinal };
};

export const isWorkerConfigured = (config: AppConfig): boolean =>
  Boolean(config.pythonBin.trim()) && fs.existsSync(config.workerScriptPath);

export const createSpeechWorker = (
  config: AppConfig,
  logger?: StructuredLogger
): PersistentJsonWorker =>
  new PersistentJsonWorker({
    name: 'speech',
    command: config.pythonBin,
    args: [
      config.workerScriptPath,
      '--serve',
      '--model',
      config.asrModel,
      '--device',
      config.asrDevice,
      '--compute-type',
      config.asrComputeType
    ],
    env: makeOfflineEnv(config.enforceOffline),
    logger
  });
