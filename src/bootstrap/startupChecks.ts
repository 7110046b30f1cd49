import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { StructuredLogger } from '../logging/StructuredLogger';
import { makeOfflineEnv } from '../services/asr/speechWorker';
import { CommandRunner, runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

const assertPathExists = (absolutePath: string, label: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Update your voxpipe env config.`);
  }
};

export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger,
  commandRunner: CommandRunner = runCommand
): Promise<void> => {
  logger.info('Running startup checks');

  assertPathExists(path.resolve(config.workerScriptPath), 'Speech worker script');

  if (path.isAbsolute(config.pythonBin) && fs.existsSync(config.pythonBin)) {
    fs.accessSync(config.pythonBin, fsConstants.X_OK);
  }

  await commandRunner(config.pythonBin, ['--version'], { timeoutMs: 8000 });
  await commandRunner(config.pythonBin, ['-c', 'import faster_whisper; print("deps-ok")'], {
    timeoutMs: 20000,
    env: makeOfflineEnv(config.enforceOffline)
  });

  await commandRunner('ffmpeg', ['-version'], { timeoutMs: 8000 });

  logger.info('Startup checks completed successfully');
};
