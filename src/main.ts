import dotenv from 'dotenv';
import { resolveConfig, validateConfig } from './config';
import { createRuntime, Runtime } from './bootstrap/runtime';
import { runStartupChecks } from './bootstrap/startupChecks';
import { StructuredLogger } from './logging/StructuredLogger';
import { ToggleHotkey } from './services/hotkey/ToggleHotkey';

dotenv.config();

let runtime: Runtime | undefined;
let hotkeyHandler: ToggleHotkey | undefined;
let logger: StructuredLogger | undefined;
let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  logger?.info('Shutting down', { signal });

  hotkeyHandler?.stop();
  await runtime?.shutdown();
  await logger?.flush();
  process.exit(0);
};

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid voxpipe configuration:\n- ${configErrors.join('\n- ')}`);
  }

  logger = await StructuredLogger.create(config.logDir);
  logger.info('voxpipe bootstrap started', {
    logPath: logger.getLogPath(),
    provider: config.provider,
    enforceOffline: config.enforceOffline
  });

  await runStartupChecks(config, logger);

  const current = createRuntime(config, logger);
  runtime = current;

  const appLogger = logger;
  current.controller.on('stateChanged', (state) => {
    appLogger.info('Recording state changed', { ...state });
  });
  current.controller.on('transcriptCompleted', (result) => {
    appLogger.info('Dictation completed', {
      sessionId: result.sessionId,
      durationSeconds: result.durationSeconds,
      length: result.transcript.length
    });
  });

  const provider = current.providers.get(config.provider);
  await provider?.warmup?.();

  hotkeyHandler = new ToggleHotkey(
    config.hotkey,
    current.keyboard,
    async () => {
      await current.controller.toggle();
    },
    logger
  );
  await hotkeyHandler.start();

  logger.info('Ready', { hotkey: hotkeyHandler.describeBinding() });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[voxpipe] Shutdown failed: ${detail}`);
        process.exit(1);
      });
    });
  }
};

bootstrap().catch(async (error: unknown) => {
  const detail = error instanceof Error ? error.message : String(error);
  logger?.error('Fatal bootstrap failure', { detail });
  console.error(`[voxpipe] ${detail}\n\nCheck your .env settings for the python worker and microphone, then retry.`);
  await runtime?.shutdown().catch((shutdownError: unknown) => {
    const shutdownDetail =
      shutdownError instanceof Error ? shutdownError.message : String(shutdownError);
    logger?.warn('Shutdown after bootstrap failure did not complete', { detail: shutdownDetail });
  });
  await logger?.flush();
  process.exit(1);
});
