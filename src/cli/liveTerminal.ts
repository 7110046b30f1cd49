#!/usr/bin/env node
import readline from 'node:readline';
import dotenv from 'dotenv';
import { createRuntime, Runtime } from '../bootstrap/runtime';
import { resolveConfig, validateConfig } from '../config';
import { STARTING_DETAIL } from '../core/RecordingController';
import { StructuredLogger } from '../logging/StructuredLogger';

dotenv.config();

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  <enter>             Start/stop dictation\n');
  process.stdout.write('  /cancel             Discard the current recording\n');
  process.stdout.write('  /status             Print current state\n');
  process.stdout.write('  /stats              Print usage statistics\n');
  process.stdout.write('  /providers          List transcription providers\n');
  process.stdout.write('  /quit               Exit\n');
  process.stdout.write('\n');
};

const printProviders = (runtime: Runtime, selected: string): void => {
  for (const provider of runtime.providers.all()) {
    const marker = provider.id === selected ? '*' : ' ';
    const ready = provider.isConfigured() ? 'ready' : 'not configured';
    process.stdout.write(`${marker} ${provider.id} (${provider.mode}) ${provider.displayName}: ${ready}\n`);
  }
};

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  // Console echo would land in the middle of dictated text.
  const logger = await StructuredLogger.create(config.logDir, { console: false });
  const runtime = createRuntime(config, logger);
  const { controller } = runtime;

  let shuttingDown = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain
      .then(fn)
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`\n[error] ${detail}\n`);
      });
  };

  controller.on('stateChanged', (state) => {
    if (state.stage === 'recording') {
      process.stdout.write(state.detail === STARTING_DETAIL ? '\n[starting]\n' : '\n[listening]\n');
      return;
    }

    if (state.stage === 'processingFinal') {
      process.stdout.write('\n[transcribing]\n');
      return;
    }

    process.stdout.write(state.detail ? `\n[idle] ${state.detail}\n` : '\n[idle]\n');
  });

  controller.on('transcriptCompleted', (result) => {
    process.stdout.write('\n\n--- dictation completed ---\n');
    process.stdout.write(`${result.transcript}\n`);
    process.stdout.write(`(${result.durationSeconds.toFixed(1)}s)\n`);
    process.stdout.write('---------------------------\n\n');
  });

  controller.on('sessionFailed', (failure) => {
    process.stderr.write(`\n[failed] ${failure.detail}\n`);
  });

  process.stdout.write('Warming up speech worker...\n');
  const provider = runtime.providers.get(config.provider);
  await provider?.warmup?.();
  process.stdout.write('Ready.\n');
  process.stdout.write(`Provider: ${config.provider}\n`);
  process.stdout.write(`Model: ${config.asrModel}\n`);
  process.stdout.write(`Log: ${logger.getLogPath()}\n`);
  printHelp();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    await runtime.shutdown();
    await logger.flush();
    rl.close();
    process.stdout.write('\nBye.\n');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    queue(shutdown);
  });

  rl.on('line', (line) => {
    const input = line.trim();

    switch (input) {
      case '':
        queue(async () => {
          await controller.toggle();
        });
        return;
      case '/quit':
        queue(shutdown);
        return;
      case '/cancel':
        queue(async () => {
          await controller.cancelRecording();
        });
        return;
      case '/status': {
        const state = controller.getState();
        process.stdout.write(
          `[status] stage=${state.stage}${state.detail ? ` detail=${state.detail}` : ''}\n`
        );
        return;
      }
      case '/stats':
        process.stdout.write(`[stats] ${JSON.stringify(runtime.statistics.snapshot())}\n`);
        return;
      case '/providers':
        printProviders(runtime, config.provider);
        return;
      case '/help':
        printHelp();
        return;
      default:
        process.stdout.write('Unknown command. Use /help, /status, /stats, /providers, /cancel or /quit.\n');
    }
  });
};

main().catch((error: unknown) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
