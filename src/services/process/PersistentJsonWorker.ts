import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable, Writable } from 'node:stream';
import { StructuredLogger } from '../../logging/StructuredLogger';

export type WorkerAction =
  | 'warmup'
  | 'transcribe'
  | 'stream_reset'
  | 'stream_push'
  | 'stream_flush'
  | 'stream_close';

export interface WorkerRequest {
  action: WorkerAction;
  [field: string]: unknown;
}

export interface WorkerResponse {
  id?: string;
  ok?: boolean;
  result?: unknown;
  error?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Accepts one JSONL line from the worker; returns undefined for anything that is not a response object. */
export const parseWorkerResponse = (line: string): WorkerResponse | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }

  if (!isRecord(parsed)) {
    return undefined;
  }

  return {
    id: typeof parsed.id === 'string' ? parsed.id : undefined,
    ok: typeof parsed.ok === 'boolean' ? parsed.ok : undefined,
    result: parsed.result,
    error: typeof parsed.error === 'string' ? parsed.error : undefined
  };
};

/** The slice of a child process the worker drives; tests hand in an in-process stand-in. */
export interface WorkerProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnWorkerProcess = (
  command: string,
  args: string[],
  env?: NodeJS.ProcessEnv
) => WorkerProcess;

const spawnChildProcess: SpawnWorkerProcess = (command, args, env) =>
  spawn(command, args, { env, stdio: 'pipe' });

type Outcome = { ok: true; result: unknown } | { ok: false; error: Error };

interface QueuedRequest {
  id: string;
  action: WorkerAction;
  line: string;
  timeoutMs: number;
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
  settled: boolean;
  signal?: AbortSignal;
  onAbort?: () => void;
  timeoutHandle?: NodeJS.Timeout;
}

export interface PersistentJsonWorkerOptions {
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
  spawnProcess?: SpawnWorkerProcess;
}

/** The request surface providers depend on; tests swap in an in-process fake. */
export interface JsonWorkerClient {
  start(): Promise<void>;
  request(payload: WorkerRequest, timeoutMs: number, signal?: AbortSignal): Promise<unknown>;
  stop(): Promise<void>;
}

/**
 * Long-lived JSONL worker. The worker handles one line at a time, so requests are written one at a
 * time too: each deadline starts when its line is written, and a request aborted while queued
 * never reaches the worker. An aborted in-flight request rejects at once but keeps the slot until
 * the worker answers or its deadline passes.
 */
export class PersistentJsonWorker implements JsonWorkerClient {
  private child: WorkerProcess | undefined;
  private startPromise: Promise<void> | undefined;
  private stopping = false;
  private nextRequestId = 0;
  private stdoutBuffer = '';
  private stderrBuffer = '';
  private queue: QueuedRequest[] = [];
  private inFlight: QueuedRequest | undefined;
  private readonly spawnProcess: SpawnWorkerProcess;

  public constructor(private readonly options: PersistentJsonWorkerOptions) {
    this.spawnProcess = options.spawnProcess ?? spawnChildProcess;
  }

  public async start(): Promise<void> {
    if (this.child) {
      return;
    }

    if (this.startPromise) {
      await this.startPromise;
      return;
    }

    this.startPromise = this.spawnWorker();

    try {
      await this.startPromise;
    } finally {
      this.startPromise = undefined;
    }
  }

  /** Resolves with the worker's `result` field; callers validate its shape. */
  public async request(
    payload: WorkerRequest,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    if (signal?.aborted) {
      throw this.cancelledError();
    }

    await this.start();

    const id = String(++this.nextRequestId);

    return new Promise<unknown>((resolve, reject) => {
      const entry: QueuedRequest = {
        id,
        action: payload.action,
        line: JSON.stringify({ ...payload, id }),
        timeoutMs,
        resolve,
        reject,
        settled: false
      };

      if (signal) {
        if (signal.aborted) {
          reject(this.cancelledError());
          return;
        }

        entry.signal = signal;
        entry.onAbort = () => {
          this.abort(entry);
        };
        signal.addEventListener('abort', entry.onAbort, { once: true });
      }

      this.queue.push(entry);
      this.writeNext();
    });
  }

  public async stop(): Promise<void> {
    this.stopping = true;

    const current = this.child;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve) => {
      const forceKill = setTimeout(() => {
        current.kill('SIGKILL');
        resolve();
      }, 1500);

      current.once('close', () => {
        clearTimeout(forceKill);
        resolve();
      });

      current.kill('SIGTERM');
    });

    this.child = undefined;
  }

  private writeNext(): void {
    if (this.inFlight) {
      return;
    }

    const entry = this.queue.shift();
    if (!entry) {
      return;
    }

    const current = this.child;
    if (!current) {
      this.settle(entry, { ok: false, error: new Error(`${this.options.name} worker is not running`) });
      this.writeNext();
      return;
    }

    this.inFlight = entry;
    entry.timeoutHandle = setTimeout(() => {
      this.settle(entry, {
        ok: false,
        error: new Error(`${this.options.name} worker request timed out after ${entry.timeoutMs}ms`)
      });
      this.release(entry);
    }, entry.timeoutMs);

    current.stdin.write(`${entry.line}\n`, (error) => {
      if (!error) {
        return;
      }

      this.settle(entry, { ok: false, error });
      this.release(entry);
    });
  }

  private release(entry: QueuedRequest): void {
    clearTimeout(entry.timeoutHandle);
    if (this.inFlight !== entry) {
      return;
    }

    this.inFlight = undefined;
    this.writeNext();
  }

  private abort(entry: QueuedRequest): void {
    const index = this.queue.indexOf(entry);
    if (index !== -1) {
      this.queue.splice(index, 1);
    }

    this.options.logger?.debug(`${this.options.name} worker request cancelled`, {
      action: entry.action,
      sent: index === -1
    });
    this.settle(entry, { ok: false, error: this.cancelledError() });
  }

  private settle(entry: QueuedRequest, outcome: Outcome): void {
    if (entry.settled) {
      return;
    }

    entry.settled = true;
    if (entry.signal && entry.onAbort) {
      entry.signal.removeEventListener('abort', entry.onAbort);
    }

    if (outcome.ok) {
      entry.resolve(outcome.result);
    } else {
      entry.reject(outcome.error);
    }
  }

  private cancelledError(): Error {
    return new Error(`${this.options.name} worker request was cancelled`);
  }

  private async spawnWorker(): Promise<void> {
    this.stopping = false;

    await new Promise<void>((resolve, reject) => {
      const child = this.spawnProcess(this.options.command, this.options.args, this.options.env);

      const onError = (error: Error): void => {
        this.child = undefined;
        reject(error);
      };

      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);

        this.child = child;
        this.stdoutBuffer = '';
        this.stderrBuffer = '';

        child.stdout.on('data', (chunk: Buffer) => {
          this.handleStdoutChunk(chunk.toString());
        });

        child.stderr.on('data', (chunk: Buffer) => {
          const text = chunk.toString();
          this.stderrBuffer = this.tailString(`${this.stderrBuffer}${text}`, 4000);
          this.options.logger?.warn(`${this.options.name} worker stderr`, {
            detail: text.trim()
          });
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
          if (this.stopping) {
            this.options.logger?.info(`${this.options.name} worker stopped`, {
              code,
              signal
            });
          } else {
            this.options.logger?.warn(`${this.options.name} worker exited`, {
              code,
              signal,
              stderr: this.stderrBuffer.trim()
            });
          }

          if (this.child === child) {
            this.child = undefined;
          }
          this.rejectAll(
            new Error(`${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`)
          );
        });

        this.options.logger?.info(`${this.options.name} worker started`, {
          command: this.options.command
        });

        resolve();
      });
    });
  }

  private handleStdoutChunk(chunk: string): void {
    this.stdoutBuffer += chunk;

    while (true) {
      const newlineIndex = this.stdoutBuffer.indexOf('\n');
      if (newlineIndex === -1) {
        break;
      }

      const line = this.stdoutBuffer.slice(0, newlineIndex).trim();
      this.stdoutBuffer = this.stdoutBuffer.slice(newlineIndex + 1);

      if (!line) {
        continue;
      }

      const parsed = parseWorkerResponse(line);
      if (!parsed) {
        this.options.logger?.debug(`${this.options.name} worker emitted a non-response line`, {
          line
        });
        continue;
      }

      const entry = this.inFlight;
      if (!entry || parsed.id !== entry.id) {
        this.options.logger?.debug(`${this.options.name} worker response for unknown request`, {
          responseId: parsed.id
        });
        continue;
      }

      this.settle(
        entry,
        parsed.ok === false
          ? {
              ok: false,
              error: new Error(parsed.error ?? `${this.options.name} worker request failed`)
            }
          : { ok: true, result: parsed.result }
      );
      this.release(entry);
    }
  }

  private rejectAll(error: Error): void {
    const entries = this.inFlight ? [this.inFlight, ...this.queue] : [...this.queue];
    this.inFlight = undefined;
    this.queue = [];

    for (const entry of entries) {
      clearTimeout(entry.timeoutHandle);
      this.settle(entry, { ok: false, error });
    }
  }

  private tailString(text: string, limit: number): string {
    if (text.length <= limit) {
      return text;
    }

    return text.slice(text.length - limit);
  }
}
