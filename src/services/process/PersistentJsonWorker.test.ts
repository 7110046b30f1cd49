import { EventEmitter } from 'node:events';
import { PassThrough, Writable } from 'node:stream';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { flushPromises } from '../../testing/fakes';
import { PersistentJsonWorker, WorkerProcess, parseWorkerResponse } from './PersistentJsonWorker';

class FakeWorkerProcess extends EventEmitter implements WorkerProcess {
  public readonly lines: string[] = [];
  public readonly signals: NodeJS.Signals[] = [];
  public readonly stdout = new PassThrough();
  public readonly stderr = new PassThrough();
  public readonly stdin = new Writable({
    write: (chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) => {
      this.lines.push(chunk.toString().trim());
      callback();
    }
  });

  public kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    this.emit('close', null, signal);
    return true;
  }

  /** Id and action of the nth line written to the worker. */
  public sent(index: number): { id: string; action: unknown } {
    const parsed: unknown = JSON.parse(this.lines[index]);
    if (typeof parsed !== 'object' || parsed === null || !('id' in parsed)) {
      throw new Error(`line ${index} is not a request`);
    }

    return { id: String(parsed.id), action: 'action' in parsed ? parsed.action : undefined };
  }

  public reply(index: number, body: Record<string, unknown>): void {
    this.stdout.write(`${JSON.stringify({ id: this.sent(index).id, ...body })}\n`);
  }
}

const createWorker = () => {
  const child = new FakeWorkerProcess();
  const spawnProcess = vi.fn(() => {
    queueMicrotask(() => {
      child.emit('spawn');
    });
    return child;
  });
  const worker = new PersistentJsonWorker({
    name: 'speech',
    command: 'python3',
    args: ['worker.py', '--serve'],
    spawnProcess
  });

  return { worker, child, spawnProcess };
};

afterEach(() => {
  vi.useRealTimers();
});

describe('parseWorkerResponse', () => {
  it('reads a response line', () => {
    expect(parseWorkerResponse('{"id":"3","ok":true,"result":{"text":"hi"}}')).toEqual({
      id: '3',
      ok: true,
      result: { text: 'hi' },
      error: undefined
    });
  });

  it('drops fields of the wrong type', () => {
    expect(parseWorkerResponse('{"id":3,"ok":"yes","error":"boom"}')).toEqual({
      id: undefined,
      ok: undefined,
      result: undefined,
      error: 'boom'
    });
  });

  it('ignores lines that are not response objects', () => {
    expect(parseWorkerResponse('loading model...')).toBeUndefined();
    expect(parseWorkerResponse('[1,2]')).toBeUndefined();
    expect(parseWorkerResponse('null')).toBeUndefined();
  });
});

describe('PersistentJsonWorker', () => {
  it('spawns once and writes one request at a time', async () => {
    const { worker, child, spawnProcess } = createWorker();

    const first = worker.request({ action: 'transcribe', audioBase64: 'AAA=' }, 1000);
    const second = worker.request({ action: 'warmup' }, 1000);
    await flushPromises();

    expect(spawnProcess).toHaveBeenCalledTimes(1);
    expect(spawnProcess).toHaveBeenCalledWith('python3', ['worker.py', '--serve'], undefined);
    expect(child.lines).toHaveLength(1);
    expect(child.sent(0).action).toBe('transcribe');

    child.reply(0, { ok: true, result: { text: 'one' } });
    await expect(first).resolves.toEqual({ text: 'one' });
    await flushPromises();

    expect(child.lines).toHaveLength(2);
    expect(child.sent(1).action).toBe('warmup');

    child.stdout.write('loading model...\n');
    child.reply(1, { ok: true, result: { ready: true } });
    await expect(second).resolves.toEqual({ ready: true });
  });

  it('rejects with the worker error message', async () => {
    const { worker, child } = createWorker();

    const attempt = worker.request({ action: 'transcribe' }, 1000);
    await flushPromises();
    child.reply(0, { ok: false, error: 'model not loaded' });

    await expect(attempt).rejects.toThrow('model not loaded');
  });

  it('never writes a request that is cancelled while queued', async () => {
    const { worker, child } = createWorker();
    const controller = new AbortController();

    const first = worker.request({ action: 'stream_push' }, 1000);
    const second = worker.request({ action: 'transcribe' }, 1000, controller.signal);
    await flushPromises();

    controller.abort();
    await expect(second).rejects.toThrow('speech worker request was cancelled');

    child.reply(0, { ok: true, result: {} });
    await first;
    await flushPromises();

    expect(child.lines).toHaveLength(1);
  });

  it('holds the slot of a cancelled in-flight request until the worker answers', async () => {
    const { worker, child } = createWorker();
    const controller = new AbortController();

    const first = worker.request({ action: 'transcribe' }, 1000, controller.signal);
    const second = worker.request({ action: 'warmup' }, 1000);
    await flushPromises();

    controller.abort();
    await expect(first).rejects.toThrow('speech worker request was cancelled');
    await flushPromises();
    expect(child.lines).toHaveLength(1);

    child.reply(0, { ok: true, result: { text: 'unused' } });
    await flushPromises();
    expect(child.lines).toHaveLength(2);

    child.reply(1, { ok: true, result: 'warm' });
    await expect(second).resolves.toBe('warm');
  });

  it('times out a request that gets no answer and moves on', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const { worker, child } = createWorker();

    const first = worker.request({ action: 'transcribe' }, 500);
    const firstOutcome = expect(first).rejects.toThrow(
      'speech worker request timed out after 500ms'
    );
    const second = worker.request({ action: 'warmup' }, 500);
    await flushPromises();
    expect(child.lines).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(500);
    await firstOutcome;
    expect(child.lines).toHaveLength(2);

    child.reply(1, { ok: true, result: 'ok' });
    await expect(second).resolves.toBe('ok');
  });

  it('rejects everything pending when the worker exits', async () => {
    const { worker, child } = createWorker();

    const first = worker.request({ action: 'transcribe' }, 1000);
    const second = worker.request({ action: 'warmup' }, 1000);
    await flushPromises();
    child.emit('close', 1, null);

    await expect(first).rejects.toThrow('speech worker exited (code=1, signal=none)');
    await expect(second).rejects.toThrow('speech worker exited (code=1, signal=none)');
  });

  it('stops the process with SIGTERM', async () => {
    const { worker, child } = createWorker();
    await worker.start();

    await worker.stop();

    expect(child.signals).toEqual(['SIGTERM']);
  });
});
