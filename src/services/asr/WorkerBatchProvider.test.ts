import { describe, expect, it } from 'vitest';
import { FakeJsonWorker, createDeferred } from '../../testing/fakes';
import { WorkerBatchProvider } from './WorkerBatchProvider';

const createProvider = (worker: FakeJsonWorker, configured = true): WorkerBatchProvider =>
  new WorkerBatchProvider(worker, { language: 'en-US', isConfigured: () => configured });

describe('WorkerBatchProvider', () => {
  it('sends the wav with a deadline sized to the audio', async () => {
    const worker = new FakeJsonWorker();
    worker.respond = () => ({ text: ' hello world ' });
    const provider = createProvider(worker);
    const audio = Buffer.alloc(44 + 32000);

    const text = await provider.transcribe(audio, {
      sampleRate: 16000,
      signal: new AbortController().signal
    });

    expect(text).toBe('hello world');
    expect(worker.calls).toEqual([
      {
        payload: {
          action: 'transcribe',
          audioBase64: audio.toString('base64'),
          format: 'wav',
          sampleRate: 16000,
          language: 'en'
        },
        timeoutMs: 11500
      }
    ]);
  });

  it('does not call the worker for an already cancelled request', async () => {
    const worker = new FakeJsonWorker();
    const provider = createProvider(worker);
    const controller = new AbortController();
    controller.abort();

    await expect(
      provider.transcribe(Buffer.alloc(44), { sampleRate: 16000, signal: controller.signal })
    ).rejects.toThrow('Transcription request was cancelled');
    expect(worker.calls).toEqual([]);
  });

  it('stops waiting when the request is cancelled mid-flight', async () => {
    const worker = new FakeJsonWorker();
    const reply = createDeferred<unknown>();
    worker.respond = () => reply.promise;
    const provider = createProvider(worker);
    const controller = new AbortController();

    const pending = provider.transcribe(Buffer.alloc(44), {
      sampleRate: 16000,
      signal: controller.signal
    });
    expect(worker.signals).toEqual([controller.signal]);
    controller.abort();

    await expect(pending).rejects.toThrow('Transcription request was cancelled');
  });

  it('passes worker failures through', async () => {
    const worker = new FakeJsonWorker();
    worker.respond = () => {
      throw new Error('model not loaded');
    };
    const provider = createProvider(worker);

    await expect(
      provider.transcribe(Buffer.alloc(44), {
        sampleRate: 16000,
        signal: new AbortController().signal
      })
    ).rejects.toThrow('model not loaded');
  });

  it('warms the worker up and shuts it down', async () => {
    const worker = new FakeJsonWorker();
    const provider = createProvider(worker, false);

    await provider.warmup();
    await provider.shutdown();

    expect(provider.isConfigured()).toBe(false);
    expect(worker.starts).toBe(1);
    expect(worker.calls).toEqual([{ payload: { action: 'warmup' }, timeoutMs: 60000 }]);
    expect(worker.stops).toBe(1);
  });
});
