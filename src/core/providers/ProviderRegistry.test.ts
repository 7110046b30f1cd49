import { describe, expect, it } from 'vitest';
import { WorkerBatchProvider } from '../../services/asr/WorkerBatchProvider';
import { FakeBatchProvider, FakeJsonWorker, FakeStreamingProvider } from '../../testing/fakes';
import { ProviderRegistry } from './ProviderRegistry';

describe('ProviderRegistry', () => {
  it('looks providers up by id', () => {
    const registry = new ProviderRegistry();
    const batch = new FakeBatchProvider();
    registry.register(batch);

    expect(registry.get('fake-batch')).toBe(batch);
    expect(registry.get('other')).toBeUndefined();
    expect(registry.isConfigured('other')).toBe(false);
  });

  it('refuses a second provider with the same id', () => {
    const registry = new ProviderRegistry();
    registry.register(new FakeBatchProvider());

    expect(() => registry.register(new FakeBatchProvider())).toThrow(
      "Transcription provider 'fake-batch' is already registered"
    );
  });

  it('lists configured providers', () => {
    const registry = new ProviderRegistry();
    const batch = new FakeBatchProvider();
    batch.configured = false;
    const stream = new FakeStreamingProvider();
    registry.register(batch);
    registry.register(stream);

    expect(registry.all()).toEqual([batch, stream]);
    expect(registry.configured()).toEqual([stream]);
    expect(registry.isConfigured('fake-batch')).toBe(false);
  });

  it('shuts down providers that hold resources', async () => {
    const worker = new FakeJsonWorker();
    const registry = new ProviderRegistry();
    registry.register(new WorkerBatchProvider(worker, { language: 'en', isConfigured: () => true }));
    registry.register(new FakeStreamingProvider());

    await registry.shutdownAll();

    expect(worker.stops).toBe(1);
  });
});
