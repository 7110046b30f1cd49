import { TranscriptionProvider } from './types';

export class ProviderRegistry {
  private readonly providers = new Map<string, TranscriptionProvider>();

  public register(provider: TranscriptionProvider): void {
    if (this.providers.has(provider.id)) {
      throw new Error(`Transcription provider '${provider.id}' is already registered`);
    }

    this.providers.set(provider.id, provider);
  }

  public get(id: string): TranscriptionProvider | undefined {
    return this.providers.get(id);
  }

  public all(): TranscriptionProvider[] {
    return Array.from(this.providers.values());
  }

  public configured(): TranscriptionProvider[] {
    return this.all().filter((provider) => provider.isConfigured());
  }

  public isConfigured(id: string): boolean {
    return this.providers.get(id)?.isConfigured() ?? false;
  }

  public async shutdownAll(): Promise<void> {
    await Promise.all(this.all().map((provider) => provider.shutdown?.()));
  }
}
