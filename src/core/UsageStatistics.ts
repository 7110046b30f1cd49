export interface UsageSnapshot {
  apiCalls: number;
  transcriptions: number;
  audioSeconds: number;
  words: number;
  characters: number;
}

const countWords = (text: string): number => text.split(/\s+/).filter(Boolean).length;

/** Per-process usage counters. Created once by the runtime and injected where needed. */
export class UsageStatistics {
  private apiCalls = 0;
  private transcriptions = 0;
  private audioSeconds = 0;
  private words = 0;
  private characters = 0;

  public recordApiCall(): void {
    this.apiCalls += 1;
  }

  public recordTranscription(text: string, audioSeconds: number): void {
    const trimmed = text.trim();
    this.transcriptions += 1;
    this.audioSeconds += Math.max(0, audioSeconds);
    this.words += countWords(trimmed);
    this.characters += trimmed.length;
  }

  public snapshot(): UsageSnapshot {
    return {
      apiCalls: this.apiCalls,
      transcriptions: this.transcriptions,
      audioSeconds: Math.round(this.audioSeconds * 100) / 100,
      words: this.words,
      characters: this.characters
    };
  }

  public reset(): void {
    this.apiCalls = 0;
    this.transcriptions = 0;
    this.audioSeconds = 0;
    this.words = 0;
    this.characters = 0;
  }
}
