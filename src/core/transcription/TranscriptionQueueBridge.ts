import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../../logging/StructuredLogger';

export interface TranscriptionTicket {
  session: number;
  seq: number;
}

type SlotState = { status: 'pending' } | { status: 'resolved'; text: string };

export declare interface TranscriptionQueueBridge {
  on(event: 'text', listener: (text: string, seq: number) => void): this;
  on(event: 'allComplete', listener: (session: number) => void): this;
  once(event: 'allComplete', listener: (session: number) => void): this;
}

/**
 * Ordered completion tracker for the chunks of one session.
 *
 * Every mutation below is synchronous. `checkCompletion` reads the pending count and flips
 * the one-shot flag inside a single call, so callers racing on timers and chunk callbacks
 * can never both observe "not yet fired".
 */
export class TranscriptionQueueBridge extends EventEmitter {
  private sessionId = 0;
  private nextSeq = 0;
  private nextToEmit = 0;
  private pendingCount = 0;
  private completionFired = false;
  private slots = new Map<number, SlotState>();

  public constructor(private readonly logger?: StructuredLogger) {
    super();
  }

  public get session(): number {
    return this.sessionId;
  }

  public nextSequence(): number {
    const seq = this.nextSeq;
    this.nextSeq += 1;
    this.slots.set(seq, { status: 'pending' });
    this.pendingCount += 1;
    return seq;
  }

  public issueTicket(): TranscriptionTicket {
    return { session: this.sessionId, seq: this.nextSequence() };
  }

  public submitResult(seq: number, text: string): void {
    const slot = this.slots.get(seq);
    if (!slot || slot.status === 'resolved') {
      this.logger?.debug('Ignoring result for unknown or resolved chunk', {
        seq,
        session: this.sessionId
      });
      return;
    }

    this.slots.set(seq, { status: 'resolved', text });
    this.pendingCount -= 1;
    this.flushInOrder();
  }

  public submitTicketResult(ticket: TranscriptionTicket, text: string): void {
    if (!this.isCurrent(ticket)) {
      this.logger?.debug('Dropping result from a previous session', {
        ticketSession: ticket.session,
        session: this.sessionId,
        seq: ticket.seq
      });
      return;
    }

    this.submitResult(ticket.seq, text);
  }

  public markFailed(seq: number): void {
    this.submitResult(seq, '');
  }

  public markTicketFailed(ticket: TranscriptionTicket): void {
    this.submitTicketResult(ticket, '');
  }

  public isCurrent(ticket: TranscriptionTicket): boolean {
    return ticket.session === this.sessionId;
  }

  /** Returns true only for the call that fired completion. */
  public checkCompletion(): boolean {
    if (this.completionFired || this.nextSeq === 0 || this.pendingCount > 0) {
      return false;
    }

    this.completionFired = true;
    this.emit('allComplete', this.sessionId);
    return true;
  }

  public hasCompleted(): boolean {
    return this.completionFired;
  }

  public getPendingCount(): number {
    return this.pendingCount;
  }

  public getIssuedCount(): number {
    return this.nextSeq;
  }

  public orderedResults(): string[] {
    const results: string[] = [];
    for (let seq = 0; seq < this.nextSeq; seq += 1) {
      const slot = this.slots.get(seq);
      if (slot?.status === 'resolved') {
        results.push(slot.text);
      }
    }

    return results;
  }

  public assembleTranscript(): string {
    return this.orderedResults()
      .map((text) => text.trim())
      .filter(Boolean)
      .join(' ');
  }

  public reset(): void {
    this.sessionId += 1;
    this.nextSeq = 0;
    this.nextToEmit = 0;
    this.pendingCount = 0;
    this.completionFired = false;
    this.slots = new Map();
  }

  private flushInOrder(): void {
    while (true) {
      const slot = this.slots.get(this.nextToEmit);
      if (!slot || slot.status !== 'resolved') {
        return;
      }

      const seq = this.nextToEmit;
      this.nextToEmit += 1;

      const text = slot.text.trim();
      if (text) {
        this.emit('text', text, seq);
      }
    }
  }
}
