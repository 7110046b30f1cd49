import { IGlobalKeyDownMap, IGlobalKeyEvent, IGlobalKeyListener } from 'node-global-key-listener';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { KeyboardListener, ParsedHotkey, areModifiersHeld, parseHotkey } from './keys';

/** Fires `onToggle` once per press of the combo; holding it down does not repeat. */
export class ToggleHotkey {
  private readonly parsedHotkey: ParsedHotkey;
  private readonly handler: IGlobalKeyListener;
  private listening = false;
  private held = false;

  public constructor(
    accelerator: string,
    private readonly listener: KeyboardListener,
    private readonly onToggle: () => Promise<void> | void,
    private readonly logger?: StructuredLogger
  ) {
    this.parsedHotkey = parseHotkey(accelerator);

    this.handler = (event, down) => {
      return this.onKeyEvent(event, down);
    };
  }

  public describeBinding(): string {
    return this.parsedHotkey.source;
  }

  public async start(): Promise<void> {
    if (this.listening) {
      return;
    }

    await this.listener.addListener(this.handler);
    this.listening = true;
    this.logger?.info('Toggle hotkey listener started', {
      hotkey: this.describeBinding()
    });
  }

  public stop(): void {
    if (this.listening) {
      this.listener.removeListener(this.handler);
    }

    this.listening = false;
    this.held = false;

    this.logger?.info('Toggle hotkey listener stopped');
  }

  /** Returns true to swallow the key while the combo is held. */
  public onKeyEvent(event: IGlobalKeyEvent, down: IGlobalKeyDownMap): boolean {
    if (event.name !== this.parsedHotkey.triggerKey) {
      return false;
    }

    if (event.state === 'UP') {
      const wasHeld = this.held;
      this.held = false;
      return wasHeld;
    }

    if (!areModifiersHeld(this.parsedHotkey, down)) {
      return false;
    }

    if (!this.held) {
      this.held = true;
      this.invokeSafely();
    }

    return true;
  }

  private invokeSafely(): void {
    Promise.resolve()
      .then(() => this.onToggle())
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('Toggle hotkey callback failed', { detail });
      });
  }
}
