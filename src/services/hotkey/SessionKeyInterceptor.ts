import { IGlobalKeyEvent, IGlobalKeyListener } from 'node-global-key-listener';
import { KeyInterceptor, SessionKeyHandlers } from '../../core/collaborators';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { KeyboardListener } from './keys';

type SessionKey = keyof SessionKeyHandlers;

const KEY_ACTIONS: Record<string, SessionKey> = {
  ESCAPE: 'onEscape',
  RETURN: 'onEnter'
};

/** Swallows the session keys it has handlers for: Escape cancels, Enter submits. */
export class SessionKeyInterceptor implements KeyInterceptor {
  private handler: IGlobalKeyListener | undefined;

  public constructor(
    private readonly listener: KeyboardListener,
    private readonly logger?: StructuredLogger
  ) {}

  public start(handlers: SessionKeyHandlers): void {
    if (this.handler) {
      return;
    }

    const handler: IGlobalKeyListener = (event) => this.onKeyEvent(event, handlers);
    this.handler = handler;

    this.listener.addListener(handler).catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Session key interceptor could not start', { detail });
      if (this.handler === handler) {
        this.handler = undefined;
      }
    });
  }

  public stop(): void {
    const handler = this.handler;
    if (!handler) {
      return;
    }

    this.handler = undefined;
    this.listener.removeListener(handler);
  }

  private onKeyEvent(event: IGlobalKeyEvent, handlers: SessionKeyHandlers): boolean {
    const action = event.name === undefined ? undefined : KEY_ACTIONS[event.name];
    const callback = action ? handlers[action] : undefined;
    if (!callback) {
      return false;
    }

    if (event.state === 'DOWN') {
      try {
        callback();
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('Session key handler failed', { key: event.name, detail });
      }
    }

    return true;
  }
}
