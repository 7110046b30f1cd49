export type BannerStyle = 'info' | 'error';

/** `stop` is the success cue: it plays once a session has delivered a non-empty transcript. */
export type SoundCue = 'start' | 'stop' | 'cancel' | 'error';

export interface TextInserter {
  /** Remembers where text should go, before recording starts. */
  captureTarget(): void;
  /** Non-final text replaces the previous partial; final text is committed. */
  insert(text: string, isFinal: boolean): Promise<void>;
  /** Drops any partial text and pending insertions. */
  cancel(): void;
  /** Presses Enter in the target, after the dictated text. */
  submit(): Promise<void>;
}

export interface BannerPresenter {
  show(message: string, style: BannerStyle): void;
}

/** Only keys with a handler are intercepted. */
export interface SessionKeyHandlers {
  onEscape?: () => void;
  onEnter?: () => void;
}

export interface KeyInterceptor {
  start(handlers: SessionKeyHandlers): void;
  stop(): void;
}

export interface SoundPlayer {
  play(cue: SoundCue): void;
}
