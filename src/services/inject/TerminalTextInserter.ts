import { TextInserter } from '../../core/collaborators';
import { StructuredLogger } from '../../logging/StructuredLogger';

interface Writer {
  write(chunk: string): unknown;
}

export interface TextEdit {
  charsToDelete: number;
  suffixToType: string;
}

const ERASE_ONE = '\b \b';

/** Smallest backspace-then-type edit that turns `current` into `next`, counted in code points. */
export const diffFromEnd = (current: string, next: string): TextEdit => {
  const currentChars = Array.from(current);
  const nextChars = Array.from(next);

  let shared = 0;
  while (
    shared < currentChars.length &&
    shared < nextChars.length &&
    currentChars[shared] === nextChars[shared]
  ) {
    shared += 1;
  }

  return {
    charsToDelete: currentChars.length - shared,
    suffixToType: nextChars.slice(shared).join('')
  };
};

/**
 * Types dictated text into the terminal it runs in. Partial text is rewritten in place with
 * backspaces; final text stays on screen and later segments are separated by a space.
 */
export class TerminalTextInserter implements TextInserter {
  private partial = '';
  private committedSegments = 0;

  public constructor(
    private readonly writer: Writer = process.stdout,
    private readonly logger?: StructuredLogger
  ) {}

  public captureTarget(): void {
    this.partial = '';
    this.committedSegments = 0;
    this.logger?.debug('Text target captured', { target: 'terminal' });
  }

  public async insert(text: string, isFinal: boolean): Promise<void> {
    const target = this.withSeparator(text);

    if (isFinal && !text) {
      this.apply(diffFromEnd(this.partial, ''));
      this.partial = '';
      return;
    }

    this.apply(diffFromEnd(this.partial, target));

    if (isFinal) {
      this.partial = '';
      this.committedSegments += 1;
      return;
    }

    this.partial = target;
  }

  public cancel(): void {
    if (this.partial) {
      this.apply(diffFromEnd(this.partial, ''));
    }

    this.partial = '';
  }

  /** Ends the dictated line; the next segment starts without a separator. */
  public async submit(): Promise<void> {
    this.writer.write('\n');
    this.partial = '';
    this.committedSegments = 0;
  }

  private withSeparator(text: string): string {
    if (this.committedSegments === 0 || !text || /^\s/.test(text)) {
      return text;
    }

    return ` ${text}`;
  }

  private apply(edit: TextEdit): void {
    const output = ERASE_ONE.repeat(edit.charsToDelete) + edit.suffixToType;
    if (output) {
      this.writer.write(output);
    }
  }
}
