import { describe, expect, it } from 'vitest';
import { TerminalTextInserter, diffFromEnd } from './TerminalTextInserter';

const ERASE = '\b \b';

const createInserter = () => {
  const writes: string[] = [];
  const inserter = new TerminalTextInserter({
    write: (chunk: string) => {
      writes.push(chunk);
      return true;
    }
  });

  return { inserter, writes };
};

describe('diffFromEnd', () => {
  it('keeps the shared prefix', () => {
    expect(diffFromEnd('hello', 'help')).toEqual({ charsToDelete: 2, suffixToType: 'p' });
    expect(diffFromEnd('', 'new')).toEqual({ charsToDelete: 0, suffixToType: 'new' });
    expect(diffFromEnd('same', 'same')).toEqual({ charsToDelete: 0, suffixToType: '' });
  });

  it('counts code points, not UTF-16 units', () => {
    expect(diffFromEnd('ok 😀', 'ok 😁')).toEqual({ charsToDelete: 1, suffixToType: '😁' });
  });
});

describe('TerminalTextInserter', () => {
  it('rewrites partial text in place and commits finals', async () => {
    const { inserter, writes } = createInserter();
    inserter.captureTarget();

    await inserter.insert('hi', false);
    await inserter.insert('hit', false);
    await inserter.insert('hi there', true);

    expect(writes).toEqual(['hi', 't', `${ERASE} there`]);
  });

  it('separates later segments with a space', async () => {
    const { inserter, writes } = createInserter();
    inserter.captureTarget();

    await inserter.insert('first', true);
    await inserter.insert('second', false);
    await inserter.insert('second one', true);

    expect(writes).toEqual(['first', ' second', ' one']);
  });

  it('erases the partial for an empty final', async () => {
    const { inserter, writes } = createInserter();
    inserter.captureTarget();

    await inserter.insert('uh', false);
    await inserter.insert('', true);
    await inserter.insert('next', true);

    expect(writes).toEqual(['uh', ERASE.repeat(2), 'next']);
  });

  it('erases the partial on cancel and starts fresh on the next capture', async () => {
    const { inserter, writes } = createInserter();
    inserter.captureTarget();

    await inserter.insert('done', true);
    await inserter.insert('draft', false);
    inserter.cancel();
    inserter.cancel();
    inserter.captureTarget();
    await inserter.insert('again', true);

    expect(writes).toEqual(['done', ' draft', ERASE.repeat(6), 'again']);
  });

  it('ends the line on submit and starts the next line without a separator', async () => {
    const { inserter, writes } = createInserter();
    inserter.captureTarget();

    await inserter.insert('one', true);
    await inserter.submit();
    await inserter.insert('two', true);

    expect(writes).toEqual(['one', '\n', 'two']);
  });
});
