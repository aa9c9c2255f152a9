import { describe, expect, it } from 'vitest';
import { LineBuffer } from '../src/LineBuffer.js';
import { charClass, nextWordEnd, nextWordStart, prevWord } from '../src/motions.js';

const text = (...lines: string[]) => new LineBuffer(8, lines);

describe('charClass', () => {
  it('groups letters, digits and underscore as word characters', () => {
    expect(['a', 'Z', '7', '_', 'é'].map(charClass)).toEqual(['word', 'word', 'word', 'word', 'word']);
  });

  it('treats other visible characters as punctuation', () => {
    expect(['.', '(', '-', '#'].map(charClass)).toEqual(['punct', 'punct', 'punct', 'punct']);
  });

  it('treats whitespace and the end of the line as space', () => {
    expect([' ', '\t', undefined].map(charClass)).toEqual(['space', 'space', 'space']);
  });
});

describe('nextWordStart (w)', () => {
  it('skips leading whitespace to the first word', () => {
    expect(nextWordStart(text('  foo bar'), { row: 0, col: 0 })).toEqual({ row: 0, col: 2 });
  });

  it('moves from one word to the next', () => {
    expect(nextWordStart(text('  foo bar'), { row: 0, col: 2 })).toEqual({ row: 0, col: 6 });
  });

  it('moves from the middle of a word to the next', () => {
    expect(nextWordStart(text('  foo bar'), { row: 0, col: 3 })).toEqual({ row: 0, col: 6 });
  });

  it('stops at a change of character class', () => {
    expect(nextWordStart(text('foo.bar'), { row: 0, col: 0 })).toEqual({ row: 0, col: 3 });
  });

  it('crosses to the next line from the last character', () => {
    expect(nextWordStart(text('foo', 'bar'), { row: 0, col: 2 })).toEqual({ row: 1, col: 0 });
  });

  it('crosses to the next line from the last word', () => {
    expect(nextWordStart(text('foo bar', 'baz'), { row: 0, col: 4 })).toEqual({ row: 1, col: 0 });
  });

  it('leaves an empty line for the next one', () => {
    expect(nextWordStart(text('', 'x'), { row: 0, col: 0 })).toEqual({ row: 1, col: 0 });
  });

  it('saturates on the last character of the buffer', () => {
    expect(nextWordStart(text('foo', 'bar'), { row: 1, col: 2 })).toEqual({ row: 1, col: 2 });
  });

  it('stops on the last character when only whitespace follows on the last line', () => {
    expect(nextWordStart(text('foo   '), { row: 0, col: 0 })).toEqual({ row: 0, col: 5 });
  });
});

describe('nextWordEnd (e)', () => {
  it('moves to the end of the current word', () => {
    expect(nextWordEnd(text('foo bar'), { row: 0, col: 0 })).toEqual({ row: 0, col: 2 });
  });

  it('moves from the end of a word to the end of the next', () => {
    expect(nextWordEnd(text('foo bar'), { row: 0, col: 2 })).toEqual({ row: 0, col: 6 });
  });

  it('skips leading whitespace', () => {
    expect(nextWordEnd(text('  foo'), { row: 0, col: 0 })).toEqual({ row: 0, col: 4 });
  });

  it('ends a run at a change of class', () => {
    expect(nextWordEnd(text('ab..cd'), { row: 0, col: 1 })).toEqual({ row: 0, col: 3 });
  });

  it('crosses lines', () => {
    expect(nextWordEnd(text('foo', '  bar'), { row: 0, col: 2 })).toEqual({ row: 1, col: 4 });
  });

  it('saturates at the end of the buffer', () => {
    expect(nextWordEnd(text('foo  '), { row: 0, col: 2 })).toEqual({ row: 0, col: 2 });
  });
});

describe('prevWord', () => {
  describe('to the run start (ge)', () => {
    it('moves to the start of the current word', () => {
      expect(prevWord(text('foo bar'), { row: 0, col: 5 }, true)).toEqual({ row: 0, col: 4 });
    });

    it('moves from a word start to the previous word', () => {
      expect(prevWord(text('foo bar'), { row: 0, col: 4 }, true)).toEqual({ row: 0, col: 0 });
    });

    it('treats punctuation as its own run', () => {
      expect(prevWord(text('foo.bar'), { row: 0, col: 4 }, true)).toEqual({ row: 0, col: 3 });
    });

    it('lands on column 0 when only whitespace precedes', () => {
      expect(prevWord(text('   foo'), { row: 0, col: 3 }, true)).toEqual({ row: 0, col: 0 });
    });
  });

  describe('to the first boundary (b)', () => {
    it('moves to the end of the previous word', () => {
      expect(prevWord(text('foo bar'), { row: 0, col: 5 }, false)).toEqual({ row: 0, col: 2 });
    });

    it('moves from whitespace to the end of the previous word', () => {
      expect(prevWord(text('foo  bar'), { row: 0, col: 4 }, false)).toEqual({ row: 0, col: 2 });
    });

    it('wraps to the previous line when no run precedes', () => {
      expect(prevWord(text('abc', 'foo'), { row: 1, col: 1 }, false)).toEqual({ row: 0, col: 2 });
    });
  });

  it('wraps from column 0 to the last character of the previous line', () => {
    expect(prevWord(text('abc def', 'x'), { row: 1, col: 0 }, true)).toEqual({ row: 0, col: 6 });
  });

  it('saturates at the start of the buffer', () => {
    expect(prevWord(text('abc'), { row: 0, col: 0 }, false)).toEqual({ row: 0, col: 0 });
  });
});
