import { describe, expect, it } from 'vitest';
import { CursorController, maxColumn, renderColumn } from '../src/CursorController.js';
import { LineBuffer } from '../src/LineBuffer.js';

function setup(lines: string[], columns = 80, textRows = 10) {
  const text = new LineBuffer(8, lines);
  const cursor = new CursorController(text, columns, textRows, 8);
  return { text, cursor };
}

describe('maxColumn', () => {
  it('excludes the append position in normal mode', () => {
    expect(maxColumn(5, 'normal')).toBe(4);
  });

  it('allows the append position in insert and command mode', () => {
    expect(maxColumn(5, 'insert')).toBe(5);
    expect(maxColumn(5, 'command')).toBe(5);
  });

  it('is zero on an empty line', () => {
    expect(maxColumn(0, 'normal')).toBe(0);
    expect(maxColumn(0, 'insert')).toBe(0);
  });
});

describe('renderColumn', () => {
  it('matches cx without tabs', () => {
    expect(renderColumn('abc', 2, 8)).toBe(2);
  });

  it('expands a tab before the cursor', () => {
    expect(renderColumn('a\tb', 2, 8)).toBe(8);
  });

  it('places the cursor on the start of a tab it sits on', () => {
    expect(renderColumn('a\tb', 1, 8)).toBe(1);
  });
});

describe('CursorController', () => {
  describe('vertical motion', () => {
    it('saturates at the first line', () => {
      const { cursor } = setup(['a', 'b', 'c']);
      cursor.move('up', 'normal');
      expect(cursor.cy).toBe(0);
    });

    it('saturates at the last line', () => {
      const { cursor } = setup(['a', 'b', 'c']);
      for (let i = 0; i < 10; i++) {
        cursor.move('down', 'normal');
      }
      expect(cursor.cy).toBe(2);
    });

    it('re-clamps the column to a shorter line in normal mode', () => {
      const { cursor } = setup(['abcdef', 'ab']);
      cursor.cx = 5;
      cursor.move('down', 'normal');
      expect(cursor.cx).toBe(1);
    });

    it('re-clamps to the append position in insert mode', () => {
      const { cursor } = setup(['abcdef', 'ab']);
      cursor.cx = 6;
      cursor.move('down', 'insert');
      expect(cursor.cx).toBe(2);
    });

    it('re-clamps to column 0 on an empty line', () => {
      const { cursor } = setup(['abc', '']);
      cursor.cx = 2;
      cursor.move('down', 'normal');
      expect(cursor.cx).toBe(0);
    });
  });

  describe('horizontal motion', () => {
    it('saturates at column 0', () => {
      const { cursor } = setup(['abc']);
      cursor.move('left', 'normal');
      expect(cursor.cx).toBe(0);
    });

    it('stops on the last character in normal mode', () => {
      const { cursor } = setup(['abc']);
      for (let i = 0; i < 5; i++) {
        cursor.move('right', 'normal');
      }
      expect(cursor.cx).toBe(2);
    });

    it('stops one past the end in insert mode', () => {
      const { cursor } = setup(['abc']);
      for (let i = 0; i < 5; i++) {
        cursor.move('right', 'insert');
      }
      expect(cursor.cx).toBe(3);
    });

    it('steps over a tab when moving right', () => {
      const { cursor } = setup(['a\tb']);
      cursor.move('right', 'normal');
      expect(cursor.cx).toBe(2);
    });
  });

  describe('jumps', () => {
    it('gotoRow clamps to the buffer', () => {
      const { cursor } = setup(['a', 'b', 'c']);
      cursor.gotoRow(10, 'normal');
      expect(cursor.cy).toBe(2);
      cursor.gotoRow(-3, 'normal');
      expect(cursor.cy).toBe(0);
    });

    it('gotoRow re-clamps the column', () => {
      const { cursor } = setup(['abcdef', 'x', 'y']);
      cursor.cx = 4;
      cursor.gotoRow(2, 'normal');
      expect(cursor.position).toEqual({ row: 2, col: 0 });
    });

    it('gotoLineStart finds the first non-blank', () => {
      const { cursor } = setup(['   foo']);
      cursor.gotoLineStart();
      expect(cursor.cx).toBe(3);
    });

    it('gotoLineStart goes to column 0 on a blank line', () => {
      const { cursor } = setup(['    ']);
      cursor.cx = 2;
      cursor.gotoLineStart();
      expect(cursor.cx).toBe(0);
    });

    it('gotoLineEnd depends on the mode', () => {
      const { cursor } = setup(['hello']);
      cursor.gotoLineEnd('normal');
      expect(cursor.cx).toBe(4);
      cursor.gotoLineEnd('insert');
      expect(cursor.cx).toBe(5);
    });

    it('gotoLineEnd is idempotent', () => {
      const { cursor } = setup(['hello']);
      cursor.gotoLineEnd('normal');
      const once = cursor.cx;
      cursor.gotoLineEnd('normal');
      expect(cursor.cx).toBe(once);
    });
  });

  describe('word motions', () => {
    it('w walks the words of a line', () => {
      const { cursor } = setup(['  foo bar']);
      cursor.nextWord(false);
      expect(cursor.cx).toBe(2);
      cursor.nextWord(false);
      expect(cursor.cx).toBe(6);
    });

    it('w is a no-op on the last character of the last line', () => {
      const { cursor } = setup(['foo']);
      cursor.cx = 2;
      cursor.nextWord(false);
      expect(cursor.position).toEqual({ row: 0, col: 2 });
    });

    it('e lands on word ends', () => {
      const { cursor } = setup(['foo bar']);
      cursor.nextWord(true);
      expect(cursor.cx).toBe(2);
    });

    it('ge runs back to the start of the word', () => {
      const { cursor } = setup(['foo bar']);
      cursor.cx = 4;
      cursor.prevWord(true);
      expect(cursor.cx).toBe(0);
    });

    it('b stops at the end of the previous word', () => {
      const { cursor } = setup(['foo bar']);
      cursor.cx = 5;
      cursor.prevWord(false);
      expect(cursor.cx).toBe(2);
    });
  });

  describe('scroll', () => {
    it('scrolls down just enough to show the cursor row', () => {
      const { cursor } = setup(['0', '1', '2', '3', '4', '5'], 80, 3);
      cursor.cy = 5;
      cursor.scroll('normal');
      expect(cursor.yOffset).toBe(3);
    });

    it('scrolls back up to the cursor row', () => {
      const { cursor } = setup(['0', '1', '2', '3', '4', '5'], 80, 3);
      cursor.cy = 5;
      cursor.scroll('normal');
      cursor.cy = 1;
      cursor.scroll('normal');
      expect(cursor.yOffset).toBe(1);
    });

    it('does not scroll while the cursor is visible', () => {
      const { cursor } = setup(['0', '1', '2', '3', '4', '5'], 80, 3);
      cursor.cy = 2;
      cursor.scroll('normal');
      expect(cursor.yOffset).toBe(0);
    });

    it('scrolls horizontally by render column', () => {
      const { cursor } = setup(['abcdefgh'], 4, 3);
      cursor.cx = 6;
      cursor.scroll('normal');
      expect(cursor.rx).toBe(6);
      expect(cursor.xOffset).toBe(3);
    });

    it('accounts for tabs in the render column', () => {
      const { cursor } = setup(['\tx']);
      cursor.cx = 1;
      cursor.scroll('insert');
      expect(cursor.rx).toBe(8);
    });

    it('snaps off a leading tab in normal mode', () => {
      const { cursor } = setup(['\tx']);
      cursor.scroll('normal');
      expect(cursor.cx).toBe(1);
      expect(cursor.rx).toBe(8);
    });

    it('keeps column 0 before a leading tab in insert mode', () => {
      const { cursor } = setup(['\tx']);
      cursor.scroll('insert');
      expect(cursor.cx).toBe(0);
      expect(cursor.rx).toBe(0);
    });
  });

  describe('command-line cursor', () => {
    it('resets to column 1', () => {
      const { cursor } = setup(['']);
      cursor.cmdx = 4;
      cursor.resetCommandCursor();
      expect(cursor.cmdx).toBe(1);
    });

    it('stays within the command text', () => {
      const { cursor } = setup(['']);
      cursor.moveCommandCursor(1, 2);
      cursor.moveCommandCursor(1, 2);
      cursor.moveCommandCursor(1, 2);
      expect(cursor.cmdx).toBe(3);
      cursor.moveCommandCursor(-10, 2);
      expect(cursor.cmdx).toBe(1);
    });
  });

  it('resize keeps at least one row and column', () => {
    const { cursor } = setup(['']);
    cursor.resize(0, -1);
    expect(cursor.columns).toBe(1);
    expect(cursor.textRows).toBe(1);
  });
});
