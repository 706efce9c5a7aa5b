import { describe, it, expect } from 'vitest';
import { bold, dim, stripAnsi, wrapInBox } from './displayUtils.js';

const plain = { colors: false, unicode: false };
const fancy = { colors: true, unicode: true };

describe('displayUtils', () => {
  it('styles text only when colors are enabled', () => {
    expect(bold('x', plain)).toBe('x');
    expect(bold('x', fancy)).toBe('\x1b[1mx\x1b[0m');
    expect(dim('x', fancy)).toBe('\x1b[2mx\x1b[0m');
  });

  it('strips ANSI sequences', () => {
    expect(stripAnsi('\x1b[1mbold\x1b[0m and \x1b[2mdim\x1b[0m')).toBe('bold and dim');
  });

  it('draws an ASCII box padded to the longest line', () => {
    expect(wrapInBox('ab\nabcd', plain)).toBe(
      ['+------+', '| ab   |', '| abcd |', '+------+'].join('\n')
    );
  });

  it('ignores ANSI codes when sizing a unicode box', () => {
    expect(wrapInBox(bold('ok', fancy), fancy)).toBe(
      ['┌────┐', '│ \x1b[1mok\x1b[0m │', '└────┘'].join('\n')
    );
  });
});
