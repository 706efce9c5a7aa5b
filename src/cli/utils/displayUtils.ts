/**
 * Shared display utilities for CLI commands.
 *
 * Provides ANSI styling helpers and box-drawing borders used across
 * multiple CLI commands.
 */

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

export function getBorderChars(options: DisplayOptions): BorderChars {
  if (options.unicode) {
    return {
      topLeft: '┌',
      topRight: '┐',
      bottomLeft: '└',
      bottomRight: '┘',
      horizontal: '─',
      vertical: '│',
    };
  }
  return {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  };
}

/**
 * Strips ANSI escape sequences from a string to get visible length.
 *
 * @param str - The string potentially containing ANSI codes.
 * @returns The string with ANSI codes removed.
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_ESCAPE_PATTERN, '');
}

export function bold(text: string, options: DisplayOptions): string {
  return options.colors ? `\x1b[1m${text}\x1b[0m` : text;
}

export function dim(text: string, options: DisplayOptions): string {
  return options.colors ? `\x1b[2m${text}\x1b[0m` : text;
}

export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const lines = text.split('\n');
  const maxLength = Math.max(...lines.map((line) => stripAnsi(line).length));
  const horizontalBorder = border.horizontal.repeat(maxLength + 2);

  let result = border.topLeft + horizontalBorder + border.topRight + '\n';
  for (const line of lines) {
    const visibleLength = stripAnsi(line).length;
    const padding = ' '.repeat(maxLength - visibleLength);
    result += border.vertical + ' ' + line + padding + ' ' + border.vertical + '\n';
  }
  result += border.bottomLeft + horizontalBorder + border.bottomRight;

  return result;
}
