// ANSI/VT100 control sequences used to drive the bottom region

const ESC = '\x1b';
const CSI = `${ESC}[`;

export const ANSI = {
  // Cursor control
  cursorUp: (n: number) => (n > 0 ? `${CSI}${n}A` : ''),
  cursorDown: (n: number) => (n > 0 ? `${CSI}${n}B` : ''),
  lineStart: '\r',

  // Erasing
  eraseLine: `${CSI}2K`,
  eraseBelow: `${CSI}J`,

  newline: '\n',
} as const;

/**
 * Split text into lines, accepting \n, \r\n, bare \r, VT and FF as separators
 */
export function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, '\n').split(/[\r\n\v\f]/);
}

// Terminals move the cursor down on VT and FF as they do on LF
export function hasLineBreak(text: string): boolean {
  return /[\r\n\v\f]/.test(text);
}
