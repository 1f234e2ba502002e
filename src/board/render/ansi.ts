/**
 * ANSI / terminal control sequences
 */

const ESC = '\x1b';
const CSI = `${ESC}[`;

export const ANSI = Object.freeze({
  altOn: `${CSI}?1049h`,
  altOff: `${CSI}?1049l`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  clear: `${CSI}2J${CSI}H`,
  clearLine: `${CSI}K`,
  clearBelow: `${CSI}J`,
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
  dim: `${CSI}2m`,
  reverse: `${CSI}7m`,
  pos: (row: number, column: number) => `${CSI}${row};${column}H`,
});

/** Removes SGR and cursor sequences */
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, '');
}
