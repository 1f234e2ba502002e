/**
 * Text Renderer
 *
 * Lays a ScreenView out as terminal lines: a tab bar of the eight screens,
 * one block per section and a footer with the status or a key hint. Each
 * frame repositions every line, so nothing from the previous frame leaks.
 */

import { SCREEN_ORDER, SCREEN_TITLES, type ScreenState } from '../types/index.js';
import type { ScreenView, ViewRow } from '../screens/index.js';
import type { TerminalSession, TerminalSize } from '../loop/terminal-session.js';
import { ANSI } from './ansi.js';

export type RenderCallback = (screen: ScreenState, view: ScreenView) => void;

const LABEL_WIDTH = 22;
const GAUGE_WIDTH = 20;
export const KEY_HINT = '1-8 screens  tab/shift-tab cycle  arrows/enter control  q quit';

export function gaugeBar(percent: number, width = GAUGE_WIDTH): string {
  const share = Number.isFinite(percent) ? Math.min(100, Math.max(0, percent)) : 0;
  const filled = Math.round((share / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function clip(text: string, columns: number): string {
  return [...text].slice(0, Math.max(0, columns)).join('');
}

function tabBar(current: ScreenState, columns: number): string {
  let line = '';
  let width = 0;
  for (const [offset, screen] of SCREEN_ORDER.entries()) {
    const tab = ` ${offset + 1} ${SCREEN_TITLES[screen]} `;
    if (width + tab.length > columns) break;
    width += tab.length;
    line += screen === current ? `${ANSI.reverse}${tab}${ANSI.reset}` : tab;
  }
  return line;
}

export function formatRow(row: ViewRow): string {
  const marker = row.selected === true ? '> ' : '  ';
  const gauge = row.gauge === undefined ? '' : ` ${gaugeBar(row.gauge)}`;
  return `${marker}${row.label.padEnd(LABEL_WIDTH)} ${row.value}${gauge}`;
}

/**
 * Frame lines for a view, at most `rows` of them, the footer always last.
 */
export function layoutView(view: ScreenView, size: TerminalSize): string[] {
  const body: string[] = [tabBar(view.screen, size.columns), ''];

  for (const section of view.sections) {
    body.push(`${ANSI.bold}${clip(section.heading, size.columns)}${ANSI.reset}`);
    for (const row of section.rows) {
      const text = clip(formatRow(row), size.columns);
      body.push(row.selected === true ? `${ANSI.reverse}${text}${ANSI.reset}` : text);
    }
    body.push('');
  }

  const footer = `${ANSI.dim}${clip(view.status === '' ? KEY_HINT : view.status, size.columns)}${ANSI.reset}`;
  return [...body.slice(0, Math.max(0, size.rows - 1)), footer];
}

export class TextRenderer {
  constructor(private readonly terminal: Pick<TerminalSession, 'write' | 'size'>) {}

  readonly render: RenderCallback = (_screen, view) => {
    const lines = layoutView(view, this.terminal.size());
    const frame = lines.map((line, offset) => `${ANSI.pos(offset + 1, 1)}${line}${ANSI.clearLine}`).join('');
    this.terminal.write(frame + ANSI.pos(lines.length + 1, 1) + ANSI.clearBelow);
  };
}
