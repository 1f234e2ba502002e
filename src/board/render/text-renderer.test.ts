/**
 * Unit Tests for the text renderer
 */

import { describe, it, expect, vi } from 'vitest';
import { KEY_HINT, TextRenderer, formatRow, gaugeBar, layoutView } from './text-renderer.js';
import { ANSI, stripAnsi } from './ansi.js';
import type { ScreenView } from '../screens/index.js';

const view: ScreenView = {
  screen: 'power',
  title: 'Power',
  sections: [{ heading: 'Total 5.00 W', rows: [{ label: 'VDD_IN', value: '5.00 W' }] }],
  status: '',
};

describe('gaugeBar', () => {
  it('should fill in proportion to the percentage', () => {
    expect(gaugeBar(50, 10)).toBe('█████░░░░░');
    expect(gaugeBar(33, 10)).toBe('███░░░░░░░');
    expect(gaugeBar(0, 4)).toBe('░░░░');
    expect(gaugeBar(140, 4)).toBe('████');
  });
});

describe('formatRow', () => {
  it('should pad labels and mark the selected row', () => {
    expect(formatRow({ label: 'RAM', value: '1 / 2', gauge: 50, selected: true })).toBe(
      `> RAM${' '.repeat(19)} 1 / 2 ${'█'.repeat(10)}${'░'.repeat(10)}`,
    );
    expect(formatRow({ label: 'Fan', value: '25%' })).toBe(`  Fan${' '.repeat(19)} 25%`);
  });
});

describe('layoutView', () => {
  it('should lay out the tab bar, sections and footer', () => {
    const lines = layoutView(view, { columns: 80, rows: 24 }).map(stripAnsi);

    expect(lines).toEqual([
      ' 1 All  2 CPU  3 GPU  4 Memory  5 Power  6 Temperature  7 Control  8 Info ',
      '',
      'Total 5.00 W',
      `  VDD_IN${' '.repeat(16)} 5.00 W`,
      '',
      KEY_HINT,
    ]);
  });

  it('should highlight the current screen tab', () => {
    const [tabs] = layoutView(view, { columns: 80, rows: 24 });

    expect(tabs).toContain(`${ANSI.reverse} 5 Power ${ANSI.reset}`);
  });

  it('should show the status instead of the key hint', () => {
    const lines = layoutView({ ...view, status: 'ok: boost enabled' }, { columns: 80, rows: 24 });

    expect(stripAnsi(lines[lines.length - 1] ?? '')).toBe('ok: boost enabled');
  });

  it('should fit small terminals', () => {
    const lines = layoutView(view, { columns: 20, rows: 3 }).map(stripAnsi);

    expect(lines).toEqual([' 1 All  2 CPU ', '', KEY_HINT.slice(0, 20)]);
  });
});

describe('TextRenderer', () => {
  it('should write one positioned frame per render', () => {
    const write = vi.fn((_text: string) => undefined);
    const renderer = new TextRenderer({ write, size: () => ({ columns: 80, rows: 24 }) });

    renderer.render('power', view);

    expect(write).toHaveBeenCalledTimes(1);
    const frame = write.mock.calls[0]?.[0] ?? '';
    expect(frame.startsWith(ANSI.pos(1, 1))).toBe(true);
    expect(frame.endsWith(`${ANSI.pos(7, 1)}${ANSI.clearBelow}`)).toBe(true);
  });
});
