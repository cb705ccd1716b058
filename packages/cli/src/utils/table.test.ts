import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import { padEndVisual, padStartVisual, renderKeyValues, renderTable } from './table.js';

describe('table rendering', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('pads by visual width', () => {
    expect(padEndVisual('ab', 4)).toBe('ab  ');
    expect(padStartVisual('ab', 4)).toBe('  ab');
    expect(padEndVisual('日本', 6)).toBe('日本  ');
    expect(padEndVisual('toolong', 3)).toBe('toolong');
  });

  it('aligns columns and leaves the last left-aligned column unpadded', () => {
    const lines = renderTable(
      [{ header: 'Year', align: 'right' }, { header: 'Amount' }],
      [
        ['1', '$10.00'],
        ['10', '$5.00'],
      ]
    );

    expect(lines).toEqual(['Year  Amount', '─'.repeat(12), '   1  $10.00', '  10  $5.00']);
  });

  it('renders aligned label/value pairs', () => {
    expect(
      renderKeyValues([
        ['A', '1'],
        ['Long', '2'],
      ])
    ).toEqual(['  A:    1', '  Long: 2']);
  });
});
