import { describe, it, expect } from 'vitest';
import { formatSummaryRecord, formatTable } from '../table-formatter.js';

describe('formatTable', () => {
  it('renders a pipe table with numeric columns right-aligned', () => {
    const table = formatTable([
      { Method: 'azure_model', F1: 0.91234, Count: 10 },
      { Method: 'query-vat_number', F1: 0.5, Count: 4 },
    ]);

    expect(table).toBe(
      [
        '| Method | F1 | Count |',
        '| --- | ---: | ---: |',
        '| azure_model | 0.912 | 10 |',
        '| query-vat_number | 0.5 | 4 |',
      ].join('\n')
    );
  });

  it('rounds to the requested number of digits', () => {
    expect(formatTable([{ Rate: 0.12567 }], { digits: 2 })).toBe('| Rate |\n| ---: |\n| 0.13 |');
  });

  it('keeps columns in first-seen order and leaves missing cells blank', () => {
    expect(formatTable([{ A: 1 }, { B: 2 }])).toBe('| A | B |\n| --- | --- |\n| 1 |  |\n|  | 2 |');
  });

  it('escapes pipes and flattens newlines in text cells', () => {
    expect(formatTable([{ Note: 'a|b\nc' }])).toBe('| Note |\n| --- |\n| a\\|b c |');
  });

  it('prefixes the caption in bold', () => {
    expect(formatTable([{ A: 'x' }], { caption: 'Totals' })).toBe('**Totals**\n\n| A |\n| --- |\n| x |');
  });

  it('renders a placeholder for no rows', () => {
    expect(formatTable([])).toBe('*No data available*');
  });
});

describe('formatSummaryRecord', () => {
  it('renders a Metric/Value table', () => {
    expect(formatSummaryRecord({ Records: 1200, 'Mean F1': 0.91234 }, 'Key metrics')).toBe(
      [
        '**Key metrics**',
        '',
        '| Metric | Value |',
        '| --- | ---: |',
        '| Records | 1200 |',
        '| Mean F1 | 0.912 |',
      ].join('\n')
    );
  });

  it('left-aligns values when any is text', () => {
    expect(formatSummaryRecord({ Period: 'March', Records: 5 })).toBe(
      '| Metric | Value |\n| --- | --- |\n| Period | March |\n| Records | 5 |'
    );
  });
});
