import { describe, it, expect } from 'vitest';
import { NO_RESULTS, formatResultsForLlm } from '../formatter.js';

describe('formatResultsForLlm', () => {
  it('reports empty results', () => {
    expect(formatResultsForLlm([], 'aggregation', 10)).toBe(NO_RESULTS);
    expect(formatResultsForLlm([], 'lookup')).toBe('no results found');
  });

  it('formats aggregation rows without hidden columns', () => {
    const text = formatResultsForLlm(
      [
        { id: 1, region: 'Seoul', total: 120, keywords: '["a"]', text: 'long text' },
        { id: 2, region: 'Busan', total: 80, keywords: null, text: null },
      ],
      'aggregation'
    );
    expect(text).toBe(
      [
        '=== SQL search results ===',
        'Aggregation results (2 rows):',
        '[1] region: Seoul, total: 120',
        '[2] region: Busan, total: 80',
      ].join('\n')
    );
  });

  it('shows how many groups were cut off', () => {
    const text = formatResultsForLlm([{ region: 'Seoul', total: 1 }], 'aggregation', 17);
    expect(text.split('\n')[1]).toBe('Aggregation results (showing 1 of 17 rows):');
  });

  it('ignores a total that is not larger than the row count', () => {
    const text = formatResultsForLlm([{ region: 'Seoul', total: 1 }], 'aggregation', 1);
    expect(text.split('\n')[1]).toBe('Aggregation results (1 rows):');
  });

  it('prints a single count', () => {
    expect(formatResultsForLlm([{ total: 42 }], 'count')).toBe(
      '=== SQL search results ===\nTotal count: 42'
    );
    expect(formatResultsForLlm([{ count: 7 }], 'count')).toBe(
      '=== SQL search results ===\nTotal count: 7'
    );
    expect(formatResultsForLlm([{ n: 5 }, { n: 6 }], 'count')).toBe(
      '=== SQL search results ===\nTotal count: 2'
    );
  });

  it('cuts a 200 character value to 150 characters and an ellipsis', () => {
    const name = 'a'.repeat(150) + 'b'.repeat(50);
    const text = formatResultsForLlm([{ name }], 'lookup');
    const line = text.split('\n')[2];
    expect(line).toBe(`[1] name: ${'a'.repeat(150)}...`);
    expect(line.slice('[1] name: '.length)).toHaveLength(153);
  });

  it('keeps a 150 character value whole', () => {
    const name = 'c'.repeat(150);
    expect(formatResultsForLlm([{ name }], 'lookup').split('\n')[2]).toBe(`[1] name: ${name}`);
  });

  it('truncates long lookup values and keeps keywords', () => {
    const name = 'x'.repeat(160);
    const text = formatResultsForLlm([{ id: 9, name, keywords: '["k"]', value: 3 }], 'lookup');
    expect(text).toBe(
      [
        '=== SQL search results ===',
        'Lookup results (1 rows):',
        `[1] name: ${'x'.repeat(150)}..., keywords: ["k"], value: 3`,
      ].join('\n')
    );
  });
});
