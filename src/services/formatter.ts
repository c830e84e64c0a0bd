/**
 * Render query results as a compact text block for the model's context.
 */

import type { SqlQueryType } from '../types/models.js';
import type { ResultRow, SqlScalar } from '../types/utils.js';

export const NO_RESULTS = 'no results found';
export const RESULTS_HEADER = '=== SQL search results ===';
export const MAX_VALUE_LENGTH = 150;

const AGGREGATION_HIDDEN_COLUMNS = new Set(['text', 'keywords', 'id']);
const LOOKUP_HIDDEN_COLUMNS = new Set(['id']);

/**
 * Format rows by query type.
 *
 * @param totalCount total available rows when the main statement was capped
 */
export function formatResultsForLlm(
  rows: readonly ResultRow[],
  queryType: SqlQueryType,
  totalCount: number | null = null
): string {
  if (rows.length === 0) {
    return NO_RESULTS;
  }

  const lines: string[] = [RESULTS_HEADER];

  switch (queryType) {
    case 'aggregation': {
      if (totalCount !== null && totalCount > rows.length) {
        lines.push(`Aggregation results (showing ${rows.length} of ${totalCount} rows):`);
      } else {
        lines.push(`Aggregation results (${rows.length} rows):`);
      }
      rows.forEach((row, idx) => {
        lines.push(`[${idx + 1}] ${formatRow(row, AGGREGATION_HIDDEN_COLUMNS, false)}`);
      });
      break;
    }

    case 'count': {
      const first = rows[0];
      const total = first.total ?? first.count ?? rows.length;
      lines.push(`Total count: ${total}`);
      break;
    }

    default: {
      lines.push(`Lookup results (${rows.length} rows):`);
      rows.forEach((row, idx) => {
        lines.push(`[${idx + 1}] ${formatRow(row, LOOKUP_HIDDEN_COLUMNS, true)}`);
      });
    }
  }

  return lines.join('\n');
}

function formatRow(row: ResultRow, hidden: ReadonlySet<string>, truncate: boolean): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(row)) {
    if (value === null || value === undefined || hidden.has(key)) {
      continue;
    }
    parts.push(`${key}: ${formatValue(value, truncate)}`);
  }
  return parts.join(', ');
}

function formatValue(value: Exclude<SqlScalar, null>, truncate: boolean): string {
  if (truncate && typeof value === 'string' && value.length > MAX_VALUE_LENGTH) {
    return `${value.slice(0, MAX_VALUE_LENGTH)}...`;
  }
  return String(value);
}
