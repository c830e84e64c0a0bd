/**
 * Shared value types.
 */

/**
 * Scalar a SQLite column can hold once read back.
 */
export type SqlScalar = string | number | bigint | null;

/**
 * One materialized result row: column name to value, in SELECT order.
 */
export type ResultRow = Record<string, SqlScalar>;

/**
 * Narrow an unknown value to a plain (non-array) object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
