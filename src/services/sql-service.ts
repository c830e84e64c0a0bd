/**
 * SQL-backed search: generate, execute, count, format.
 */

import { logger } from '../utils/logger.js';
import type { EntityMap, QuestionType, SqlQueryType } from '../types/models.js';
import type { ResultRow } from '../types/utils.js';
import type { SqlGenerator } from './sql-generator.js';
import type { SqlStore } from './database.js';
import { formatResultsForLlm } from './formatter.js';

export interface SearchResult {
  rows: ResultRow[];
  /** The executed main statement. */
  sql: string;
  queryType: SqlQueryType;
  /** Total from the count statement, or null when there was none. */
  totalCount: number | null;
}

export class SqlService {
  constructor(
    private readonly generator: SqlGenerator,
    private readonly store: SqlStore
  ) {}

  /**
   * Answer a question with rows from the store.
   *
   * @throws SQLGenerationError, ValidationError or SQLExecutionError; the
   *   caller decides how to degrade
   */
  async search(
    query: string,
    entities?: Readonly<EntityMap>,
    questionType?: QuestionType
  ): Promise<SearchResult> {
    const generated = await this.generator.generate(query, entities, questionType);
    const rows = await this.store.executeQuery(generated.mainStatement);

    let totalCount: number | null = null;
    if (generated.countStatement !== null) {
      totalCount = await this.store.executeCount(generated.countStatement);
      logger.debug(`Count statement total: ${totalCount}`);
    }

    return {
      rows,
      sql: generated.mainStatement,
      queryType: generated.queryType,
      totalCount,
    };
  }

  formatResultsForLlm(
    rows: readonly ResultRow[],
    queryType: SqlQueryType,
    totalCount: number | null = null
  ): string {
    return formatResultsForLlm(rows, queryType, totalCount);
  }
}
