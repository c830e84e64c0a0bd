/**
 * Natural-language to SQL generation with a read-only safety check.
 */

import { completeJson, type LLMGateway } from './llm.js';
import { logger } from '../utils/logger.js';
import { SQLGenerationError, ValidationError } from '../types/errors.js';
import {
  SqlReplySchema,
  type EntityMap,
  type GeneratedSql,
  type QuestionType,
  type SqlReply,
} from '../types/models.js';

/**
 * The store's only table, as the model sees it. There is no introspection;
 * keep this in step with the seeder in cli/seed-database.ts.
 */
export const SCHEMA_DESCRIPTION = `Table: your_table (data records)

Columns:
- id: INTEGER (primary key)
- date: TEXT (timestamp, format YYYY-MM-DD HH:MM)
- year: INTEGER (year)
- month: INTEGER (month)
- day: INTEGER (day)
- category: TEXT (category)
- sub_category: TEXT (sub-category)
- region: TEXT (region)
- name: TEXT (name / title)
- value: INTEGER (value / quantity)
- keywords: TEXT (keywords as a JSON array string)`;

/**
 * Substrings that reject a statement, checked against its uppercased text.
 */
export const FORBIDDEN_SQL_TOKENS = [
  'DROP',
  'DELETE',
  'UPDATE',
  'INSERT',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  '--',
  ';',
] as const;

const SQL_GENERATION_PROMPT = `You are an expert SQL generator for a SQLite database.
Analyze the user question and write the SQL that answers it.

User question: "{query}"{entity_hint}

{schema}

Respond with this JSON:
{
  "main_sql": "main SQL query (SELECT ... FROM your_table ...)",
  "count_sql": "SQL returning the total number of groups as a column named total (only for grouped queries, otherwise null)",
  "query_type": "aggregation|count|lookup"
}

SQL rules:
1. LIMIT:
   - "top N", "상위 N개" → LIMIT N
   - "all", "전체", "모든", "다" → no LIMIT
   - statistics questions by default → LIMIT 20

2. GROUP BY:
   - statistics / aggregation questions → GROUP BY the appropriate column
   - simple count questions → COUNT(*) only

3. query_type:
   - aggregation: statistics with GROUP BY
   - count: a single count
   - lookup: individual records

Safety requirements:
- A single SELECT statement. No semicolons, no comments.
- NEVER use UPDATE, DELETE, DROP, ALTER, INSERT, CREATE, TRUNCATE

Output ONLY the JSON object. SQL must be written as JSON strings.`;

export interface SqlGeneratorOptions {
  timeoutMs: number;
}

export class SqlGenerator {
  constructor(
    private readonly gateway: LLMGateway,
    private readonly options: SqlGeneratorOptions
  ) {}

  /**
   * Generate the main statement (and an optional count statement) for a
   * question. Both are validated before they are returned.
   *
   * @throws SQLGenerationError when the model call or its JSON fails
   * @throws ValidationError when a statement is not a plain SELECT
   */
  async generate(
    userQuery: string,
    entities?: Readonly<EntityMap>,
    questionType?: QuestionType
  ): Promise<GeneratedSql> {
    const prompt = buildSqlPrompt(userQuery, entities, questionType);

    let reply: SqlReply;
    try {
      reply = await completeJson(this.gateway, prompt, SqlReplySchema, {
        maxTokens: 500,
        temperature: 0.1,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      logger.error(`LLM failed to generate SQL: ${error}`);
      throw new SQLGenerationError(`Failed to generate SQL: ${error}`);
    }

    validateSql(reply.main_sql);
    if (reply.count_sql !== null) {
      validateSql(reply.count_sql);
    }

    logger.info(`Generated SQL (${reply.query_type}): ${reply.main_sql}`);
    return {
      mainStatement: reply.main_sql,
      countStatement: reply.count_sql,
      queryType: reply.query_type,
    };
  }
}

export function buildSqlPrompt(
  userQuery: string,
  entities?: Readonly<EntityMap>,
  questionType?: QuestionType
): string {
  let entityHint = '';
  if (entities) {
    const filtered = Object.fromEntries(
      Object.entries(entities).filter(([, value]) => value !== null && value !== undefined)
    );
    if (Object.keys(filtered).length > 0) {
      entityHint = `\nEntities mentioned in the question:\n${JSON.stringify(filtered, null, 2)}\n`;
    }
  }
  if (questionType && questionType !== 'general') {
    entityHint += `\nThe question was classified as: ${questionType}\n`;
  }

  const values: Record<string, string> = {
    query: userQuery,
    entity_hint: entityHint,
    schema: SCHEMA_DESCRIPTION,
  };
  return SQL_GENERATION_PROMPT.replace(
    /\{(query|entity_hint|schema)\}/g,
    (_match, key: string) => values[key] ?? ''
  );
}

/**
 * Validate that SQL is a single read-only SELECT.
 *
 * Tokens match anywhere in the text, inside identifiers and string
 * literals too.
 *
 * @throws ValidationError naming the first offending token
 */
export function validateSql(sql: string): void {
  const sqlUpper = sql.toUpperCase();

  for (const token of FORBIDDEN_SQL_TOKENS) {
    if (sqlUpper.includes(token)) {
      logger.warn(`Blocked unsafe SQL containing: ${token}`);
      throw new ValidationError(`Forbidden SQL token detected: ${token}`, sql);
    }
  }

  if (!sqlUpper.trim().startsWith('SELECT')) {
    logger.warn('SQL must start with SELECT');
    throw new ValidationError('Only SELECT statements are allowed', sql);
  }
}
