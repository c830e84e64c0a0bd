/**
 * Turns a user question into the context block spliced into the system
 * prompt. Failures here never reach the user: the answer falls back to the
 * model's general knowledge.
 */

import { logger } from '../utils/logger.js';
import type {
  ClassificationDebugInfo,
  EntityMap,
  QuestionType,
  SearchMethod,
} from '../types/models.js';
import type { QueryClassifier } from './classifier/index.js';
import type { SqlService } from './sql-service.js';

export interface RetrievalContext {
  /** Formatted rows, or '' when nothing was retrieved. */
  context: string;
  useRetrieval: boolean;
  debugInfo: ClassificationDebugInfo | null;
  /** Statement that produced the context. */
  sql: string | null;
}

interface SearchPlan {
  searchQuery: string;
  searchMethod: SearchMethod;
  entities?: EntityMap;
  questionType?: QuestionType;
}

export class RetrievalContextBuilder {
  constructor(
    private readonly classifier: QueryClassifier,
    private readonly sqlService: SqlService
  ) {}

  /**
   * @param useRetrieval forces retrieval on or off; classified when undefined
   */
  async build(query: string, useRetrieval?: boolean): Promise<RetrievalContext> {
    const empty: RetrievalContext = {
      context: '',
      useRetrieval: false,
      debugInfo: null,
      sql: null,
    };
    if (query.trim().length === 0) {
      return empty;
    }

    let plan: SearchPlan | null = null;
    let debugInfo: ClassificationDebugInfo | null = null;

    if (useRetrieval === undefined) {
      const classification = await this.classifier.classify(query);
      debugInfo = classification.debugInfo;
      if (classification.useRetrieval) {
        plan = {
          searchQuery: classification.config.searchQuery,
          searchMethod: classification.config.searchMethod,
          entities: debugInfo.layer1_analysis.entities,
          questionType: debugInfo.layer1_analysis.question_type,
        };
      }
    } else if (useRetrieval) {
      plan = { searchQuery: query, searchMethod: 'sql' };
    }

    if (plan === null) {
      return { ...empty, debugInfo };
    }
    if (plan.searchMethod !== 'sql' && plan.searchMethod !== 'both') {
      return { ...empty, useRetrieval: true, debugInfo };
    }

    try {
      const result = await this.sqlService.search(
        plan.searchQuery,
        plan.entities,
        plan.questionType
      );
      return {
        context: this.sqlService.formatResultsForLlm(
          result.rows,
          result.queryType,
          result.totalCount
        ),
        useRetrieval: true,
        debugInfo,
        sql: result.sql,
      };
    } catch (error) {
      logger.warn(`SQL search failed, answering without retrieved data: ${error}`);
      return { ...empty, useRetrieval: true, debugInfo };
    }
  }
}

/**
 * System prompt for the answering model.
 */
export function buildSystemPrompt(context: string): string {
  if (context.length === 0) {
    return `You are a friendly and knowledgeable AI assistant.
Give accurate and helpful answers to the user's questions.`;
  }

  return `You are an expert SQL data analyst.

=== Retrieved data ===
${context}

Answer rules:
1. Completeness: show every retrieved row, leave nothing out
2. Totals: phrase counts as "N items matching [condition]"
3. Statistics questions: present the numbers as a markdown table
4. Charts (only when explicitly requested):
   - Only when the user asks for a "chart", "graph", "pie chart", "bar chart" (차트, 그래프)
   - Plain "statistics" or "show me" gets a table only
   - Use a chartjs code block with this JSON:

   \`\`\`chartjs
   {
     "type": "pie" | "bar",
     "title": "title",
     "labels": ["label1", "label2"],
     "data": [value1, value2]
   }
   \`\`\`
5. Keep numbers exact; be concise and clear`;
}
