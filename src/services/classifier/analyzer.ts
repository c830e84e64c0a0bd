/**
 * Layer 1: query analysis.
 * Extracts intent, entities, keywords and a coarse question type.
 */

import { completeJson, type LLMGateway } from '../llm.js';
import { logger } from '../../utils/logger.js';
import { AnalysisReplySchema, type QueryAnalysis } from '../../types/models.js';

/**
 * Words that mark a data question when the model is unavailable.
 */
export const FALLBACK_KEYWORDS = ['통계', '데이터', '조회', '검색', '목록', '내역'] as const;

const ANALYSIS_PROMPT = `You are an expert at analyzing user questions for a data assistant.
Questions are often written in Korean; keep extracted values in the user's language.

User question: "{query}"

Extract the following and return it as JSON:
{
  "intent": "main intent of the question (e.g. data statistics, record lookup, small talk, technical question)",
  "entities": {
    "category": "category name, or null",
    "item_type": "item type, or null",
    "region": "region name, or null",
    "year": year as a number (e.g. 2025), or null,
    "month": month as a number (e.g. 7), or null
  },
  "keywords": ["core", "keyword", "list"],
  "question_type": "aggregation (statistics/grouping) | lookup (individual records) | general (no data needed)",
  "confidence": analysis confidence between 0.0 and 1.0
}

Output ONLY the JSON object. No explanation.`;

export interface QueryAnalyzerOptions {
  timeoutMs: number;
}

export class QueryAnalyzer {
  constructor(
    private readonly gateway: LLMGateway,
    private readonly options: QueryAnalyzerOptions
  ) {}

  /**
   * Analyze a question. Never throws: gateway or parse failures produce the
   * keyword-matching fallback.
   */
  async analyze(query: string): Promise<QueryAnalysis> {
    try {
      const reply = await completeJson(
        this.gateway,
        ANALYSIS_PROMPT.replace('{query}', () => query),
        AnalysisReplySchema,
        { maxTokens: 300, temperature: 0.1, timeoutMs: this.options.timeoutMs }
      );

      return {
        intent: reply.intent,
        entities: reply.entities,
        keywords: reply.keywords,
        questionType: reply.question_type,
        confidence: reply.confidence,
      };
    } catch (error) {
      logger.warn(`Layer 1 analysis failed, using keyword fallback: ${error}`);
      return fallbackAnalysis(query);
    }
  }
}

/**
 * Keyword-matching substitute for the model's analysis.
 */
export function fallbackAnalysis(query: string): QueryAnalysis {
  return {
    intent: 'unknown',
    entities: {},
    keywords: FALLBACK_KEYWORDS.filter((keyword) => query.includes(keyword)),
    questionType: 'general',
    confidence: 0.3,
  };
}
