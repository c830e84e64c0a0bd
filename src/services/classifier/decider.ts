/**
 * Layer 2: relevance decision.
 * Judges whether the question concerns the domain data and needs retrieval.
 */

import { completeJson, type LLMGateway } from '../llm.js';
import { logger } from '../../utils/logger.js';
import {
  DecisionReplySchema,
  type QueryAnalysis,
  type RelevanceDecision,
} from '../../types/models.js';

export const FALLBACK_REASON = 'Fallback decision based on keywords';

const DECISION_PROMPT = `You are an expert at classifying questions for a data assistant.
Decide whether the question below is related to the "domain data".

Domain data means:
- business records stored in the database
- anything that needs statistics, aggregation or record lookup over that data

User question:
"{query}"

Question analysis (layer 1):
- intent: {intent}
- entities: {entities}
- keywords: {keywords}
- question type: {question_type}

Answer with this JSON:
{
  "is_domain_related": true or false,
  "requires_retrieval": true or false (true when domain related AND data must be looked up),
  "confidence": confidence between 0.0 and 1.0,
  "reason": "one sentence explaining the decision"
}

Criteria:
1. Questions that need data lookup or statistics require retrieval
2. Greetings, weather, arithmetic and general conversation are not domain related

Output ONLY the JSON object.`;

export interface RelevanceDeciderOptions {
  timeoutMs: number;
}

export class RelevanceDecider {
  constructor(
    private readonly gateway: LLMGateway,
    private readonly options: RelevanceDeciderOptions
  ) {}

  /**
   * Decide from the question and its Layer 1 analysis. One attempt; any
   * failure returns the rule-based fallback.
   */
  async decide(query: string, analysis: QueryAnalysis): Promise<RelevanceDecision> {
    const values: Record<string, string> = {
      query,
      intent: analysis.intent,
      entities: JSON.stringify(analysis.entities),
      keywords: JSON.stringify(analysis.keywords),
      question_type: analysis.questionType,
    };
    const prompt = DECISION_PROMPT.replace(
      /\{(query|intent|entities|keywords|question_type)\}/g,
      (_match, key: string) => values[key] ?? ''
    );

    try {
      const reply = await completeJson(this.gateway, prompt, DecisionReplySchema, {
        maxTokens: 200,
        temperature: 0.1,
        timeoutMs: this.options.timeoutMs,
      });

      return {
        isDomainRelated: reply.is_domain_related,
        requiresRetrieval: reply.requires_retrieval,
        confidence: reply.confidence,
        reason: reply.reason,
      };
    } catch (error) {
      logger.error(`Layer 2 decision failed, using rule fallback: ${error}`);
      return fallbackDecision(analysis);
    }
  }
}

/**
 * Data questions with at least one keyword need retrieval.
 */
export function fallbackDecision(analysis: QueryAnalysis): RelevanceDecision {
  const related =
    (analysis.questionType === 'aggregation' || analysis.questionType === 'lookup') &&
    analysis.keywords.length > 0;

  return {
    isDomainRelated: related,
    requiresRetrieval: related,
    confidence: 0.5,
    reason: FALLBACK_REASON,
  };
}
