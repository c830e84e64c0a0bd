/**
 * Three-layer question classifier.
 *
 * Layer 1 (analysis) → Layer 2 (relevance) → Layer 3 (retrieval trigger),
 * strictly in order. Holds only its collaborators, so one instance can serve
 * concurrent requests.
 */

import type { LLMGateway } from '../llm.js';
import { logger } from '../../utils/logger.js';
import type {
  ClassificationDebugInfo,
  ClassificationResult,
  QueryAnalysis,
  RelevanceDecision,
  RetrievalConfig,
} from '../../types/models.js';
import { QueryAnalyzer } from './analyzer.js';
import { RelevanceDecider } from './decider.js';
import { RetrievalTrigger } from './trigger.js';

export { QueryAnalyzer, fallbackAnalysis, FALLBACK_KEYWORDS } from './analyzer.js';
export { RelevanceDecider, fallbackDecision, FALLBACK_REASON } from './decider.js';
export { RetrievalTrigger, buildSearchQuery } from './trigger.js';

export interface QueryClassifierOptions {
  classifyTimeoutMs: number;
  defaultTopK: number;
  lookupTopK: number;
}

export class QueryClassifier {
  constructor(
    private readonly analyzer: QueryAnalyzer,
    private readonly decider: RelevanceDecider,
    private readonly trigger: RetrievalTrigger
  ) {}

  /**
   * Wire the three layers around one gateway.
   */
  static create(gateway: LLMGateway, options: QueryClassifierOptions): QueryClassifier {
    return new QueryClassifier(
      new QueryAnalyzer(gateway, { timeoutMs: options.classifyTimeoutMs }),
      new RelevanceDecider(gateway, { timeoutMs: options.classifyTimeoutMs }),
      new RetrievalTrigger({
        defaultTopK: options.defaultTopK,
        lookupTopK: options.lookupTopK,
      })
    );
  }

  async classify(query: string): Promise<ClassificationResult> {
    logger.info(`[Layer 1] Analyzing query: '${query.slice(0, 50)}'`);
    const analysis = await this.analyzer.analyze(query);

    logger.info(`[Layer 2] Deciding relevance (${analysis.questionType})`);
    const decision = await this.decider.decide(query, analysis);

    logger.info(`[Layer 3] Building retrieval config (requires=${decision.requiresRetrieval})`);
    const config = this.trigger.generateConfig(query, analysis, decision);

    return {
      useRetrieval: config.useRetrieval,
      config,
      debugInfo: buildDebugInfo(analysis, decision, config),
    };
  }
}

export function buildDebugInfo(
  analysis: QueryAnalysis,
  decision: RelevanceDecision,
  config: RetrievalConfig
): ClassificationDebugInfo {
  return {
    layer1_analysis: {
      intent: analysis.intent,
      entities: { ...analysis.entities },
      keywords: [...analysis.keywords],
      question_type: analysis.questionType,
      confidence: analysis.confidence,
    },
    layer2_decision: {
      is_domain_related: decision.isDomainRelated,
      requires_retrieval: decision.requiresRetrieval,
      confidence: decision.confidence,
      reason: decision.reason,
    },
    layer3_config: {
      use_retrieval: config.useRetrieval,
      search_method: config.searchMethod,
      result_cap: config.resultCap,
      score_threshold: config.scoreThreshold,
      search_query: config.searchQuery,
    },
  };
}
