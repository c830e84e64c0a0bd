/**
 * Layer 3: retrieval trigger.
 * Pure mapping from the first two layers to concrete search parameters.
 */

import type {
  EntityMap,
  QueryAnalysis,
  RelevanceDecision,
  RetrievalConfig,
} from '../../types/models.js';

export interface RetrievalTriggerOptions {
  /** Result cap for aggregation and general questions. */
  defaultTopK: number;
  /** Result cap for record lookups. */
  lookupTopK: number;
}

const NO_RETRIEVAL: RetrievalConfig = {
  useRetrieval: false,
  searchMethod: 'none',
  resultCap: 0,
  scoreThreshold: 0,
  searchQuery: '',
  metadataFilter: null,
};

export class RetrievalTrigger {
  constructor(private readonly options: RetrievalTriggerOptions) {}

  generateConfig(
    query: string,
    analysis: QueryAnalysis,
    decision: RelevanceDecision
  ): RetrievalConfig {
    if (!decision.requiresRetrieval) {
      return NO_RETRIEVAL;
    }

    let resultCap: number;
    let scoreThreshold: number;
    switch (analysis.questionType) {
      case 'aggregation':
        resultCap = this.options.defaultTopK;
        scoreThreshold = 0.5;
        break;
      case 'lookup':
        resultCap = this.options.lookupTopK;
        scoreThreshold = 0.7;
        break;
      default:
        resultCap = this.options.defaultTopK;
        scoreThreshold = 0.7;
    }

    return {
      useRetrieval: true,
      // The only retrieval backend is the relational store.
      searchMethod: 'sql',
      resultCap,
      scoreThreshold,
      searchQuery: buildSearchQuery(query, analysis.entities),
      metadataFilter: null,
    };
  }
}

/**
 * Prefix the question with its entity values to steer SQL generation toward
 * matching filters. Not a filter itself.
 */
export function buildSearchQuery(query: string, entities?: Readonly<EntityMap>): string {
  const parts: string[] = [];
  for (const value of Object.values(entities ?? {})) {
    if (value !== null && value !== undefined && value !== '') {
      parts.push(String(value));
    }
  }
  return parts.length > 0 ? `${parts.join(' ')} ${query}` : query;
}
