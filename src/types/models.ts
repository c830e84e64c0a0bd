/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';
import { isPlainObject } from './utils.js';

// ============================================================================
// CLASSIFICATION PIPELINE
// ============================================================================

export const QUESTION_TYPES = ['aggregation', 'lookup', 'general'] as const;

/**
 * Coarse classification of a question.
 */
export type QuestionType = (typeof QUESTION_TYPES)[number];

export const SQL_QUERY_TYPES = ['aggregation', 'count', 'lookup'] as const;

/**
 * Shape of a generated statement, used to pick the result layout.
 */
export type SqlQueryType = (typeof SQL_QUERY_TYPES)[number];

export type SearchMethod = 'none' | 'sql' | 'both';

export type EntityValue = string | number | null;

/**
 * Named slots extracted from the question (category, item_type, region,
 * year, month). Iteration order is the order the model returned them in.
 */
export type EntityMap = Record<string, EntityValue>;

/**
 * Layer 1 output.
 */
export interface QueryAnalysis {
  readonly intent: string;
  readonly entities: Readonly<EntityMap>;
  readonly keywords: readonly string[];
  readonly questionType: QuestionType;
  readonly confidence: number;
}

/**
 * Layer 2 output.
 */
export interface RelevanceDecision {
  readonly isDomainRelated: boolean;
  readonly requiresRetrieval: boolean;
  readonly confidence: number;
  readonly reason: string;
}

/**
 * Layer 3 output: how (and whether) to retrieve for this request.
 */
export interface RetrievalConfig {
  readonly useRetrieval: boolean;
  readonly searchMethod: SearchMethod;
  readonly resultCap: number;
  readonly scoreThreshold: number;
  readonly searchQuery: string;
  readonly metadataFilter: Readonly<Record<string, string | number>> | null;
}

/**
 * Every intermediate value of one classification, keyed for API output.
 */
export interface ClassificationDebugInfo {
  layer1_analysis: {
    intent: string;
    entities: EntityMap;
    keywords: string[];
    question_type: QuestionType;
    confidence: number;
  };
  layer2_decision: {
    is_domain_related: boolean;
    requires_retrieval: boolean;
    confidence: number;
    reason: string;
  };
  layer3_config: {
    use_retrieval: boolean;
    search_method: SearchMethod;
    result_cap: number;
    score_threshold: number;
    search_query: string;
  };
}

export interface ClassificationResult {
  useRetrieval: boolean;
  config: RetrievalConfig;
  debugInfo: ClassificationDebugInfo;
}

/**
 * Statement pair produced by the SQL generator. Both have passed validation.
 */
export interface GeneratedSql {
  readonly mainStatement: string;
  readonly countStatement: string | null;
  readonly queryType: SqlQueryType;
}

// ============================================================================
// MODEL REPLY SCHEMAS
// ============================================================================

const clampUnit = (n: number): number => Math.min(1, Math.max(0, n));

const ConfidenceSchema = z.coerce.number().catch(0.5).transform(clampUnit);

/**
 * Keep scalar entity values; anything nested or boolean is dropped.
 */
function toEntityMap(raw: Record<string, unknown>): EntityMap {
  const entities: EntityMap = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number' || value === null) {
      entities[key] = value;
    }
  }
  return entities;
}

/**
 * Layer 1 reply. Missing or malformed fields fall back to safe defaults.
 */
export const AnalysisReplySchema = z.object({
  intent: z.string().catch('unknown'),
  entities: z
    .unknown()
    .transform((value) => (isPlainObject(value) ? toEntityMap(value) : {})),
  keywords: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.filter((item): item is string => typeof item === 'string' && item.length > 0)
    ),
  question_type: z.enum(QUESTION_TYPES).catch('general'),
  confidence: ConfidenceSchema,
});
export type AnalysisReply = z.infer<typeof AnalysisReplySchema>;

/**
 * Layer 2 reply.
 */
export const DecisionReplySchema = z.object({
  is_domain_related: z.boolean().catch(false),
  requires_retrieval: z.boolean().catch(false),
  confidence: ConfidenceSchema,
  reason: z.string().catch(''),
});
export type DecisionReply = z.infer<typeof DecisionReplySchema>;

/**
 * SQL generator reply.
 */
export const SqlReplySchema = z.object({
  main_sql: z.string().catch(''),
  count_sql: z
    .string()
    .nullable()
    .catch(null)
    .transform((sql) => (sql && sql.trim().length > 0 ? sql : null)),
  query_type: z.enum(SQL_QUERY_TYPES).catch('aggregation'),
});
export type SqlReply = z.infer<typeof SqlReplySchema>;

// ============================================================================
// HTTP API
// ============================================================================

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});
export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/**
 * Request model for chat endpoints.
 */
export const ChatRequestSchema = z.object({
  messages: z.array(ChatMessageSchema).describe('Conversation so far, last entry is the question'),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().positive().default(4096),
  use_retrieval: z
    .boolean()
    .optional()
    .describe('Force retrieval on or off; classified automatically when omitted'),
  request_id: z.string().min(1).optional().describe('Id used to stop a streaming answer'),
});
export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export const StopRequestSchema = z.object({
  request_id: z.string().min(1),
});
export type StopRequest = z.infer<typeof StopRequestSchema>;

export const ClassifyRequestSchema = z.object({
  query: z.string().max(2000),
});
export type ClassifyRequest = z.infer<typeof ClassifyRequestSchema>;

export interface ChatResponse {
  message: string;
  success: boolean;
}

/**
 * Response model for errors.
 */
export interface ErrorResponse {
  error: string;
  message: string;
}
