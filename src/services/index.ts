/**
 * Service wiring. Everything is built here from one Config and passed down;
 * nothing below holds module-level state.
 */

import type { Config } from '../config.js';
import { ConcurrencyGate } from '../utils/concurrency.js';
import { AiSdkChatModel, type ChatModel } from './chat-model.js';
import { QueryClassifier } from './classifier/index.js';
import { RetrievalContextBuilder } from './context.js';
import { SqlStore } from './database.js';
import { AiSdkGateway, createLanguageModel, type LLMGateway } from './llm.js';
import { RequestRegistry } from './request-registry.js';
import { SqlGenerator } from './sql-generator.js';
import { SqlService } from './sql-service.js';

export interface Services {
  config: Config;
  gateway: LLMGateway;
  chatModel: ChatModel;
  classifier: QueryClassifier;
  sqlService: SqlService;
  store: SqlStore;
  contextBuilder: RetrievalContextBuilder;
  registry: RequestRegistry;
  gate: ConcurrencyGate;
}

export interface ServiceOverrides {
  gateway?: LLMGateway;
  chatModel?: ChatModel;
}

export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const needsModel = !overrides.gateway || !overrides.chatModel;
  const model = needsModel ? createLanguageModel(config) : null;

  const gateway = overrides.gateway ?? new AiSdkGateway(requireModel(model));
  const chatModel = overrides.chatModel ?? new AiSdkChatModel(requireModel(model), config.LLM_MODEL);

  const classifier = QueryClassifier.create(gateway, {
    classifyTimeoutMs: config.CLASSIFY_TIMEOUT_MS,
    defaultTopK: config.DEFAULT_TOP_K,
    lookupTopK: config.LOOKUP_TOP_K,
  });
  const store = new SqlStore(config.DATABASE_PATH);
  const sqlService = new SqlService(
    new SqlGenerator(gateway, { timeoutMs: config.SQL_TIMEOUT_MS }),
    store
  );

  return {
    config,
    gateway,
    chatModel,
    classifier,
    sqlService,
    store,
    contextBuilder: new RetrievalContextBuilder(classifier, sqlService),
    registry: new RequestRegistry(),
    gate: new ConcurrencyGate(config.MAX_CONCURRENT_COMPLETIONS),
  };
}

function requireModel<T>(model: T | null): T {
  if (model === null) {
    throw new Error('Language model was not created');
  }
  return model;
}
