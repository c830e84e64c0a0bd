import { describe, it, expect } from 'vitest';
import { FALLBACK_REASON, QueryClassifier } from '../index.js';
import { TimeoutError } from '../../../types/errors.js';
import { ScriptedGateway } from '../../../test/stand-ins.js';

const OPTIONS = { classifyTimeoutMs: 1000, defaultTopK: 30, lookupTopK: 50 };

describe('QueryClassifier', () => {
  it('runs the three layers in order', async () => {
    const gateway = new ScriptedGateway([
      '{"intent": "record lookup", "entities": {"region": "Daegu"}, "keywords": ["events"], "question_type": "lookup", "confidence": 0.8}',
      '{"is_domain_related": true, "requires_retrieval": true, "confidence": 0.9, "reason": "needs records"}',
    ]);

    const result = await QueryClassifier.create(gateway, OPTIONS).classify('events in Daegu');

    expect(gateway.calls).toHaveLength(2);
    expect(gateway.calls[0].prompt).toContain('expert at analyzing');
    expect(gateway.calls[1].prompt).toContain('- intent: record lookup');
    expect(result.useRetrieval).toBe(true);
    expect(result.config.searchQuery).toBe('Daegu events in Daegu');
    expect(result.debugInfo).toEqual({
      layer1_analysis: {
        intent: 'record lookup',
        entities: { region: 'Daegu' },
        keywords: ['events'],
        question_type: 'lookup',
        confidence: 0.8,
      },
      layer2_decision: {
        is_domain_related: true,
        requires_retrieval: true,
        confidence: 0.9,
        reason: 'needs records',
      },
      layer3_config: {
        use_retrieval: true,
        search_method: 'sql',
        result_cap: 50,
        score_threshold: 0.7,
        search_query: 'Daegu events in Daegu',
      },
    });
  });

  it('skips retrieval for small talk', async () => {
    const gateway = new ScriptedGateway([
      '{"intent": "greeting", "entities": {}, "keywords": [], "question_type": "general", "confidence": 0.95}',
      '{"is_domain_related": false, "requires_retrieval": false, "confidence": 0.95, "reason": "greeting"}',
    ]);

    const result = await QueryClassifier.create(gateway, OPTIONS).classify('안녕하세요');
    expect(result.useRetrieval).toBe(false);
    expect(result.config.searchMethod).toBe('none');
    expect(result.debugInfo.layer3_config.search_query).toBe('');
  });

  it('completes on fallbacks when the endpoint is down', async () => {
    const gateway = new ScriptedGateway([new TimeoutError(1000), new TimeoutError(1000)]);

    const result = await QueryClassifier.create(gateway, OPTIONS).classify('지난달 매출 통계 보여줘');

    // fallback analysis is "general", so the rule fallback declines retrieval
    expect(result.useRetrieval).toBe(false);
    expect(result.debugInfo.layer1_analysis.keywords).toEqual(['통계']);
    expect(result.debugInfo.layer2_decision.reason).toBe(FALLBACK_REASON);
  });
});
