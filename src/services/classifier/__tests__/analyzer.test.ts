import { describe, it, expect } from 'vitest';
import { QueryAnalyzer, fallbackAnalysis } from '../analyzer.js';
import { TimeoutError } from '../../../types/errors.js';
import { ScriptedGateway } from '../../../test/stand-ins.js';

function analyzer(gateway: ScriptedGateway): QueryAnalyzer {
  return new QueryAnalyzer(gateway, { timeoutMs: 1000 });
}

describe('QueryAnalyzer', () => {
  it('maps the model reply', async () => {
    const gateway = new ScriptedGateway([
      JSON.stringify({
        intent: 'data statistics',
        entities: { region: 'Seoul', year: 2024, month: null },
        keywords: ['sales', 'statistics'],
        question_type: 'aggregation',
        confidence: 0.9,
      }),
    ]);

    await expect(analyzer(gateway).analyze('2024 Seoul sales statistics')).resolves.toEqual({
      intent: 'data statistics',
      entities: { region: 'Seoul', year: 2024, month: null },
      keywords: ['sales', 'statistics'],
      questionType: 'aggregation',
      confidence: 0.9,
    });
  });

  it('calls the gateway with analysis settings', async () => {
    const gateway = new ScriptedGateway(['{}']);
    await analyzer(gateway).analyze('show me "$&" records');

    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].options).toEqual({ maxTokens: 300, temperature: 0.1, timeoutMs: 1000 });
    expect(gateway.calls[0].prompt).toContain('User question: "show me "$&" records"');
  });

  it('fills defaults for missing and malformed fields', async () => {
    const gateway = new ScriptedGateway([
      '```json\n{"entities": [1], "keywords": ["a", 3, ""], "question_type": "weird", "confidence": 7}\n```',
    ]);

    await expect(analyzer(gateway).analyze('anything')).resolves.toEqual({
      intent: 'unknown',
      entities: {},
      keywords: ['a'],
      questionType: 'general',
      confidence: 1,
    });
  });

  it('falls back to keyword matching when the model times out', async () => {
    const gateway = new ScriptedGateway([new TimeoutError(1000)]);

    await expect(analyzer(gateway).analyze('지난달 매출 통계 보여줘')).resolves.toEqual({
      intent: 'unknown',
      entities: {},
      keywords: ['통계'],
      questionType: 'general',
      confidence: 0.3,
    });
  });

  it('falls back when the reply is not JSON', async () => {
    const gateway = new ScriptedGateway(['I think this is about data']);
    const result = await analyzer(gateway).analyze('hello');
    expect(result).toEqual(fallbackAnalysis('hello'));
  });
});

describe('fallbackAnalysis', () => {
  it('keeps keywords in list order', () => {
    expect(fallbackAnalysis('내역 검색 데이터').keywords).toEqual(['데이터', '검색', '내역']);
  });

  it('finds nothing in small talk', () => {
    expect(fallbackAnalysis('안녕하세요').keywords).toEqual([]);
  });
});
