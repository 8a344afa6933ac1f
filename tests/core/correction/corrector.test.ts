import { describe, it, expect, vi } from 'vitest';
import { TranscriptCorrector, summarizeRun } from '../../../src/core/correction/corrector.js';
import { defaultConfig } from '../../../src/core/config.js';
import { segmentTranscript, serializeSegments } from '../../../src/core/segment/segmenter.js';
import type { LLMClient, LLMRequest, LLMResponse } from '../../../src/core/llm/client.js';
import type { CostSettings, LecfixConfig, LlmSettings } from '../../../src/core/types.js';

const TRANSCRIPT = '[0:00:00 - 0:00:05]\n申しすございす\n[0:00:05 - 0:00:10]\nベルトさんの話\n';

function makeConfig(overrides: { llm?: Partial<LlmSettings>; cost?: Partial<CostSettings> } = {}): LecfixConfig {
  const base = defaultConfig();
  return {
    ...base,
    llm: { ...base.llm, ...overrides.llm },
    cost: { ...base.cost, ...overrides.cost },
  };
}

class FakeClient implements LLMClient {
  requests: LLMRequest[] = [];
  constructor(private readonly reply: (request: LLMRequest) => Promise<LLMResponse | null>) {}

  async correct(request: LLMRequest): Promise<LLMResponse | null> {
    this.requests.push(request);
    return this.reply(request);
  }
}

function replyWith(text: string): FakeClient {
  return new FakeClient(async () => ({ text, inputTokens: 100, outputTokens: 50 }));
}

function fakeLogger() {
  return { info: vi.fn(), warn: vi.fn() };
}

describe('TranscriptCorrector', () => {
  it('should correct every segment in source order with rules only', async () => {
    const corrector = new TranscriptCorrector(makeConfig());
    const run = await corrector.processTranscript(TRANSCRIPT);

    expect(run.aborted).toBe(false);
    expect(run.segments.map(s => s.id)).toEqual([1, 2]);
    expect(run.segments[0]).toMatchObject({
      start_time: '0:00:00',
      end_time: '0:00:05',
      original_text: '申しすございす',
      corrected_text: '申します。ございます。',
      applied_corrections: ['ending fix', 'ending fix', 'punctuation'],
      llm_used: false,
    });
    expect(run.segments[0].quality_score).toBeCloseTo(0.75);
    expect(run.segments[1].corrected_text).toBe('ベルトンさんの話');
    expect(run.segments[1].quality_score).toBeCloseTo(0.8);
  });

  it('should escalate flagged segments and boost their score', async () => {
    const client = replyWith('ベルトン先生の話');
    const corrector = new TranscriptCorrector(makeConfig({ llm: { enabled: true } }), { llmClient: client });

    const run = await corrector.processTranscript(TRANSCRIPT);
    const [first, second] = run.segments;

    expect(client.requests).toHaveLength(1);
    expect(first.llm_used).toBe(false);
    expect(second).toMatchObject({
      corrected_text: 'ベルトン先生の話',
      applied_corrections: ['technical term', 'context correction'],
      quality_score: 1,
      llm_used: true,
    });
    expect(run.accounting.total_input_tokens).toBe(100);
    expect(run.accounting.total_output_tokens).toBe(50);
  });

  it('should not escalate above the use threshold', async () => {
    const client = replyWith('ベルトン先生の話');
    const corrector = new TranscriptCorrector(
      makeConfig({ llm: { enabled: true, useThreshold: 0.5 } }),
      { llmClient: client },
    );

    const run = await corrector.processTranscript(TRANSCRIPT);

    expect(client.requests).toHaveLength(0);
    expect(run.segments[1].llm_used).toBe(false);
  });

  it('should keep the rule result when the service fails', async () => {
    const client = new FakeClient(async () => {
      throw new Error('timeout');
    });
    const logger = fakeLogger();
    const corrector = new TranscriptCorrector(makeConfig({ llm: { enabled: true } }), { llmClient: client, logger });

    const run = await corrector.processTranscript(TRANSCRIPT);

    expect(run.segments[1]).toMatchObject({ corrected_text: 'ベルトンさんの話', llm_used: false });
    expect(logger.warn).toHaveBeenCalledWith('LLM correction failed: timeout');
  });

  it('should stop escalating once the cost ceiling is reached', async () => {
    const client = replyWith('ベルトン先生の話');
    const logger = fakeLogger();
    const corrector = new TranscriptCorrector(
      makeConfig({ llm: { enabled: true }, cost: { maxCostPerSession: 0 } }),
      { llmClient: client, logger },
    );

    const run = await corrector.processTranscript(
      '[0:00:00 - 0:00:05]\nベルトさんの話\n[0:00:05 - 0:00:10]\nベルトさんの本\n',
    );

    expect(client.requests).toHaveLength(0);
    expect(run.segments.every(s => !s.llm_used)).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Cost ceiling of 0 JPY reached; skipping further LLM escalation');
  });

  it('should warn once when the alert threshold is passed', async () => {
    const logger = fakeLogger();
    const corrector = new TranscriptCorrector(
      makeConfig({ llm: { enabled: true }, cost: { alertThreshold: 0.01 } }),
      { llmClient: replyWith('修正済みの文'), logger },
    );

    await corrector.processTranscript('[0:00:00 - 0:00:05]\nベルトさんの話\n[0:00:05 - 0:00:10]\nベルトさんの本\n');

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('alert threshold of 0.01 JPY'));
  });

  it('should return only finished segments when cancelled', async () => {
    const controller = new AbortController();
    const client = new FakeClient(async () => {
      controller.abort();
      return { text: 'ベルトン先生の話', inputTokens: 1, outputTokens: 1 };
    });
    const corrector = new TranscriptCorrector(makeConfig({ llm: { enabled: true } }), { llmClient: client });

    const run = await corrector.processTranscript(
      '[0:00:00 - 0:00:05]\nベルトさんの話\n[0:00:05 - 0:00:10]\n申しすございす\n',
      { signal: controller.signal },
    );

    expect(run.aborted).toBe(true);
    expect(run.segments).toHaveLength(1);
    expect(run.segments[0].llm_used).toBe(true);
  });

  it('should do nothing when cancelled up front', async () => {
    const controller = new AbortController();
    controller.abort();

    const run = await new TranscriptCorrector(makeConfig()).processTranscript(TRANSCRIPT, { signal: controller.signal });

    expect(run).toMatchObject({ segments: [], aborted: true });
  });

  it('should fall back to rules when the LLM is enabled without a key', () => {
    const logger = fakeLogger();
    TranscriptCorrector.fromConfig(makeConfig({ llm: { enabled: true, apiKey: undefined } }), logger);

    expect(logger.warn).toHaveBeenCalledWith('LLM correction enabled but no API key configured; using rules only');
  });
});

describe('summarizeRun', () => {
  it('should aggregate quality, usage and cost in the display currency', async () => {
    const corrector = new TranscriptCorrector(
      makeConfig({ llm: { enabled: true } }),
      { llmClient: replyWith('ベルトン先生の話') },
    );
    const run = await corrector.processTranscript(TRANSCRIPT);

    const stats = summarizeRun(run.segments, run.accounting, 150, new Date('2026-01-01T00:00:00Z'));

    expect(stats).toMatchObject({
      total_segments: 2,
      llm_usage: 1,
      high_quality_count: 2,
      input_tokens: 100,
      output_tokens: 50,
      processing_timestamp: '2026-01-01T00:00:00.000Z',
    });
    expect(stats.average_quality).toBeCloseTo(0.875);
    expect(stats.total_cost).toBeCloseTo(0.0525);
  });

  it('should keep a unit whose text the rules would remove entirely', async () => {
    const corrector = new TranscriptCorrector(makeConfig());
    const run = await corrector.processTranscript('[0:00:01 - 0:00:05]\nえーっと\n[0:00:05 - 0:00:09]\nベルトさんの話\n');

    expect(run.segments[0]).toMatchObject({ corrected_text: 'えーっと', applied_corrections: [] });
    expect(run.segments[0].quality_score).toBeCloseTo(0.6);

    const again = segmentTranscript(serializeSegments(run.segments));
    expect(again.segments).toEqual(run.segments.map(s => ({
      id: s.id,
      start_time: s.start_time,
      end_time: s.end_time,
      text: s.corrected_text,
    })));
  });

  it('should return zeros for an empty transcript', async () => {
    const corrector = new TranscriptCorrector(makeConfig());
    const run = await corrector.processTranscript('');

    expect(run.segments).toEqual([]);
    expect(summarizeRun(run.segments, run.accounting, 150)).toMatchObject({
      total_segments: 0,
      llm_usage: 0,
      average_quality: 0,
      high_quality_count: 0,
      total_cost: 0,
      input_tokens: 0,
      output_tokens: 0,
    });
  });
});
