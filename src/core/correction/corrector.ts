import { needsEscalation } from '../escalation/gate.js';
import { RunAccounting } from '../llm/accounting.js';
import { LLMCorrectionAdapter } from '../llm/adapter.js';
import { AnthropicLLMClient, NullLLMClient, type LLMClient } from '../llm/client.js';
import { silentLogger, type Logger } from '../logger.js';
import { clampScore, scoreQuality } from '../scoring/scorer.js';
import { segmentTranscript, type ParseWarning } from '../segment/segmenter.js';
import type { LecfixConfig, RawSegment, RunStatistics, Segment } from '../types.js';
import { correctText, type RuleCorrectionResult } from './pipeline.js';
import { buildRuleSet, type RuleSet } from './rules.js';

const LLM_SCORE_BOOST = 0.3;
const HIGH_QUALITY = 0.7;

export interface CorrectorOptions {
  llmClient?: LLMClient;
  logger?: Logger;
}

export interface ProcessOptions {
  signal?: AbortSignal;
  accounting?: RunAccounting;
}

export interface TranscriptResult {
  segments: Segment[];
  warnings: ParseWarning[];
  accounting: RunAccounting;
  aborted: boolean;
}

type CorrectorConfig = Pick<LecfixConfig, 'stages' | 'llm' | 'cost' | 'scoring' | 'customPatterns'>;

/**
 * Segment-by-segment correction: rules, pre-score, escalation gate, optional
 * LLM pass, final score.
 */
export class TranscriptCorrector {
  private readonly ruleSet: RuleSet;
  private readonly adapter: LLMCorrectionAdapter | null;
  private readonly logger: Logger;

  constructor(private readonly config: CorrectorConfig, options: CorrectorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.ruleSet = buildRuleSet(config.customPatterns);

    const client = config.llm.enabled ? options.llmClient ?? new NullLLMClient() : null;
    this.adapter = client ? new LLMCorrectionAdapter(client, config.llm, this.logger) : null;
  }

  /**
   * Corrector backed by the Anthropic client when the config enables the LLM
   * and carries an API key; rules only otherwise.
   */
  static fromConfig(config: CorrectorConfig, logger: Logger = silentLogger): TranscriptCorrector {
    const apiKey = config.llm.apiKey;
    if (config.llm.enabled && !apiKey) {
      logger.warn('LLM correction enabled but no API key configured; using rules only');
    }

    const llmClient = config.llm.enabled && apiKey
      ? new AnthropicLLMClient(apiKey, config.llm.model)
      : undefined;

    return new TranscriptCorrector(
      { ...config, llm: { ...config.llm, enabled: llmClient !== undefined } },
      { llmClient, logger },
    );
  }

  get currencyRate(): number {
    return this.config.cost.currencyRate;
  }

  createAccounting(): RunAccounting {
    return new RunAccounting(this.config.llm);
  }

  /** Display-currency cost of everything recorded so far. */
  displayCost(accounting: RunAccounting): number {
    return accounting.total_cost * this.currencyRate;
  }

  async correctSegment(
    raw: RawSegment,
    accounting: RunAccounting,
    allowEscalation = true,
  ): Promise<Segment> {
    const ruled = correctText(raw.text, this.ruleSet, this.config.stages);
    // An emptied unit would serialize as a bare header and vanish on re-segmentation
    const { text, corrections }: RuleCorrectionResult = ruled.text.trim()
      ? ruled
      : { text: raw.text, corrections: [] };
    const variant = this.config.scoring.variant;
    let quality = scoreQuality(raw.text, text, corrections, variant);
    let corrected = text;
    let llmUsed = false;

    if (
      this.adapter &&
      allowEscalation &&
      quality <= this.config.llm.useThreshold &&
      needsEscalation(text)
    ) {
      const result = await this.adapter.escalate(text, accounting);
      if (result.used) {
        corrected = result.text;
        corrections.push('context correction');
        quality = clampScore(quality + LLM_SCORE_BOOST);
        llmUsed = true;
      }
    }

    return {
      id: raw.id,
      start_time: raw.start_time,
      end_time: raw.end_time,
      original_text: raw.text,
      corrected_text: corrected,
      applied_corrections: corrections,
      quality_score: quality,
      llm_used: llmUsed,
    };
  }

  async processTranscript(text: string, options: ProcessOptions = {}): Promise<TranscriptResult> {
    const { segments: raw, warnings } = segmentTranscript(text);
    const accounting = options.accounting ?? this.createAccounting();
    const segments: Segment[] = [];
    const { maxCostPerSession, alertThreshold, currency } = this.config.cost;

    for (const warning of warnings) {
      this.logger.warn(`Segment ${warning.segmentId}: ${warning.message}`);
    }

    let ceilingReported = false;
    let alertReported = false;

    for (const unit of raw) {
      if (options.signal?.aborted) {
        this.logger.warn(`Cancelled after ${segments.length} of ${raw.length} segments`);
        return { segments, warnings, accounting, aborted: true };
      }

      const withinBudget = this.displayCost(accounting) < maxCostPerSession;
      if (!withinBudget && this.adapter && !ceilingReported) {
        this.logger.warn(`Cost ceiling of ${maxCostPerSession} ${currency} reached; skipping further LLM escalation`);
        ceilingReported = true;
      }

      segments.push(await this.correctSegment(unit, accounting, withinBudget));

      if (!alertReported && this.displayCost(accounting) >= alertThreshold && accounting.calls > 0) {
        this.logger.warn(
          `LLM cost ${this.displayCost(accounting).toFixed(2)} ${currency} passed the alert threshold of ${alertThreshold} ${currency}`,
        );
        alertReported = true;
      }
    }

    return { segments, warnings, accounting, aborted: false };
  }
}

/**
 * Aggregate statistics for a run. Empty input yields zeros throughout.
 */
export function summarizeRun(
  segments: readonly Segment[],
  accounting: RunAccounting,
  currencyRate: number,
  now: Date = new Date(),
): RunStatistics {
  const total = segments.length;
  const qualitySum = segments.reduce((sum, s) => sum + s.quality_score, 0);

  return {
    total_segments: total,
    llm_usage: segments.filter(s => s.llm_used).length,
    average_quality: total > 0 ? qualitySum / total : 0,
    high_quality_count: segments.filter(s => s.quality_score > HIGH_QUALITY).length,
    total_cost: accounting.total_cost * currencyRate,
    input_tokens: accounting.total_input_tokens,
    output_tokens: accounting.total_output_tokens,
    processing_timestamp: now.toISOString(),
  };
}
