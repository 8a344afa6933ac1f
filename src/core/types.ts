export type CorrectionCategory =
  | 'technical term'
  | 'ending fix'
  | 'repetition removal'
  | 'filler removal'
  | 'naturalization'
  | 'punctuation'
  | 'context correction';

export const RULE_CATEGORIES = [
  'technical term',
  'ending fix',
  'repetition removal',
  'filler removal',
  'naturalization',
  'punctuation',
] as const satisfies readonly CorrectionCategory[];

export type StageName =
  | 'technicalTerms'
  | 'endingFixes'
  | 'repetitionRemoval'
  | 'fillerRemoval'
  | 'naturalization'
  | 'punctuation'
  | 'normalization';

export type StageToggles = Record<StageName, boolean>;

export type ScoringVariant = 'refined' | 'simple';

export const SENTINEL_TIME = '00:00:00';

export interface RawSegment {
  id: number;
  start_time: string;
  end_time: string;
  text: string;
}

export interface Segment {
  readonly id: number;
  readonly start_time: string;
  readonly end_time: string;
  readonly original_text: string;
  readonly corrected_text: string;
  readonly applied_corrections: readonly CorrectionCategory[];
  readonly quality_score: number;
  readonly llm_used: boolean;
}

export interface CorrectionRule {
  pattern: RegExp;
  replacement: string;
  category: CorrectionCategory;
}

export interface RunStatistics {
  total_segments: number;
  llm_usage: number;
  average_quality: number;
  high_quality_count: number;
  total_cost: number;
  input_tokens: number;
  output_tokens: number;
  processing_timestamp: string;
}

export interface CustomPatterns {
  techTerms: Record<string, string>;
  organizationNames: Record<string, string>;
  productNames: Record<string, string>;
}

export interface LlmSettings {
  enabled: boolean;
  apiKey?: string;
  model: string;
  domain: string;
  temperature: number;
  topP: number;
  maxTokens: number;
  useThreshold: number;
  inputRatePer1k: number;
  outputRatePer1k: number;
}

export interface CostSettings {
  currency: string;
  currencyRate: number;
  maxCostPerSession: number;
  alertThreshold: number;
}

export interface LecfixConfig {
  dbPath: string;
  stages: StageToggles;
  llm: LlmSettings;
  cost: CostSettings;
  scoring: {
    variant: ScoringVariant;
  };
  customPatterns: CustomPatterns;
}

export const DEFAULT_STAGES: StageToggles = {
  technicalTerms: true,
  endingFixes: true,
  repetitionRemoval: true,
  fillerRemoval: true,
  naturalization: true,
  punctuation: true,
  normalization: true,
};

export const DEFAULT_CONFIG: Omit<LecfixConfig, 'dbPath'> = {
  stages: DEFAULT_STAGES,
  llm: {
    enabled: false,
    model: 'claude-haiku-4-5-20251001',
    domain: '大規模言語モデル（LLM）講座',
    temperature: 0.1,
    topP: 0.9,
    maxTokens: 1000,
    useThreshold: 1.0,
    // USD per 1,000 tokens
    inputRatePer1k: 0.001,
    outputRatePer1k: 0.005,
  },
  cost: {
    currency: 'JPY',
    currencyRate: 150,
    maxCostPerSession: 100,
    alertThreshold: 50,
  },
  scoring: {
    variant: 'refined',
  },
  customPatterns: {
    techTerms: {},
    organizationNames: {},
    productNames: {},
  },
};
