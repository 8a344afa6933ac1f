// Core types
export * from './types.js';

// Logging
export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Database
export { RunRepository } from './db/repository.js';
export type { RunRecord } from './db/repository.js';

// Segmentation
export { segmentTranscript, serializeSegments, formatHeader } from './segment/index.js';
export type { SegmentationResult, ParseWarning } from './segment/index.js';

// Corrections
export {
  correctText, runStage, normalizeText,
  buildRuleSet, rulesFor, customTermRules, literalRule,
  TranscriptCorrector, summarizeRun,
} from './correction/index.js';
export type { RuleCorrectionResult, RuleSet, RuleStage, CorrectorOptions, ProcessOptions, TranscriptResult } from './correction/index.js';

// Scoring
export { scoreQuality, detectObviousImprovement, detectDeterioration } from './scoring/index.js';

// Escalation
export { needsEscalation, findEscalationTriggers } from './escalation/index.js';
export type { EscalationTrigger } from './escalation/index.js';

// LLM
export {
  NullLLMClient, AnthropicLLMClient, RunAccounting, LLMCorrectionAdapter,
  buildCorrectionInstruction, parseReply,
} from './llm/index.js';
export type { LLMClient, LLMRequest, LLMResponse, EscalationResult } from './llm/index.js';

// Analysis
export {
  analyzeTranscripts, detectCorrectionTypes, readabilityScore, significantChanges,
  generateReport, evaluationTier, similarityRatio, levenshteinDistance,
} from './analysis/index.js';
export type { TranscriptAnalysis, SegmentAnalysis, PairingMode, PairingInfo, EvaluationTier } from './analysis/index.js';

// Batch
export { processDirectory, correctedFileName } from './batch/index.js';
export type { BatchResult, BatchFailure } from './batch/index.js';

// Config
export { resolveConfig, saveConfig, defaultConfig, getConfigDir, getDbPath, ensureConfigDir, ConfigError } from './config.js';
