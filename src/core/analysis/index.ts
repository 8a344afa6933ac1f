export {
  analyzeTranscripts, analyzeSegmentPair, detectCorrectionTypes,
  readabilityScore, significantChanges, overallMetrics, qualityBucket, sentenceCount,
} from './diff-analyzer.js';
export type {
  TranscriptAnalysis, SegmentAnalysis, OverallMetrics, PairingInfo, PairingMode,
  QualityBucket, RuleCategory, AnalyzeOptions,
} from './diff-analyzer.js';
export { generateReport, evaluationTier } from './report.js';
export type { EvaluationTier } from './report.js';
export { levenshteinDistance, similarityRatio } from './similarity.js';
