import { buildRuleSet, duplicatePhrasePatterns, rulesFor, type RuleSet } from '../correction/rules.js';
import { charLength, scoreQuality } from '../scoring/scorer.js';
import { formatHeader, segmentTranscript } from '../segment/segmenter.js';
import { RULE_CATEGORIES, type CorrectionRule, type CustomPatterns, type RawSegment } from '../types.js';
import { similarityRatio } from './similarity.js';

export type RuleCategory = (typeof RULE_CATEGORIES)[number];
export type PairingMode = 'position' | 'timestamp';
export type QualityBucket = 'excellent' | 'good' | 'fair' | 'poor';

export interface SegmentAnalysis {
  segment_id: number;
  timestamp: string;
  original_length: number;
  corrected_length: number;
  corrections: RuleCategory[];
  quality_score: number;
  readability_improvement: number;
  text_similarity: number;
  original_preview: string;
  corrected_preview: string;
  significant_changes: string[];
}

export interface OverallMetrics {
  character_reduction: number;
  character_reduction_ratio: number;
  sentence_count_change: number;
  punctuation_density_improvement: number;
}

export interface PairingInfo {
  mode: PairingMode;
  original_segments: number;
  corrected_segments: number;
  analyzed_pairs: number;
  /** Position mode only: counts differed and the tail of the longer side was ignored. */
  truncated: boolean;
  unmatched_original: number;
  unmatched_corrected: number;
}

export interface TranscriptAnalysis {
  overall_metrics: OverallMetrics;
  segment_analysis: SegmentAnalysis[];
  correction_types: Record<RuleCategory, number>;
  quality_distribution: Record<QualityBucket, number>;
  pairing: PairingInfo;
}

export interface AnalyzeOptions {
  pairing?: PairingMode;
  customPatterns?: CustomPatterns;
}

const PREVIEW_LENGTH = 100;
const FILLERS = ['えー', 'あのー', 'なんか'];
const PROPER_TERMS = ['BERT', 'GPT', 'LLM', 'Transformer'];
const DUPLICATE_PHRASES = duplicatePhrasePatterns('gu');

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function countOccurrences(text: string, fragment: string): number {
  return text.split(fragment).length - 1;
}

export function sentenceCount(text: string): number {
  return text.split(/[。！？]/).filter(s => s.trim()).length;
}

function punctuationDensity(text: string): number {
  const length = charLength(text);
  return length > 0 ? countMatches(text, /[。、]/g) / length : 0;
}

/**
 * Re-detect which rule categories separate `original` from `corrected`: a
 * category counts when one of its rules matches fewer times after correction.
 * Punctuation also counts when 。 or 、 were added, since the polite endings it
 * keys on may only exist after the ending fixes.
 */
export function detectCorrectionTypes(
  original: string,
  corrected: string,
  ruleSet: RuleSet = buildRuleSet(),
): RuleCategory[] {
  const found = new Set<string>();

  for (const stage of ruleSet) {
    for (const { pattern, category } of stage.rules) {
      if (countMatches(corrected, pattern) < countMatches(original, pattern)) {
        found.add(category);
      }
    }
  }

  if (countMatches(corrected, /[。、]/g) > countMatches(original, /[。、]/g)) {
    found.add('punctuation');
  }

  return RULE_CATEGORIES.filter(category => found.has(category));
}

/**
 * Rough [0,1] readability estimate for Japanese prose: punctuation density,
 * sentence length, filler density, and properly written technical terms.
 */
export function readabilityScore(text: string): number {
  let score = 0;

  const density = punctuationDensity(text);
  if (density >= 0.02 && density <= 0.1) score += 0.3;

  const sentences = text.split(/[。！？]/).filter(s => s.trim());
  const averageLength = sentences.length > 0
    ? sentences.reduce((sum, s) => sum + charLength(s.trim()), 0) / sentences.length
    : 0;
  if (averageLength >= 20 && averageLength <= 80) score += 0.3;

  const fillerRatio = FILLERS.reduce((sum, f) => sum + countOccurrences(text, f), 0) / Math.max(charLength(text), 1);
  score += Math.max(0, 0.2 - fillerRatio * 10);

  score += Math.min(0.2, PROPER_TERMS.filter(term => text.includes(term)).length * 0.05);

  return Math.min(score, 1);
}

function termSubstitutions(original: string, corrected: string, rules: readonly CorrectionRule[]): string[] {
  const changes: string[] = [];

  for (const { pattern, replacement } of rules) {
    if (countMatches(corrected, pattern) >= countMatches(original, pattern)) continue;

    const [first] = original.matchAll(pattern);
    if (!first) continue;

    const fixed = first[0].replace(new RegExp(pattern.source, 'u'), replacement);
    if (fixed !== first[0] && corrected.includes(fixed)) {
      changes.push(`Term corrected: "${first[0]}" → "${fixed}"`);
    }
  }

  return changes;
}

export function significantChanges(
  original: string,
  corrected: string,
  ruleSet: RuleSet = buildRuleSet(),
): string[] {
  const changes: string[] = [];

  for (const pattern of DUPLICATE_PHRASES) {
    for (const match of original.matchAll(pattern)) {
      if (!corrected.includes(match[0]) && corrected.includes(match[1])) {
        changes.push(`Duplicate phrase removed: "${match[0]}" → "${match[1]}"`);
      }
    }
  }

  changes.push(...termSubstitutions(original, corrected, rulesFor(ruleSet, 'technicalTerms')));

  const before = sentenceCount(original);
  const after = sentenceCount(corrected);
  if (after > before) {
    changes.push(`Sentence segmentation improved (${before} → ${after} sentences)`);
  }

  return [...new Set(changes)];
}

export function overallMetrics(original: string, corrected: string): OverallMetrics {
  const originalLength = charLength(original);
  const reduction = originalLength - charLength(corrected);

  return {
    character_reduction: reduction,
    character_reduction_ratio: originalLength > 0 ? reduction / originalLength : 0,
    sentence_count_change: countMatches(corrected, /[。！？]/g) - countMatches(original, /[。！？]/g),
    punctuation_density_improvement: punctuationDensity(corrected) - punctuationDensity(original),
  };
}

export function qualityBucket(score: number): QualityBucket {
  if (score >= 0.8) return 'excellent';
  if (score >= 0.6) return 'good';
  if (score >= 0.4) return 'fair';
  return 'poor';
}

function preview(text: string): string {
  const chars = [...text];
  return chars.length > PREVIEW_LENGTH ? chars.slice(0, PREVIEW_LENGTH).join('') + '...' : text;
}

export function analyzeSegmentPair(
  original: RawSegment,
  corrected: RawSegment,
  segmentId: number,
  ruleSet: RuleSet = buildRuleSet(),
): SegmentAnalysis {
  const before = original.text;
  const after = corrected.text;
  const corrections = detectCorrectionTypes(before, after, ruleSet);

  return {
    segment_id: segmentId,
    timestamp: formatHeader(original.start_time, original.end_time),
    original_length: charLength(before),
    corrected_length: charLength(after),
    corrections,
    quality_score: scoreQuality(before, after, corrections, 'refined'),
    readability_improvement: readabilityScore(after) - readabilityScore(before),
    text_similarity: similarityRatio(before, after),
    original_preview: preview(before),
    corrected_preview: preview(after),
    significant_changes: significantChanges(before, after, ruleSet),
  };
}

function pairSegments(
  original: RawSegment[],
  corrected: RawSegment[],
  mode: PairingMode,
): { pairs: Array<[RawSegment, RawSegment]>; info: PairingInfo } {
  const pairs: Array<[RawSegment, RawSegment]> = [];

  if (mode === 'position') {
    const count = Math.min(original.length, corrected.length);
    for (let i = 0; i < count; i++) pairs.push([original[i], corrected[i]]);
  } else {
    const byTimestamp = new Map<string, RawSegment[]>();
    for (const segment of corrected) {
      const key = formatHeader(segment.start_time, segment.end_time);
      byTimestamp.set(key, [...(byTimestamp.get(key) ?? []), segment]);
    }
    for (const segment of original) {
      const match = byTimestamp.get(formatHeader(segment.start_time, segment.end_time))?.shift();
      if (match) pairs.push([segment, match]);
    }
  }

  return {
    pairs,
    info: {
      mode,
      original_segments: original.length,
      corrected_segments: corrected.length,
      analyzed_pairs: pairs.length,
      truncated: mode === 'position' && original.length !== corrected.length,
      unmatched_original: original.length - pairs.length,
      unmatched_corrected: corrected.length - pairs.length,
    },
  };
}

function emptyCategoryCounts(): Record<RuleCategory, number> {
  return {
    'technical term': 0,
    'ending fix': 0,
    'repetition removal': 0,
    'filler removal': 0,
    'naturalization': 0,
    'punctuation': 0,
  };
}

/**
 * Audit a finished correction by comparing the two transcripts segment by segment.
 */
export function analyzeTranscripts(
  originalContent: string,
  correctedContent: string,
  options: AnalyzeOptions = {},
): TranscriptAnalysis {
  const ruleSet = buildRuleSet(options.customPatterns);
  const { pairs, info } = pairSegments(
    segmentTranscript(originalContent).segments,
    segmentTranscript(correctedContent).segments,
    options.pairing ?? 'position',
  );

  const correctionTypes = emptyCategoryCounts();
  const distribution: Record<QualityBucket, number> = { excellent: 0, good: 0, fair: 0, poor: 0 };

  const segmentAnalysis = pairs.map(([original, corrected], i) => {
    const analysis = analyzeSegmentPair(original, corrected, i + 1, ruleSet);
    for (const category of analysis.corrections) correctionTypes[category] += 1;
    distribution[qualityBucket(analysis.quality_score)] += 1;
    return analysis;
  });

  return {
    overall_metrics: overallMetrics(originalContent, correctedContent),
    segment_analysis: segmentAnalysis,
    correction_types: correctionTypes,
    quality_distribution: distribution,
    pairing: info,
  };
}
