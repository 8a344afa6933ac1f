import type { QualityBucket, SegmentAnalysis, TranscriptAnalysis } from './diff-analyzer.js';

export type EvaluationTier = 'excellent' | 'good' | 'fair' | 'needs work';

const EXEMPLAR_QUALITY = 0.7;
const EXEMPLAR_COUNT = 3;
const RULE = '='.repeat(60);

const TIER_TEXT: Record<EvaluationTier, { label: string; recommendation: string }> = {
  'excellent': { label: 'Excellent: ready for use', recommendation: 'Use as is' },
  'good': { label: 'Good: usable', recommendation: 'Minor tuning of the rule dictionaries' },
  'fair': { label: 'Fair: room for improvement', recommendation: 'Review configuration and custom terms' },
  'needs work': { label: 'Needs work', recommendation: 'Rework the correction setup' },
};

const BUCKET_LABELS: ReadonlyArray<[QualityBucket, string]> = [
  ['excellent', 'Excellent (0.8+)'],
  ['good', 'Good (0.6+)'],
  ['fair', 'Fair (0.4+)'],
  ['poor', 'Poor'],
];

export function evaluationTier(averageQuality: number): EvaluationTier {
  if (averageQuality >= 0.7) return 'excellent';
  if (averageQuality >= 0.5) return 'good';
  if (averageQuality >= 0.3) return 'fair';
  return 'needs work';
}

function average(segments: readonly SegmentAnalysis[], pick: (s: SegmentAnalysis) => number): number {
  return segments.length > 0 ? segments.reduce((sum, s) => sum + pick(s), 0) / segments.length : 0;
}

function percent(count: number, total: number): string {
  return `${((count / total) * 100).toFixed(1)}%`;
}

function describePairing(analysis: TranscriptAnalysis): string {
  const p = analysis.pairing;
  if (p.mode === 'timestamp') {
    return `timestamp (${p.unmatched_original} original / ${p.unmatched_corrected} corrected unmatched)`;
  }
  return p.truncated
    ? `position (segment counts differ: ${p.original_segments} vs ${p.corrected_segments}; extra segments ignored)`
    : 'position';
}

export function generateReport(analysis: TranscriptAnalysis): string {
  const segments = analysis.segment_analysis;
  const total = segments.length;
  if (total === 0) {
    return 'No segments could be analysed.';
  }

  const avgQuality = average(segments, s => s.quality_score);
  const avgReadability = average(segments, s => s.readability_improvement);
  const metrics = analysis.overall_metrics;
  const tier = TIER_TEXT[evaluationTier(avgQuality)];

  const lines: string[] = [
    'Transcript Correction Quality Report',
    RULE,
    '',
    'Overall:',
    `  Segments analysed: ${total}`,
    `  Pairing: ${describePairing(analysis)}`,
    `  Average quality: ${avgQuality.toFixed(3)} / 1.000`,
    `  Average readability change: ${avgReadability.toFixed(3)}`,
    `  Characters removed: ${metrics.character_reduction}`,
    `  Punctuation density change: ${metrics.punctuation_density_improvement.toFixed(4)}`,
    '',
    'Quality distribution:',
  ];

  for (const [bucket, label] of BUCKET_LABELS) {
    const count = analysis.quality_distribution[bucket];
    lines.push(`  ${label}: ${count} (${percent(count, total)})`);
  }

  lines.push('', 'Correction types:');
  for (const [category, count] of Object.entries(analysis.correction_types)) {
    lines.push(`  ${category}: ${count}`);
  }

  const exemplars = segments.filter(s => s.quality_score >= EXEMPLAR_QUALITY).slice(0, EXEMPLAR_COUNT);
  if (exemplars.length > 0) {
    lines.push('', 'Exemplar segments:');
    for (const s of exemplars) {
      const changes = s.significant_changes.length > 0 ? s.significant_changes.join(', ') : 'minor refinements';
      lines.push(
        `  Segment ${s.segment_id} (quality ${s.quality_score.toFixed(3)}) ${s.timestamp}`,
        `    Changes: ${changes}`,
        `    Before: ${s.original_preview}`,
        `    After:  ${s.corrected_preview}`,
      );
    }
  }

  lines.push(
    '',
    'Evaluation:',
    `  Rating: ${tier.label}`,
    `  Recommendation: ${tier.recommendation}`,
  );

  return lines.join('\n');
}
