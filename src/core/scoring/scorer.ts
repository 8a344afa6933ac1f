import { duplicatePhrasePatterns } from '../correction/rules.js';
import type { CorrectionCategory, ScoringVariant } from '../types.js';

const REFINED_BASE = 0.5;
const SIMPLE_BASE = 0.3;
const SIMPLE_BONUS_PER_CATEGORY = 0.2;
const SIMPLE_BONUS_CAP = 0.7;

export const REFINED_WEIGHTS: Partial<Record<CorrectionCategory, number>> = {
  'technical term': 0.2,
  'repetition removal': 0.15,
  'ending fix': 0.15,
  'punctuation': 0.1,
  'naturalization': 0.1,
  'filler removal': 0.05,
};

interface ImprovementPattern {
  bad: RegExp;
  fixed: (match: RegExpMatchArray, corrected: string) => boolean;
}

const OBVIOUS_IMPROVEMENTS: readonly ImprovementPattern[] = [
  // duplicated phrase collapsed
  ...duplicatePhrasePatterns('u').map(bad => ({
    bad,
    fixed: (m: RegExpMatchArray, corrected: string) => !corrected.includes(m[0]) && corrected.includes(m[1]),
  })),
  // a sentence boundary gained its full stop
  {
    bad: /ます([\p{Script=Han}\p{Script=Katakana}A-Za-z])/u,
    fixed: (m, corrected) => corrected.includes(`ます。${m[1]}`),
  },
  // hedge softened into written register
  { bad: /かなと思っている/u, fixed: (_m, corrected) => corrected.includes('かと思') },
];

const TRUNCATION_GUARDS: readonly { phrase: string; truncated: RegExp }[] = [
  { phrase: 'ありがとうございます', truncated: /(?<!あ)りがとうございます/u },
  { phrase: 'よろしくお願いします', truncated: /(?<!よ)ろしくお願いします/u },
];

export const IMPORTANT_KEYWORDS = ['講師', '講座', '皆さん', '研究室'] as const;

export function charLength(text: string): number {
  return [...text].length;
}

export function clampScore(score: number): number {
  return Math.min(Math.max(score, 0), 1);
}

export function detectObviousImprovement(original: string, corrected: string): boolean {
  return OBVIOUS_IMPROVEMENTS.some(({ bad, fixed }) => {
    const match = original.match(bad);
    return match !== null && fixed(match, corrected);
  });
}

export function detectDeterioration(original: string, corrected: string): boolean {
  for (const { phrase, truncated } of TRUNCATION_GUARDS) {
    if (original.includes(phrase) && truncated.test(corrected)) return true;
  }

  return IMPORTANT_KEYWORDS.some(word => original.includes(word) && !corrected.includes(word));
}

function categoryBonus(categories: readonly CorrectionCategory[], variant: ScoringVariant): number {
  const distinct = new Set(categories);

  if (variant === 'simple') {
    return Math.min(distinct.size * SIMPLE_BONUS_PER_CATEGORY, SIMPLE_BONUS_CAP);
  }

  let bonus = 0;
  for (const category of distinct) {
    bonus += REFINED_WEIGHTS[category] ?? 0;
  }
  return bonus;
}

function lengthAdjustment(original: string, corrected: string): number {
  const ratio = charLength(corrected) / Math.max(charLength(original), 1);
  if (ratio >= 0.7 && ratio <= 1.3) return 0.1;
  if (ratio < 0.5) return -0.2;
  return 0;
}

/**
 * Heuristic [0,1] estimate of how much a correction helped.
 * `refined` weights categories individually; `simple` counts distinct categories.
 */
export function scoreQuality(
  original: string,
  corrected: string,
  categories: readonly CorrectionCategory[],
  variant: ScoringVariant = 'refined',
): number {
  let score = variant === 'simple' ? SIMPLE_BASE : REFINED_BASE;

  score += categoryBonus(categories, variant);
  score += lengthAdjustment(original, corrected);

  if (detectObviousImprovement(original, corrected)) score += 0.15;
  if (detectDeterioration(original, corrected)) score -= 0.3;

  return clampScore(score);
}
