import { DEFAULT_STAGES, type CorrectionCategory, type CorrectionRule, type StageToggles } from '../types.js';
import { buildRuleSet, type RuleSet } from './rules.js';

export interface RuleCorrectionResult {
  text: string;
  corrections: CorrectionCategory[];
}

const JAPANESE = '[\\p{Script=Han}\\p{Script=Hiragana}\\p{Script=Katakana}ー]';
const SPACE_BETWEEN_JAPANESE = new RegExp(`(?<=${JAPANESE})\\s+(?=${JAPANESE})`, 'gu');

let defaultRuleSet: RuleSet | undefined;

function getDefaultRuleSet(): RuleSet {
  defaultRuleSet ??= buildRuleSet();
  return defaultRuleSet;
}

/**
 * Apply every rule of one stage in order. A rule that rewrites the text
 * appends its category once, however many places it matched.
 */
export function runStage(
  text: string,
  rules: readonly CorrectionRule[],
  log: CorrectionCategory[],
): string {
  let current = text;
  for (const { pattern, replacement, category } of rules) {
    const next = current.replace(pattern, replacement);
    if (next !== current) {
      current = next;
      log.push(category);
    }
  }
  return current;
}

export function normalizeText(text: string): string {
  return text
    .replace(/\s{2,}/g, ' ')
    .replace(SPACE_BETWEEN_JAPANESE, '')
    .replace(/\s*([。、！？])/g, '$1')
    .trim();
}

/**
 * Rule-based correction: technical terms -> endings -> repetition -> fillers ->
 * naturalization -> punctuation -> normalization. Punctuation relies on the
 * endings having been completed first.
 */
export function correctText(
  text: string,
  ruleSet: RuleSet = getDefaultRuleSet(),
  stages: StageToggles = DEFAULT_STAGES,
): RuleCorrectionResult {
  const corrections: CorrectionCategory[] = [];
  let corrected = text;

  for (const stage of ruleSet) {
    if (!stages[stage.name]) continue;

    if (stage.name === 'normalization') {
      corrected = normalizeText(corrected);
    } else {
      corrected = runStage(corrected, stage.rules, corrections);
    }
  }

  return { text: corrected, corrections };
}
