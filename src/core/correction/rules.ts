import type { CorrectionCategory, CorrectionRule, CustomPatterns, StageName } from '../types.js';

export interface RuleStage {
  name: StageName;
  rules: CorrectionRule[];
}

export type RuleSet = RuleStage[];

const KATAKANA = '[\\p{Script=Katakana}ー]';
const WORD = '[\\p{L}\\p{N}_]';
const LATIN_WORD = '[A-Za-z0-9_]';

// A katakana term that is not part of a longer katakana word
function standalone(term: string): RegExp {
  return new RegExp(`(?<!${KATAKANA})${term}(?!${KATAKANA})`, 'gu');
}

function rule(pattern: RegExp, replacement: string, category: CorrectionCategory): CorrectionRule {
  return { pattern, replacement, category };
}

// Keeps "思いすごし" and friends intact while still completing "申しすございす"
const NOT_A_LONGER_WORD = '(?!ぎ|ご(?!ざい))';

export const TECHNICAL_TERM_RULES: readonly CorrectionRule[] = [
  rule(standalone('ベル ?ト'), 'ベルトン', 'technical term'),
  rule(standalone('ジーピーティー'), 'GPT', 'technical term'),
  rule(standalone('ラーム'), 'Llama', 'technical term'),
  rule(standalone('エルエルエム'), 'LLM', 'technical term'),
  rule(standalone('エルエム'), 'LLM', 'technical term'),
  rule(standalone('トランスフォーマー'), 'Transformer', 'technical term'),
  rule(/松尾研(?!究室)/gu, '松尾研究室', 'technical term'),
  rule(/とも配も/gu, 'ともかく', 'technical term'),
  rule(/編集BERT/gu, 'BERT', 'technical term'),
  rule(/あの後単語/gu, '後ほど', 'technical term'),
];

export const ENDING_FIX_RULES: readonly CorrectionRule[] = [
  rule(new RegExp(`(?<!あ)りがとうございす${NOT_A_LONGER_WORD}`, 'gu'), 'ありがとうございます', 'ending fix'),
  rule(new RegExp(`申しす${NOT_A_LONGER_WORD}`, 'gu'), '申します', 'ending fix'),
  rule(new RegExp(`ございす${NOT_A_LONGER_WORD}`, 'gu'), 'ございます', 'ending fix'),
  rule(new RegExp(`思いす${NOT_A_LONGER_WORD}`, 'gu'), '思います', 'ending fix'),
];

/**
 * "XになるX" where X is a whole token: a Latin/digit run such as `Day2`, or a
 * word standing between non-word characters. Kana or kanji that merely recur
 * around になる inside running text ("気になる気持ち") never match.
 */
export function duplicatePhrasePatterns(flags: string): RegExp[] {
  return [LATIN_WORD, WORD].map(
    unit => new RegExp(`(?<!${unit})(${unit}+)になる\\1(?!${unit})`, flags),
  );
}

export const REPETITION_RULES: readonly CorrectionRule[] = [
  ...duplicatePhrasePatterns('gu').map(pattern => rule(pattern, '$1', 'repetition removal')),
  rule(new RegExp(`(?<!${WORD})(${WORD}+)\\s+\\1(?=\\s)`, 'gu'), '$1', 'repetition removal'),
];

export const FILLER_RULES: readonly CorrectionRule[] = [
  rule(/\s*(?:えーっと|えっと|えーと)[、,]?\s*/gu, ' ', 'filler removal'),
  rule(/\s*あのー+[、,]?\s*/gu, ' ', 'filler removal'),
  rule(/\s*[えあ]ー+[、,]?\s*/gu, ' ', 'filler removal'),
  rule(/なんか\s+/gu, '', 'filler removal'),
];

export const NATURALIZATION_RULES: readonly CorrectionRule[] = [
  rule(/だったのかな[、。]/gu, 'でした。', 'naturalization'),
  rule(/あるのかなと思/gu, 'あると思', 'naturalization'),
  rule(/かなというふう/gu, 'かと思', 'naturalization'),
  rule(/かなと思って/gu, 'かと思って', 'naturalization'),
  rule(/っていう/gu, 'という', 'naturalization'),
  rule(/だったりとか/gu, 'や', 'naturalization'),
];

const POLITE_ENDING = '申します|ございます|思います|なります|いただきます|します';
// Conjunctive particles continue the sentence, so no full stop before them
const CONTINUATION = 'が|けど|けれど|ので|から|でしょう|ね|よ|か|と|し[、,\\s]';
const SENTENCE_START = '[ぁ-んァ-ヶ\\p{Script=Han}A-Za-z0-9]';

export const PUNCTUATION_RULES: readonly CorrectionRule[] = [
  rule(
    new RegExp(`(${POLITE_ENDING})(?=(?!${CONTINUATION})${SENTENCE_START}|$)`, 'gu'),
    '$1。',
    'punctuation',
  ),
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a literal rule from a `{ wrong: right }` dictionary entry. When the
 * replacement contains the term ("松尾研" → "松尾研究室"), text that is already
 * correct is left alone.
 */
export function literalRule(term: string, replacement: string): CorrectionRule {
  let source = escapeRegExp(term);
  const at = replacement.indexOf(term);
  if (at >= 0) {
    const prefix = replacement.slice(0, at);
    const suffix = replacement.slice(at + term.length);
    if (prefix) source = `(?<!${escapeRegExp(prefix)})${source}`;
    if (suffix) source = `${source}(?!${escapeRegExp(suffix)})`;
  }
  return rule(new RegExp(source, 'gu'), replacement.replace(/\$/g, '$$$$'), 'technical term');
}

export function customTermRules(custom: CustomPatterns): CorrectionRule[] {
  const entries = [
    ...Object.entries(custom.organizationNames),
    ...Object.entries(custom.productNames),
    ...Object.entries(custom.techTerms),
  ].filter(([term, replacement]) => term.length > 0 && term !== replacement);

  // Longer terms first so "松尾岩澤研" wins over "岩澤研"
  entries.sort((a, b) => b[0].length - a[0].length);
  return entries.map(([term, replacement]) => literalRule(term, replacement));
}

export function buildRuleSet(custom?: CustomPatterns): RuleSet {
  return [
    {
      name: 'technicalTerms',
      rules: [...TECHNICAL_TERM_RULES, ...(custom ? customTermRules(custom) : [])],
    },
    { name: 'endingFixes', rules: [...ENDING_FIX_RULES] },
    { name: 'repetitionRemoval', rules: [...REPETITION_RULES] },
    { name: 'fillerRemoval', rules: [...FILLER_RULES] },
    { name: 'naturalization', rules: [...NATURALIZATION_RULES] },
    { name: 'punctuation', rules: [...PUNCTUATION_RULES] },
    { name: 'normalization', rules: [] },
  ];
}

export function rulesFor(ruleSet: RuleSet, name: StageName): CorrectionRule[] {
  return ruleSet.find(stage => stage.name === name)?.rules ?? [];
}
