export { correctText, runStage, normalizeText } from './pipeline.js';
export type { RuleCorrectionResult } from './pipeline.js';
export {
  buildRuleSet, rulesFor, customTermRules, literalRule,
  TECHNICAL_TERM_RULES, ENDING_FIX_RULES, REPETITION_RULES,
  FILLER_RULES, NATURALIZATION_RULES, PUNCTUATION_RULES,
} from './rules.js';
export type { RuleSet, RuleStage } from './rules.js';
export { TranscriptCorrector, summarizeRun } from './corrector.js';
export type { CorrectorOptions, ProcessOptions, TranscriptResult } from './corrector.js';
