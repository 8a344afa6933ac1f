export interface EscalationTrigger {
  pattern: RegExp;
  reason: string;
}

// Residual misrecognitions the rule stages cannot settle without context
export const ESCALATION_TRIGGERS: readonly EscalationTrigger[] = [
  { pattern: /[あ-ん]{3,}も/u, reason: 'garbled kana run (e.g. とも配も)' },
  { pattern: /帰漏らし/u, reason: '聞き漏らし misheard' },
  { pattern: /エポック/u, reason: 'possible person name or term' },
  { pattern: /簡易回/u, reason: '範囲外 misheard' },
  { pattern: /バット[^ー]/u, reason: 'バッド (bad) misheard' },
  { pattern: /お腹切り/u, reason: 'garbled phrase' },
  { pattern: /円周部分/u, reason: '演習部分 misheard' },
  { pattern: /ベルトンさん/u, reason: 'person name' },
  { pattern: /松尾岩澤研/u, reason: 'organization name' },
  { pattern: /スレッド1/u, reason: 'product term fragment' },
  { pattern: /Googleコラボ/u, reason: 'Google Colab' },
];

export function findEscalationTriggers(text: string): EscalationTrigger[] {
  return ESCALATION_TRIGGERS.filter(trigger => trigger.pattern.test(text));
}

/**
 * Whether rule-corrected text still carries a defect only the LLM can repair.
 */
export function needsEscalation(text: string): boolean {
  return ESCALATION_TRIGGERS.some(trigger => trigger.pattern.test(text));
}
