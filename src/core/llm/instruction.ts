const CORRECTION_CATEGORIES = [
  '固有名詞・専門用語の誤認識（人名、組織名、製品名、技術用語）',
  '音の近い語の取り違え（例: 演習→円周、聞き漏らし→帰漏らし）',
  '文脈がないと判断できない語句の修正',
  '話し言葉から読みやすい書き言葉への自然な言い換え',
];

/**
 * Correction instruction for one transcript unit. The model is asked to return
 * only the corrected text.
 */
export function buildCorrectionInstruction(text: string, domain: string): string {
  const categories = CORRECTION_CATEGORIES.map((c, i) => `${i + 1}. ${c}`).join('\n');

  return `以下は「${domain}」の講義を音声認識で書き起こしたテキストです。
次の観点で誤りを修正してください。

${categories}

制約:
- 意味を変えず、必要最小限の修正にとどめること
- 修正後のテキストのみを出力し、説明は付けないこと

【修正対象】
${text}`;
}

/**
 * Strip the decoration models tend to add around the corrected text:
 * code fences and a leading "【修正後】" label.
 */
export function parseReply(reply: string): string {
  let text = reply.trim();

  const fenced = text.match(/^```[^\n]*\n([\s\S]*?)\n?```$/);
  if (fenced) text = fenced[1].trim();

  return text.replace(/^【修正後】[:：]?\s*/u, '').trim();
}
