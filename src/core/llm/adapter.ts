import { silentLogger, type Logger } from '../logger.js';
import type { LlmSettings } from '../types.js';
import type { RunAccounting } from './accounting.js';
import type { LLMClient, LLMResponse } from './client.js';
import { buildCorrectionInstruction, parseReply } from './instruction.js';

export interface EscalationResult {
  text: string;
  used: boolean;
}

type GenerationSettings = Pick<LlmSettings, 'domain' | 'temperature' | 'topP' | 'maxTokens'>;

export class LLMCorrectionAdapter {
  constructor(
    private readonly client: LLMClient,
    private readonly settings: GenerationSettings,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Ask the service to correct `text`. Never throws: on any failure the input
   * comes back unchanged with `used: false`.
   */
  async escalate(text: string, accounting: RunAccounting): Promise<EscalationResult> {
    let response: LLMResponse | null;
    try {
      response = await this.client.correct({
        instruction: buildCorrectionInstruction(text, this.settings.domain),
        temperature: this.settings.temperature,
        topP: this.settings.topP,
        maxTokens: this.settings.maxTokens,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`LLM correction failed: ${reason}`);
      return { text, used: false };
    }

    if (!response) return { text, used: false };

    accounting.record(response.inputTokens, response.outputTokens);

    const corrected = parseReply(response.text);
    if (!corrected) {
      this.logger.warn('LLM returned an empty correction; keeping rule result');
      return { text, used: false };
    }
    if (corrected === text) return { text, used: false };

    return { text: corrected, used: true };
  }
}
