export interface LLMRequest {
  instruction: string;
  temperature: number;
  topP: number;
  maxTokens: number;
}

export interface LLMResponse {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * A text-generation service. `null` means the service is unavailable.
 */
export interface LLMClient {
  correct(request: LLMRequest): Promise<LLMResponse | null>;
}

export class NullLLMClient implements LLMClient {
  async correct(): Promise<LLMResponse | null> {
    return null;
  }
}

export class AnthropicLLMClient implements LLMClient {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
  ) {}

  async correct(request: LLMRequest): Promise<LLMResponse | null> {
    const { default: Anthropic } = await import('@anthropic-ai/sdk');
    const client = new Anthropic({ apiKey: this.apiKey });

    const response = await client.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      top_p: request.topP,
      messages: [{ role: 'user', content: request.instruction }],
    });

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') text += block.text;
    }

    return {
      text,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}
