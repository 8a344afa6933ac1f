export interface TokenRates {
  inputRatePer1k: number;
  outputRatePer1k: number;
}

/**
 * Token and cost totals for one run. Passed explicitly to every service call so
 * concurrent runs never share counters.
 */
export class RunAccounting {
  total_input_tokens = 0;
  total_output_tokens = 0;
  total_cost = 0;
  calls = 0;

  constructor(private readonly rates: TokenRates) {}

  /** Record one call and return its cost. */
  record(inputTokens: number, outputTokens: number): number {
    const cost = (inputTokens * this.rates.inputRatePer1k + outputTokens * this.rates.outputRatePer1k) / 1000;
    this.total_input_tokens += inputTokens;
    this.total_output_tokens += outputTokens;
    this.total_cost += cost;
    this.calls += 1;
    return cost;
  }
}
