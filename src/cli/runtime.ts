import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { TranscriptCorrector } from '../core/correction/corrector.js';
import type { Logger } from '../core/logger.js';
import type { LecfixConfig, RunStatistics } from '../core/types.js';

export const consoleLogger: Logger = {
  info: message => console.log(chalk.dim(message)),
  warn: message => console.error(chalk.yellow('⚠ ') + message),
};

export function createCorrector(config: LecfixConfig, logger: Logger = consoleLogger): TranscriptCorrector {
  return TranscriptCorrector.fromConfig(config, logger);
}

/**
 * Abort controller wired to Ctrl-C for the lifetime of `task`.
 */
export async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function printStatistics(stats: RunStatistics, currency: string): void {
  const highRate = stats.total_segments > 0 ? (stats.high_quality_count / stats.total_segments) * 100 : 0;

  console.log(`  Segments:        ${stats.total_segments}`);
  console.log(`  LLM used:        ${stats.llm_usage}`);
  console.log(`  Average quality: ${stats.average_quality.toFixed(3)}`);
  console.log(`  High quality:    ${stats.high_quality_count}/${stats.total_segments} (${highRate.toFixed(1)}%)`);
  console.log(`  Estimated cost:  ${stats.total_cost.toFixed(2)} ${currency}`);
  console.log(`  Tokens:          ${stats.input_tokens} in / ${stats.output_tokens} out`);
}

export function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return n;
}
