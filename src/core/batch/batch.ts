import { readdirSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { TranscriptCorrector } from '../correction/corrector.js';
import { summarizeRun } from '../correction/corrector.js';
import { silentLogger, type Logger } from '../logger.js';
import { serializeSegments } from '../segment/segmenter.js';
import type { RunStatistics, Segment } from '../types.js';

export const BATCH_STATISTICS_FILE = 'batch_statistics.json';

export interface BatchFileResult {
  file: string;
  outputPath: string;
  segments: number;
  average_quality: number;
  llm_usage: number;
}

export interface BatchFailure {
  file: string;
  error: string;
}

export interface BatchResult {
  outputDir: string;
  files: BatchFileResult[];
  failures: BatchFailure[];
  statistics: RunStatistics;
  statisticsPath: string;
  aborted: boolean;
}

export interface BatchOptions {
  logger?: Logger;
  signal?: AbortSignal;
}

export function correctedFileName(file: string): string {
  return `${basename(file, extname(file))}_corrected.txt`;
}

export function defaultOutputDir(inputDir: string): string {
  return `${inputDir.replace(/[\\/]+$/, '')}_corrected`;
}

/**
 * Correct every `.txt` transcript in `inputDir`. A file that cannot be read,
 * corrected or written is reported in `failures` and the rest carry on.
 * Token and cost totals are shared across the whole batch.
 */
export async function processDirectory(
  corrector: TranscriptCorrector,
  inputDir: string,
  outputDir: string = defaultOutputDir(inputDir),
  options: BatchOptions = {},
): Promise<BatchResult> {
  const logger = options.logger ?? silentLogger;
  mkdirSync(outputDir, { recursive: true });

  const files = readdirSync(inputDir)
    .filter(name => name.endsWith('.txt'))
    .sort();

  if (files.length === 0) {
    logger.warn(`No .txt files found in ${inputDir}`);
  }

  const accounting = corrector.createAccounting();
  const allSegments: Segment[] = [];
  const results: BatchFileResult[] = [];
  const failures: BatchFailure[] = [];
  let aborted = false;

  for (const [i, file] of files.entries()) {
    if (options.signal?.aborted) {
      aborted = true;
      break;
    }

    logger.info(`[${i + 1}/${files.length}] ${file}`);
    try {
      const content = readFileSync(join(inputDir, file), 'utf-8');
      const run = await corrector.processTranscript(content, { signal: options.signal, accounting });
      if (run.aborted) {
        aborted = true;
        break;
      }

      const outputPath = join(outputDir, correctedFileName(file));
      writeFileSync(outputPath, serializeSegments(run.segments), 'utf-8');

      const stats = summarizeRun(run.segments, accounting, 1);
      allSegments.push(...run.segments);
      results.push({
        file,
        outputPath,
        segments: stats.total_segments,
        average_quality: stats.average_quality,
        llm_usage: stats.llm_usage,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Skipping ${file}: ${reason}`);
      failures.push({ file, error: reason });
    }
  }

  const statistics = summarizeRun(allSegments, accounting, corrector.currencyRate);
  const statisticsPath = join(outputDir, BATCH_STATISTICS_FILE);
  writeFileSync(statisticsPath, JSON.stringify(statistics, null, 2) + '\n', 'utf-8');

  return { outputDir, files: results, failures, statistics, statisticsPath, aborted };
}
