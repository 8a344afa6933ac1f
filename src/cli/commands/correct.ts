import { Command } from 'commander';
import { readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { RunRepository } from '../../core/db/repository.js';
import { summarizeRun } from '../../core/correction/corrector.js';
import { correctedFileName } from '../../core/batch/batch.js';
import { serializeSegments } from '../../core/segment/segmenter.js';
import { createCorrector, printStatistics, withInterrupt } from '../runtime.js';

interface CorrectOptions {
  output?: string;
  llm: boolean;
  config?: string;
  history: boolean;
}

export function correctCommand(): Command {
  return new Command('correct')
    .description('Correct one transcript file')
    .argument('<file>', 'Transcript with [H:MM:SS - H:MM:SS] headers')
    .option('-o, --output <path>', 'Output file (default: <name>_corrected.txt beside the input)')
    .option('--no-llm', 'Rule-based correction only')
    .option('-c, --config <path>', 'Config file')
    .option('--no-history', 'Do not record the run')
    .action(async (file: string, options: CorrectOptions) => {
      const config = resolveConfig(options.config);
      if (!options.llm) config.llm.enabled = false;

      const inputPath = resolve(file);
      const content = readFileSync(inputPath, 'utf-8');
      const corrector = createCorrector(config);

      console.log(chalk.bold(`Correcting ${inputPath}...\n`));
      const run = await withInterrupt(signal => corrector.processTranscript(content, { signal }));

      if (run.aborted) {
        console.error(chalk.yellow(`Interrupted after ${run.segments.length} segments; nothing written.`));
        process.exitCode = 130;
        return;
      }

      const outputPath = options.output
        ? resolve(options.output)
        : join(dirname(inputPath), correctedFileName(inputPath));
      writeFileSync(outputPath, serializeSegments(run.segments), 'utf-8');

      const stats = summarizeRun(run.segments, run.accounting, config.cost.currencyRate);
      printStatistics(stats, config.cost.currency);
      console.log(chalk.green('\n✓') + ` Written to ${outputPath}`);

      if (options.history) {
        const db = new RunRepository(config.dbPath);
        try {
          const record = db.saveRun(inputPath, stats, run.segments);
          console.log(chalk.dim(`  Run recorded: ${record.id}`));
        } finally {
          db.close();
        }
      }
    });
}
