import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { processDirectory, defaultOutputDir } from '../../core/batch/batch.js';
import { consoleLogger, createCorrector, printStatistics, withInterrupt } from '../runtime.js';

interface BatchCommandOptions {
  llm: boolean;
  config?: string;
}

export function batchCommand(): Command {
  return new Command('batch')
    .description('Correct every .txt transcript in a directory')
    .argument('<dir>', 'Input directory')
    .argument('[outDir]', 'Output directory (default: <dir>_corrected)')
    .option('--no-llm', 'Rule-based correction only')
    .option('-c, --config <path>', 'Config file')
    .action(async (dir: string, outDir: string | undefined, options: BatchCommandOptions) => {
      const config = resolveConfig(options.config);
      if (!options.llm) config.llm.enabled = false;

      const inputDir = resolve(dir);
      const outputDir = outDir ? resolve(outDir) : defaultOutputDir(inputDir);
      const corrector = createCorrector(config);

      console.log(chalk.bold('Batch correction'));
      console.log(`  Input:  ${inputDir}`);
      console.log(`  Output: ${outputDir}\n`);

      const result = await withInterrupt(signal =>
        processDirectory(corrector, inputDir, outputDir, { logger: consoleLogger, signal }),
      );

      for (const file of result.files) {
        console.log(
          chalk.green('✓') +
          ` ${file.file}: ${file.segments} segments, quality ${file.average_quality.toFixed(3)}, LLM ${file.llm_usage}`,
        );
      }
      for (const failure of result.failures) {
        console.log(chalk.red('✗') + ` ${failure.file}: ${failure.error}`);
      }

      console.log(chalk.bold('\nSummary:'));
      printStatistics(result.statistics, config.cost.currency);
      console.log(chalk.dim(`\n  Statistics saved to ${result.statisticsPath}`));

      if (result.aborted) {
        console.error(chalk.yellow('Interrupted; remaining files were not processed.'));
        process.exitCode = 130;
      } else if (result.failures.length > 0 && result.files.length === 0) {
        process.exitCode = 1;
      }
    });
}
