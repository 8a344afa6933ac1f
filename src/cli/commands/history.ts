import { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { RunRepository } from '../../core/db/repository.js';
import { parsePositiveInt } from '../runtime.js';

interface HistoryOptions {
  limit: number;
  run?: string;
  delete?: string;
  config?: string;
}

export function historyCommand(): Command {
  return new Command('history')
    .description('Show recorded correction runs')
    .option('-n, --limit <n>', 'Number of runs to list', parsePositiveInt, 10)
    .option('--run <id>', 'Show the segments of one run')
    .option('--delete <id>', 'Delete a recorded run and its segments')
    .option('-c, --config <path>', 'Config file')
    .action((options: HistoryOptions) => {
      const config = resolveConfig(options.config);
      const db = new RunRepository(config.dbPath);

      try {
        if (options.delete) {
          if (db.deleteRun(options.delete)) {
            console.log(chalk.green('✓') + ` Deleted run ${options.delete}`);
          } else {
            console.error(chalk.red(`No run with id ${options.delete}`));
            process.exitCode = 1;
          }
          return;
        }

        if (options.run) {
          const run = db.getRun(options.run);
          if (!run) {
            console.error(chalk.red(`No run with id ${options.run}`));
            process.exitCode = 1;
            return;
          }
          console.log(chalk.bold(`Run ${run.id}`) + chalk.dim(` ${run.source}`));
          for (const s of db.getRunSegments(run.id)) {
            const llm = s.llm_used ? chalk.magenta(' [LLM]') : '';
            console.log(`\n[${s.start_time} - ${s.end_time}] ${chalk.cyan(s.quality_score.toFixed(3))}${llm}`);
            console.log(chalk.dim(`  - ${s.original_text}`));
            console.log(`  + ${s.corrected_text}`);
          }
          return;
        }

        const runs = db.getRuns(options.limit);
        if (runs.length === 0) {
          console.log(chalk.dim('No runs recorded yet.'));
          return;
        }

        console.log(chalk.bold(`Recent runs (${runs.length} of ${db.getRunCount()}):\n`));
        for (const run of runs) {
          console.log(
            `  ${chalk.dim(run.created_at)}  ${run.id.slice(0, 8)}  ` +
            `${String(run.total_segments).padStart(4)} seg  q=${run.average_quality.toFixed(3)}  ` +
            `LLM ${run.llm_usage}  ${run.source}`,
          );
        }

        const totals = db.getCategoryTotals();
        const sorted = Object.entries(totals).sort((a, b) => b[1] - a[1]);
        const maxCount = Math.max(...Object.values(totals), 1);

        console.log(chalk.bold('\nCorrections by category:'));
        for (const [category, count] of sorted) {
          const bar = '█'.repeat(Math.round((count / maxCount) * 20));
          console.log(`  ${category.padEnd(20)} ${String(count).padStart(5)} ${chalk.cyan(bar)}`);
        }
      } finally {
        db.close();
      }
    });
}
