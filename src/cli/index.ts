import { Command } from 'commander';
import chalk from 'chalk';
import { initCommand } from './commands/init.js';
import { correctCommand } from './commands/correct.js';
import { batchCommand } from './commands/batch.js';
import { analyzeCommand } from './commands/analyze.js';
import { historyCommand } from './commands/history.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('lecfix')
  .description('Correct speech-to-text lecture transcripts and audit the results')
  .version('0.1.0');

program.addCommand(initCommand());
program.addCommand(correctCommand());
program.addCommand(batchCommand());
program.addCommand(analyzeCommand());
program.addCommand(historyCommand());
program.addCommand(serveCommand());

program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
});
