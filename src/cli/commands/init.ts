import { Command } from 'commander';
import { existsSync } from 'node:fs';
import chalk from 'chalk';
import { defaultConfig, saveConfig, ensureConfigDir, getConfigPath, getDbPath } from '../../core/config.js';
import { RunRepository } from '../../core/db/repository.js';

interface InitOptions {
  force?: boolean;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Create the lecfix config directory, database and default config')
    .option('-f, --force', 'Overwrite an existing config file')
    .action((options: InitOptions) => {
      console.log(chalk.bold('Initializing lecfix...\n'));

      ensureConfigDir();
      console.log(chalk.green('✓') + ' Config directory ready');

      const dbPath = getDbPath();
      const db = new RunRepository(dbPath);
      db.close();
      console.log(chalk.green('✓') + ` Database at ${dbPath}`);

      const configPath = getConfigPath();
      if (existsSync(configPath) && !options.force) {
        console.log(chalk.yellow('○') + ` Keeping existing config at ${configPath} (use --force to reset)`);
      } else {
        saveConfig(defaultConfig(), configPath);
        console.log(chalk.green('✓') + ` Default config written to ${configPath}`);
      }

      if (process.env.ANTHROPIC_API_KEY) {
        console.log(chalk.green('✓') + ' Anthropic API key found (LLM escalation enabled)');
      } else {
        console.log(chalk.yellow('○') + ' No ANTHROPIC_API_KEY set (rule-based correction only)');
      }

      console.log(chalk.bold('\nNext steps:'));
      console.log('  • Run ' + chalk.cyan('lecfix correct <file>') + ' to correct a transcript');
      console.log('  • Run ' + chalk.cyan('lecfix batch <dir>') + ' to correct a directory of transcripts');
      console.log('  • Run ' + chalk.cyan('lecfix analyze <original> <corrected>') + ' to audit a correction');
      console.log('  • Run ' + chalk.cyan('lecfix serve') + ' to start the MCP server');
    });
}
