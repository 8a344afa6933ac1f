import { Command, Option } from 'commander';
import { readFileSync, writeFileSync } from 'node:fs';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { analyzeTranscripts, type PairingMode } from '../../core/analysis/diff-analyzer.js';
import { generateReport } from '../../core/analysis/report.js';

interface AnalyzeCommandOptions {
  json?: string;
  pairing: PairingMode;
  config?: string;
}

export function analyzeCommand(): Command {
  return new Command('analyze')
    .description('Compare an original transcript with its corrected version')
    .argument('<original>', 'Original transcript')
    .argument('<corrected>', 'Corrected transcript')
    .option('--json <file>', 'Save the full analysis as JSON')
    .addOption(
      new Option('--pairing <mode>', 'How segments are paired')
        .choices(['position', 'timestamp'])
        .default('position'),
    )
    .option('-c, --config <path>', 'Config file (custom term dictionaries)')
    .action((original: string, corrected: string, options: AnalyzeCommandOptions) => {
      const config = resolveConfig(options.config);
      const analysis = analyzeTranscripts(
        readFileSync(original, 'utf-8'),
        readFileSync(corrected, 'utf-8'),
        { pairing: options.pairing, customPatterns: config.customPatterns },
      );

      console.log(generateReport(analysis));

      if (analysis.pairing.truncated) {
        console.error(chalk.yellow(
          `\n⚠ Segment counts differ (${analysis.pairing.original_segments} vs ${analysis.pairing.corrected_segments}); ` +
          'try --pairing timestamp',
        ));
      }

      if (options.json) {
        writeFileSync(options.json, JSON.stringify(analysis, null, 2) + '\n', 'utf-8');
        console.log(chalk.green('\n✓') + ` Analysis saved to ${options.json}`);
      }
    });
}
