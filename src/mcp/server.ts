import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { resolveConfig } from '../core/config.js';
import { RunRepository } from '../core/db/repository.js';
import { TranscriptCorrector, summarizeRun } from '../core/correction/corrector.js';
import { serializeSegments } from '../core/segment/segmenter.js';
import { analyzeTranscripts } from '../core/analysis/diff-analyzer.js';
import { generateReport } from '../core/analysis/report.js';
import type { Logger } from '../core/logger.js';

// stdout is the protocol channel
const stderrLogger: Logger = {
  info: message => console.error(message),
  warn: message => console.error(`warning: ${message}`),
};

export async function startServer(configPath?: string): Promise<void> {
  const config = resolveConfig(configPath);
  const db = new RunRepository(config.dbPath);

  const server = new McpServer({
    name: 'lecfix',
    version: '0.1.0',
  });

  // Tool: correct_transcript
  server.tool(
    'correct_transcript',
    'Correct a speech-to-text lecture transcript with [H:MM:SS - H:MM:SS] segment headers',
    {
      text: z.string().describe('Transcript text'),
      use_llm: z.boolean().optional().default(false).describe('Escalate hard segments to the LLM'),
      record: z.boolean().optional().default(false).describe('Record the run in history'),
    },
    async ({ text, use_llm, record }) => {
      const corrector = TranscriptCorrector.fromConfig(
        { ...config, llm: { ...config.llm, enabled: config.llm.enabled && use_llm } },
        stderrLogger,
      );
      const run = await corrector.processTranscript(text);
      const stats = summarizeRun(run.segments, run.accounting, config.cost.currencyRate);

      if (record) {
        db.saveRun('mcp', stats, run.segments);
      }

      return {
        content: [
          { type: 'text' as const, text: serializeSegments(run.segments) },
          {
            type: 'text' as const,
            text: JSON.stringify({
              statistics: stats,
              warnings: run.warnings.map(w => `segment ${w.segmentId}: ${w.message}`),
            }, null, 2),
          },
        ],
      };
    },
  );

  // Tool: analyze_transcripts
  server.tool(
    'analyze_transcripts',
    'Compare an original transcript with its corrected version and report correction quality',
    {
      original: z.string().describe('Original transcript text'),
      corrected: z.string().describe('Corrected transcript text'),
      pairing: z.enum(['position', 'timestamp']).optional().default('position').describe('Segment pairing'),
    },
    async ({ original, corrected, pairing }) => {
      const analysis = analyzeTranscripts(original, corrected, {
        pairing,
        customPatterns: config.customPatterns,
      });

      return {
        content: [{
          type: 'text' as const,
          text: generateReport(analysis),
        }],
      };
    },
  );

  // Tool: run_history
  server.tool(
    'run_history',
    'List recorded correction runs',
    {
      limit: z.number().int().positive().optional().default(10).describe('Max runs'),
    },
    async ({ limit }) => {
      const runs = db.getRuns(limit);

      return {
        content: [{
          type: 'text' as const,
          text: runs.length > 0 ? JSON.stringify(runs, null, 2) : 'No runs recorded yet.',
        }],
      };
    },
  );

  // Start the server
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
