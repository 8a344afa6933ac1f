import { Command } from 'commander';

interface ServeOptions {
  config?: string;
}

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server (stdio)')
    .option('-c, --config <path>', 'Config file')
    .action(async (options: ServeOptions) => {
      // stdout carries the protocol, so status goes to stderr
      console.error('Starting lecfix MCP server on stdio...');

      // Dynamic import to avoid loading MCP deps when not needed
      const { startServer } = await import('../../mcp/server.js');
      await startServer(options.config);
    });
}
