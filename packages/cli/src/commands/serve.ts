/**
 * Serve command - Start the koboldgate server
 */

import { startServer } from '@koboldgate/server';
import type { Command } from 'commander';
import { type GlobalOptions, parsePort } from './shared.js';

type ServeOptions = GlobalOptions & {
  host?: string;
  port?: number;
  koboldUrl?: string;
  stdio?: boolean;
};

export function setupServeCommand(program: Command): void {
  program
    .command('serve', { isDefault: true })
    .description('Start the koboldgate server (default command)')
    .option('--host <host>', 'host to bind to (overrides config)')
    .option('-p, --port <port>', 'port to listen on (overrides config)', parsePort)
    .option('--kobold-url <url>', 'KoboldCpp server URL (overrides config)')
    .option('--stdio', 'serve one session over stdin/stdout instead of WebSocket')
    .action(async (_options: ServeOptions, command: Command) => {
      const options = command.optsWithGlobals<ServeOptions>();
      try {
        const server = await startServer({
          config: options.config,
          host: options.host,
          port: options.port,
          koboldUrl: options.koboldUrl,
          stdio: options.stdio ?? false,
          verbose: options.verbose ?? false,
          quiet: options.quiet ?? false,
          handleSignals: true
        });

        await server.done;
        if (server.mode === 'stdio') {
          await server.stop();
        }
      } catch (error) {
        console.error('Failed to start server:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
