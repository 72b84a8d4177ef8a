/**
 * `cadence serve` — run the HTTP API.
 */

import { Command } from 'commander';
import { generateApiKey } from '../../api/auth.js';
import { APIServer } from '../../api/server.js';
import { InterventionEngine } from '../../engine/intervention-engine.js';
import { loadCommandConfig, parseInteger, type GlobalOptions } from './shared.js';

interface ServeOptions {
  port?: number;
  host: string;
  db?: string;
  generateKey?: boolean;
}

/**
 * The configured API key wins; otherwise `--generate-key` mints a fresh one
 * for this run.
 */
export function resolveApiKey(
  configured: string | undefined,
  generate: boolean,
): { apiKey?: string; generated: boolean } {
  if (configured) return { apiKey: configured, generated: false };
  if (generate) return { apiKey: generateApiKey(), generated: true };
  return { generated: false };
}

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the Cadence REST API')
    .option('-p, --port <port>', 'Port to listen on', parseInteger)
    .option('--host <host>', 'Interface to bind', '127.0.0.1')
    .option('--db <path>', 'Persist history and weights to this SQLite file')
    .option('--generate-key', 'Require a freshly generated API key when none is configured')
    .action(async (options: ServeOptions, command: Command) => {
      await serve(options, command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

async function serve(options: ServeOptions, globals: GlobalOptions): Promise<void> {
  const config = loadCommandConfig(globals, {
    api: options.port !== undefined ? { port: options.port } : undefined,
    storage: options.db ? { driver: 'sqlite', dbPath: options.db } : undefined,
  });

  const { apiKey, generated } = resolveApiKey(config.api.apiKey, options.generateKey ?? false);
  const engine = await InterventionEngine.create({ config });
  const server = new APIServer(engine, {
    port: config.api.port,
    host: options.host,
    apiKey,
    corsOrigins: config.api.corsOrigins,
  });

  const url = await server.start();
  console.log(`\n  Cadence API listening at ${url}`);
  console.log(`  Storage: ${config.storage.driver}${apiKey ? ', API key required' : ''}`);
  if (generated) {
    console.log(`  API key: ${apiKey}`);
  }
  console.log('  Press Ctrl+C to stop\n');

  await new Promise<void>((resolve, reject) => {
    const stop = (): void => {
      console.log('\n  Stopping...');
      server
        .stop()
        .then(() => engine.shutdown())
        .then(resolve, reject);
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });
}
