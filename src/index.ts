/**
 * Lesson Reel — entry point.
 *
 *   serve                               HTTP server (default)
 *   generate <topic> <role> [seconds]   one pipeline run, result JSON on stdout
 */
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './utils/logger.js';
import { GenerationRequestSchema, createPipelineDeps, runPipeline } from './pipeline/index.js';
import { startServer } from './server.js';

const [,, command, ...args] = process.argv;

async function main(): Promise<void> {
  // Throws on missing configuration, which aborts startup
  const config = loadConfig();
  const deps = createPipelineDeps(config);
  logger.info('Lesson Reel: starting', { command: command ?? 'serve' });

  switch (command) {
    case 'generate': {
      const [topic, role, seconds] = args;
      const request = GenerationRequestSchema.parse({
        topic,
        role,
        length_seconds: seconds === undefined ? undefined : Number(seconds),
      });
      const result = await runPipeline(request, deps);
      process.stdout.write(JSON.stringify(result, null, 2) + '\n');
      break;
    }

    case undefined:
    case 'serve':
      startServer(deps);
      break;

    default:
      logger.error(`Unknown command: ${command}. Use: serve | generate <topic> <role> [seconds]`);
      process.exit(1);
  }
}

main().catch((err) => {
  logger.error('Fatal', { error: errorMessage(err) });
  process.exit(1);
});
