#!/usr/bin/env node
import { Command } from 'commander';
import { loadCapture } from '../capture/loader';
import { ReplayAdapter } from '../replay/adapter';
import { startServer } from '../server/server';
import { createEventLogger, createNullEventLogger, LogMode } from '../logging/event-logger';
import { createLogger } from '../utils/logger';

const program = new Command();

program
  .name('har-replay')
  .description('Replay recorded HTTP traffic from a HAR capture')
  .version('0.1.0');

program
  .command('serve')
  .description('Answer incoming requests with recorded responses')
  .option('--capture <path>', 'Path to the HAR capture (json/yaml)')
  .option('--origin <url>', 'Scheme and host used to build the live request URL')
  .option('--port <number>', 'Server port', '4010')
  .option('--loose', 'Match on method and URL only', false)
  .option('--keep-entries', 'Let an entry answer more than one request', false)
  .option('--logging', 'Emit deterministic logs', false)
  .option('--verbose', 'Write per-candidate match traces to the debug log', false)
  .addHelpText(
    'after',
    `\nExamples:\n  har-replay serve --capture ./session.har\n  har-replay serve --capture ./session.har --origin https://shop.test --loose\n  DEBUG=har-replay* har-replay serve --capture ./session.har --verbose\n`
  )
  .action(
    async (options: {
      capture?: string;
      origin?: string;
      port?: string;
      loose?: boolean;
      keepEntries?: boolean;
      logging?: boolean;
      verbose?: boolean;
    }) => {
      const port = Number(options.port);
      const mode: LogMode = process.env.CI ? 'ci' : 'cli';
      const capturePath = options.capture?.trim() || undefined;
      const origin = options.origin?.trim() || undefined;
      const logger = createLogger('har-replay', Boolean(options.verbose));
      const eventLogger = options.logging
        ? createEventLogger({ mode, format: mode === 'ci' ? 'jsonl' : 'pretty' })
        : createNullEventLogger();

      try {
        if (!capturePath) {
          throw new Error('A capture file is required (--capture <path>)');
        }

        if (origin) {
          // Validate early; the server only concatenates it.
          new URL(origin);
        }

        const capture = await loadCapture(capturePath, eventLogger);
        const adapter = ReplayAdapter.fromCapture(capture, {
          strictMatching: !options.loose,
          deleteAfterMatch: !options.keepEntries,
          logger: logger.child('adapter'),
          eventLogger,
        });

        eventLogger.emitEvent({
          event: 'startup',
          mode,
          capture: capturePath,
          origin,
          port,
          strictMatching: adapter.strictMatching,
          deleteAfterMatch: adapter.deleteAfterMatch,
        });

        await startServer({ adapter, port, eventLogger, origin });
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown startup error';
        eventLogger.emitEvent({
          event: 'startup-failed',
          message,
        });
        process.exitCode = 1;
      }
    }
  );

program.parseAsync(process.argv);
