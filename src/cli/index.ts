#!/usr/bin/env node
/**
 * Outreach pipeline CLI
 * Entry point for discovery, ingestion, the outreach pipeline and reply triage
 */

import { Command, InvalidArgumentError } from 'commander';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { getConfig } from '../config';
import { AppContext, withContext } from './context';

import { DiscoverOptions, runDiscover } from './commands/discover';
import { IngestOptions, runIngest } from './commands/ingest';
import { PipelineOptions, runPipeline } from './commands/pipeline';
import { RunOptions, runEndToEnd } from './commands/run';
import { showStatus } from './commands/status';
import { runTriage } from './commands/triage';

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

// Every command opens the store, reports failures, and exits non-zero on error
async function execute(name: string, fn: (ctx: AppContext) => Promise<unknown>): Promise<void> {
  try {
    await withContext(fn);
  } catch (error) {
    logger.error(`${name} failed`, { error: errorMessage(error) });
    process.exit(1);
  }
}

const program = new Command();

program
  .name('outreach-pipeline')
  .description('Lead discovery, ingestion and outreach pipeline')
  .version('1.0.0');

// Discover + ingest
program
  .command('discover')
  .description('Search both producers and ingest the results into a session')
  .requiredOption('-q, --query <query>', 'What to search for, e.g. "cafe"')
  .requiredOption('-l, --location <location>', 'Where to search, e.g. "Austin, TX"')
  .option('--limit <number>', 'Maximum records per source', parseInteger)
  .option('-s, --session <id>', 'Session id to ingest into')
  .action(async (options: DiscoverOptions) => {
    await execute('Discover', (ctx) => runDiscover(ctx, options));
  });

// Ingest from file
program
  .command('ingest')
  .description('Ingest raw records from a JSON file')
  .requiredOption('-f, --file <path>', 'JSON file with an array of records')
  .option('-s, --session <id>', 'Session id to ingest into')
  .action(async (options: IngestOptions) => {
    await execute('Ingest', (ctx) => runIngest(ctx, options));
  });

// Outreach pipeline over a session
program
  .command('pipeline')
  .description('Run research → draft → review → call → classify → branch over a session')
  .requiredOption('-s, --session <id>', 'Session whose leads to run')
  .option('--limit <number>', 'Maximum leads', parseInteger)
  .option('-c, --concurrency <number>', 'Leads in flight at once', parseInteger)
  .option('--force', 'Re-run leads that already ran for this session')
  .option('--allow-fallback', 'Use recent leads from other sessions if this one has none')
  .action(async (options: PipelineOptions) => {
    await execute('Pipeline', (ctx) => runPipeline(ctx, options));
  });

// End to end
program
  .command('run')
  .description('Discover, verify and run the pipeline in one go')
  .requiredOption('-q, --query <query>', 'What to search for')
  .requiredOption('-l, --location <location>', 'Where to search')
  .option('--limit <number>', 'Maximum leads', parseInteger)
  .option('-c, --concurrency <number>', 'Leads in flight at once', parseInteger)
  .action(async (options: RunOptions) => {
    await execute('Run', (ctx) => runEndToEnd(ctx, options));
  });

// Status
program
  .command('status')
  .description('Show a session and its pipeline runs, or recent sessions')
  .option('-s, --session <id>', 'Session to inspect')
  .action(async (options: { session?: string }) => {
    await execute('Status', (ctx) => showStatus(ctx, options.session));
  });

// Reply triage
program
  .command('triage')
  .description('Qualify an inbound reply and book a meeting when warranted')
  .requiredOption('-f, --file <path>', 'JSON file with {messageId, leadId, from, subject, body}')
  .action(async (options: { file: string }) => {
    await execute('Triage', (ctx) => runTriage(ctx, options.file));
  });

// Config command
program
  .command('config')
  .description('Show current configuration')
  .action(() => {
    const config = getConfig();
    console.log(JSON.stringify(config, null, 2));
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('CLI failed', { error: errorMessage(error) });
  process.exit(1);
});
