#!/usr/bin/env node

import { Option, program } from 'commander';
import { config } from 'dotenv';
import { callCommand, type CallOptions } from '../commands/call.js';
import { simulateCommand, type SimulateOptions } from '../commands/simulate.js';
import { createRequestsCommand } from '../commands/requests.js';
import { createKnowledgeCommand } from '../commands/knowledge.js';
import { callsCommand, statsCommand } from '../commands/stats.js';
import { serveCommand } from '../commands/serve.js';
import { parseNotificationKind, parseStoreKind, type GlobalOptions } from '../lib/runtime-factory.js';

// Load environment variables from .env.local
config({ path: '.env.local' });

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

program
  .name('deskloop')
  .description('deskloop CLI - simulate calls, answer escalations and manage learned knowledge')
  .version('0.1.0')
  .addOption(new Option('--store <kind>', 'Store backend (local|dynamodb)').default('local').argParser(parseStoreKind))
  .addOption(
    new Option('--notifications <kind>', 'Notification channel (console|eventbridge)')
      .default('console')
      .argParser(parseNotificationKind)
  )
  .option('--data-dir <dir>', 'Directory for the local store', '.deskloop')
  .option('--debug', 'Enable debug logging');

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

program
  .command('call')
  .description('Run an interactive call with the receptionist')
  .requiredOption('--caller <contact>', 'Caller phone number or address')
  .option('--caller-id <id>', 'Caller id (defaults to the contact)')
  .action((options: CallOptions) => callCommand(options, globals()));

program
  .command('simulate')
  .description('Run a scripted call through the call event stream')
  .requiredOption('--caller <contact>', 'Caller phone number or address')
  .option('--caller-id <id>', 'Caller id (defaults to the contact)')
  .requiredOption('--message <text>', 'Caller utterance (repeat for several)', collect, [])
  .action((options: SimulateOptions) => simulateCommand(options, globals()));

program.addCommand(createRequestsCommand(globals));
program.addCommand(createKnowledgeCommand(globals));

program
  .command('stats')
  .description('Show help request statistics')
  .action(() => statsCommand(globals()));

program
  .command('calls')
  .description('List recent calls')
  .option('--limit <num>', 'Number of calls', '20')
  .action((options: { limit: string }) => callsCommand(options, globals()));

program
  .command('serve')
  .description('Serve the supervisor API locally')
  .option('--port <num>', 'Port', '3000')
  .action((options: { port: string }) => serveCommand(options, globals()));

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
