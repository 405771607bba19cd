import { Command } from 'commander';
import chalk from 'chalk';
import type { HelpRequest } from '@deskloop/runtime';
import { buildRuntime, fail, type GlobalOptions } from '../lib/runtime-factory.js';

const STATUS_COLOURS: Record<HelpRequest['status'], (text: string) => string> = {
  pending: chalk.yellow,
  resolved: chalk.green,
  timeout: chalk.gray,
};

export function formatHelpRequest(request: HelpRequest): string {
  const lines = [
    `${STATUS_COLOURS[request.status](request.status.toUpperCase().padEnd(8))} ${chalk.bold(request.id)}  ${chalk.gray(request.createdAt)}`,
    `   Question: ${request.question}`,
    `   Caller:   ${request.callerContact}`,
  ];
  if (request.status === 'resolved') {
    lines.push(`   Answer:   ${request.supervisorAnswer} ${chalk.gray(`(${request.supervisorName}, ${request.resolvedAt})`)}`);
  }
  if (request.status === 'timeout') {
    lines.push(chalk.gray(`   Timed out at ${request.resolvedAt}`));
  }
  return lines.join('\n');
}

function printRequests(requests: HelpRequest[], empty: string): void {
  if (requests.length === 0) {
    console.log(chalk.gray(empty));
    return;
  }
  for (const request of requests) {
    console.log(formatHelpRequest(request));
    console.log('');
  }
}

export function createRequestsCommand(globals: () => GlobalOptions): Command {
  const requests = new Command('requests').description('Act as the supervisor on help requests');

  requests
    .command('pending')
    .description('List pending help requests, newest first')
    .action(async () => {
      try {
        const runtime = await buildRuntime(globals());
        printRequests(await runtime.lifecycle.listPending(), '✨ No pending help requests');
      } catch (error) {
        fail('Failed to list pending requests', error, globals().debug);
      }
    });

  requests
    .command('recent')
    .description('List recent help requests of any status')
    .option('--limit <num>', 'Number of requests', '50')
    .action(async (options: { limit: string }) => {
      try {
        const runtime = await buildRuntime(globals());
        printRequests(await runtime.lifecycle.listRecent(parseInt(options.limit, 10)), 'No help requests yet');
      } catch (error) {
        fail('Failed to list requests', error, globals().debug);
      }
    });

  requests
    .command('resolve <id>')
    .description('Answer a pending help request; the answer is learned and sent to the caller')
    .requiredOption('--answer <text>', 'Supervisor answer')
    .option('--name <name>', 'Supervisor name', 'Supervisor')
    .action(async (id: string, options: { answer: string; name: string }) => {
      try {
        const runtime = await buildRuntime(globals());
        const outcome = await runtime.lifecycle.resolveRequest(id, options.answer, options.name);
        if (!outcome.ok) {
          console.error(chalk.red(`❌ ${outcome.message}`));
          process.exitCode = 1;
          return;
        }

        console.log(chalk.green(`✅ Resolved ${id}`));
        if (outcome.knowledgeEntryId) {
          console.log(chalk.gray(`   Learned as knowledge entry ${outcome.knowledgeEntryId}`));
        }
      } catch (error) {
        fail('Failed to resolve request', error, globals().debug);
      }
    });

  requests
    .command('sweep')
    .description('Time out stale pending requests')
    .option('--hours <num>', 'Maximum age in hours (defaults to HELP_REQUEST_TIMEOUT_HOURS)')
    .action(async (options: { hours?: string }) => {
      try {
        const runtime = await buildRuntime(globals());
        const hours = options.hours ? parseFloat(options.hours) : runtime.config.helpRequestTimeoutHours;
        const timedOut = await runtime.lifecycle.timeoutStale(hours);
        console.log(chalk.green(`⏰ Timed out ${timedOut.length} request(s) older than ${hours}h`));
        for (const id of timedOut) {
          console.log(chalk.gray(`   ${id}`));
        }
      } catch (error) {
        fail('Sweep failed', error, globals().debug);
      }
    });

  return requests;
}
