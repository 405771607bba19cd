import chalk from 'chalk';
import { buildRuntime, fail, type GlobalOptions } from '../lib/runtime-factory.js';

export async function statsCommand(globals: GlobalOptions): Promise<void> {
  try {
    const runtime = await buildRuntime(globals);
    const stats = await runtime.lifecycle.stats();

    console.log(chalk.blue('📊 Help request stats'));
    console.log(`   Total:            ${stats.total}`);
    console.log(`   Pending:          ${chalk.yellow(String(stats.pending))}`);
    console.log(`   Resolved:         ${chalk.green(String(stats.resolved))}`);
    console.log(`   Timed out:        ${chalk.gray(String(stats.timeout))}`);
    console.log(`   Avg resolution:   ${stats.avgResolutionMinutes} min`);
    console.log(`   Resolution rate:  ${stats.resolutionRatePct}%`);
    console.log(`   Knowledge entries: ${runtime.knowledge.entries().length}`);
  } catch (error) {
    fail('Failed to load stats', error, globals.debug);
  }
}

export async function callsCommand(options: { limit: string }, globals: GlobalOptions): Promise<void> {
  try {
    const runtime = await buildRuntime(globals);
    const calls = await runtime.store.listRecentCalls(parseInt(options.limit, 10));

    if (calls.length === 0) {
      console.log(chalk.gray('No calls yet'));
      return;
    }

    for (const call of calls) {
      const outcome = call.resolvedByAi
        ? chalk.green('resolved by AI')
        : chalk.yellow(`${call.helpRequestIds.length} escalation(s)`);
      console.log(`${chalk.bold(call.id)} ${call.callerContact} ${chalk.gray(call.startedAt)} ${outcome}`);
      if (call.transcript) {
        console.log(chalk.gray(call.transcript.split('\n').map(line => `   ${line}`).join('\n')));
      }
      console.log('');
    }
  } catch (error) {
    fail('Failed to list calls', error, globals.debug);
  }
}
