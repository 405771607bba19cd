import chalk from 'chalk';
import { CallEventQueue } from '@deskloop/runtime';
import { buildRuntime, fail, type GlobalOptions } from '../lib/runtime-factory.js';

export interface SimulateOptions {
  caller: string;
  callerId?: string;
  message: string[];
}

/**
 * Scripted call: every --message becomes one utterance on the call's event stream
 */
export async function simulateCommand(options: SimulateOptions, globals: GlobalOptions): Promise<void> {
  console.log(chalk.blue('🎬 deskloop - Simulated Call'));
  console.log(chalk.gray(`Caller: ${options.caller}`));
  console.log(chalk.gray(`Messages: ${options.message.length}`));
  console.log('');

  try {
    const runtime = await buildRuntime(globals);
    const session = runtime.openSession({
      callerId: options.callerId ?? options.caller,
      callerContact: options.caller,
    });

    const events = new CallEventQueue();
    for (const text of options.message) {
      events.say(text);
    }
    events.push({ type: 'end' });
    events.close();

    const summary = await session.run(events);

    for (const turn of session.callContext?.turns ?? []) {
      const label = turn.role === 'user' ? chalk.cyan('👤 Caller:') : chalk.green('🤖 Receptionist:');
      console.log(label, turn.text);
    }

    console.log('');
    console.log(chalk.gray(`Call ${summary.callId} ended (${summary.reason}), ${summary.turns} turns`));
    if (summary.helpRequestIds.length > 0) {
      console.log(chalk.yellow(`🆘 Escalated: ${summary.helpRequestIds.join(', ')}`));
      console.log(chalk.gray('   Resolve with: deskloop requests resolve <id> --answer "..."'));
    }
  } catch (error) {
    fail('Simulation failed', error, globals.debug);
  }
}
