import inquirer from 'inquirer';
import chalk from 'chalk';
import ora from 'ora';
import type { UtteranceOutcome } from '@deskloop/runtime';
import { buildRuntime, fail, type GlobalOptions } from '../lib/runtime-factory.js';

export interface CallOptions {
  caller: string;
  callerId?: string;
}

const OUTCOME_LABELS: Record<UtteranceOutcome['kind'], string> = {
  knowledge_hit: chalk.gray('(answered from learned knowledge)'),
  answered: chalk.gray('(answered by the model)'),
  generation_failed: chalk.red('(model reply failed)'),
  escalated: chalk.yellow('(escalated to supervisor)'),
  escalation_failed: chalk.red('(escalation could not be saved)'),
};

/**
 * Interactive call: each line typed is one caller utterance
 */
export async function callCommand(options: CallOptions, globals: GlobalOptions): Promise<void> {
  console.log(chalk.blue('📞 deskloop - Interactive Call'));
  console.log(chalk.gray(`Caller: ${options.caller}`));
  console.log(chalk.gray(`Store: ${globals.store}`));
  console.log('');

  try {
    const runtime = await buildRuntime(globals);
    const session = runtime.openSession({
      callerId: options.callerId ?? options.caller,
      callerContact: options.caller,
    });
    const callId = await session.start();

    console.log(chalk.green('🤖 Receptionist:'), `Thank you for calling ${runtime.config.business.name}! How can I help you today?`);
    console.log(chalk.gray(`\nCall ${callId}. Type "exit" to hang up\n`));

    while (true) {
      const { message } = await inquirer.prompt<{ message: string }>([
        {
          type: 'input',
          name: 'message',
          message: chalk.cyan('You:'),
          validate: (input: string) => input.trim().length > 0 || 'Please enter a message',
        },
      ]);

      const trimmedMessage = message.trim();
      if (trimmedMessage.toLowerCase() === 'exit') {
        console.log(chalk.yellow('👋 Goodbye!'));
        break;
      }

      const spinner = ora('🤔 Receptionist is thinking...').start();
      try {
        const outcome = await session.handleUtterance(trimmedMessage);
        spinner.stop();

        console.log(chalk.green('🤖 Receptionist:'), outcome.reply, OUTCOME_LABELS[outcome.kind]);
        if (outcome.kind === 'escalated') {
          console.log(chalk.gray(`   Help request ${outcome.helpRequestId}`));
        }
        console.log('');
      } catch (error) {
        spinner.stop();
        console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : 'Unknown error');
        console.log('');
      }
    }

    await session.end();
  } catch (error) {
    fail('Call failed', error, globals.debug);
  }
}
