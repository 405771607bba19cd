import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { parseSeedKnowledge, type KnowledgeEntry } from '@deskloop/runtime';
import { buildRuntime, fail, type GlobalOptions } from '../lib/runtime-factory.js';

/**
 * Seed file shipped with the CLI package
 */
export function defaultSeedFile(): string {
  return path.join(path.dirname(require.resolve('@deskloop/cli/package.json')), 'data', 'seed-knowledge.json');
}

function printEntries(entries: ReadonlyArray<KnowledgeEntry>, empty: string): void {
  if (entries.length === 0) {
    console.log(chalk.gray(empty));
    return;
  }
  for (const entry of entries) {
    console.log(`${chalk.bold(entry.id)} ${chalk.gray(`[${entry.source}, used ${entry.usageCount}x]`)}`);
    console.log(`   Q: ${entry.question}`);
    console.log(`   A: ${entry.answer}`);
    console.log('');
  }
}

export function createKnowledgeCommand(globals: () => GlobalOptions): Command {
  const knowledge = new Command('knowledge').description('Inspect and seed the learned knowledge base');

  knowledge
    .command('list')
    .description('List every knowledge entry')
    .action(async () => {
      try {
        const runtime = await buildRuntime(globals());
        printEntries(runtime.knowledge.entries(), 'No learned knowledge yet');
      } catch (error) {
        fail('Failed to list knowledge', error, globals().debug);
      }
    });

  knowledge
    .command('search <query>')
    .description('Substring search over questions and answers')
    .action(async (query: string) => {
      try {
        const runtime = await buildRuntime(globals());
        printEntries(await runtime.store.textSearchKnowledge(query), `No entries match "${query}"`);
      } catch (error) {
        fail('Search failed', error, globals().debug);
      }
    });

  knowledge
    .command('seed')
    .description('Bulk-load question/answer pairs from a JSON file')
    .option('--file <path>', 'Seed file (JSON array of { question, answer })')
    .action(async (options: { file?: string }) => {
      const file = options.file ?? defaultSeedFile();
      const spinner = ora(`🌱 Seeding knowledge from ${file}`).start();
      try {
        const entries = parseSeedKnowledge(fs.readFileSync(file, 'utf-8'));
        const runtime = await buildRuntime(globals());
        const ids = await runtime.knowledge.seed(entries);
        spinner.succeed(`Seeded ${ids.length} knowledge entries`);
      } catch (error) {
        spinner.fail('Seeding failed');
        fail('Seed failed', error, globals().debug);
      }
    });

  return knowledge;
}
