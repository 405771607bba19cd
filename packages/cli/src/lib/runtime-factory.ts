import chalk from 'chalk';
import {
  ConsoleNotificationChannel,
  EventBridgeNotificationChannel,
  createDeskRuntime,
  loadRuntimeConfig,
  validateRuntimeConfig,
  type DeskRuntime,
  type DeskStore,
  type NotificationChannel,
  type RuntimeConfig,
} from '@deskloop/runtime';
import { LocalFileStore } from './local-file-store.js';

export type StoreKind = 'local' | 'dynamodb';
export type NotificationKind = 'console' | 'eventbridge';

export type GlobalOptions = {
  store: StoreKind;
  notifications: NotificationKind;
  dataDir: string;
  debug?: boolean;
};

export function parseStoreKind(value: string): StoreKind {
  if (value !== 'local' && value !== 'dynamodb') {
    throw new Error(`Unknown store "${value}" (expected local or dynamodb)`);
  }
  return value;
}

export function parseNotificationKind(value: string): NotificationKind {
  if (value !== 'console' && value !== 'eventbridge') {
    throw new Error(`Unknown notification channel "${value}" (expected console or eventbridge)`);
  }
  return value;
}

function createStore(options: GlobalOptions): DeskStore | undefined {
  // undefined selects the runtime's DynamoDB default
  return options.store === 'local' ? new LocalFileStore(options.dataDir) : undefined;
}

function createNotifications(options: GlobalOptions, config: RuntimeConfig): NotificationChannel {
  return options.notifications === 'eventbridge'
    ? new EventBridgeNotificationChannel(config)
    : new ConsoleNotificationChannel();
}

/**
 * Build a runtime for the selected backends and load the knowledge snapshot
 */
export async function buildRuntime(options: GlobalOptions): Promise<DeskRuntime> {
  const config = loadRuntimeConfig();
  if (options.store === 'dynamodb') {
    validateRuntimeConfig(config);
  }

  if (options.debug) {
    console.log(chalk.yellow('Debug mode enabled'));
    console.log('Config:', JSON.stringify(config, null, 2));
  }

  const runtime = createDeskRuntime(config, {
    store: createStore(options),
    notifications: createNotifications(options, config),
  });
  await runtime.knowledge.refresh();
  return runtime;
}

/**
 * Print a command failure and exit non-zero
 */
export function fail(label: string, error: unknown, debug?: boolean): never {
  console.error(chalk.red(`❌ ${label}:`), error instanceof Error ? error.message : 'Unknown error');
  if (debug && error instanceof Error) {
    console.error(chalk.red('Stack:'), error.stack);
  }
  process.exit(1);
}
