import { ConversationSession, type CallerInfo } from './conversation-session.js';
import { DynamoDBStore } from './dynamodb.js';
import { HelpRequestLifecycle } from './help-request-service.js';
import { KnowledgeIndex } from './knowledge-index.js';
import { EventBridgeNotificationChannel, type NotificationChannel } from './notifications.js';
import { BedrockEscalationOracle, type EscalationOracle } from './oracle.js';
import type { DeskStore } from './store.js';
import type { RuntimeConfig } from '../types/index.js';

export interface DeskRuntimeOverrides {
  store?: DeskStore;
  notifications?: NotificationChannel;
  oracle?: EscalationOracle;
  now?: () => Date;
}

export interface DeskRuntime {
  config: RuntimeConfig;
  store: DeskStore;
  knowledge: KnowledgeIndex;
  notifications: NotificationChannel;
  oracle: EscalationOracle;
  lifecycle: HelpRequestLifecycle;
  openSession(call: CallerInfo): ConversationSession;
}

/**
 * Wire the engine's components once. Defaults are the AWS-backed adapters;
 * tests and the CLI pass their own store, channel or oracle.
 *
 * The knowledge index starts empty; call `runtime.knowledge.refresh()` before
 * serving calls.
 */
export function createDeskRuntime(config: RuntimeConfig, overrides: DeskRuntimeOverrides = {}): DeskRuntime {
  const now = overrides.now ?? (() => new Date());
  const store = overrides.store ?? new DynamoDBStore(config);
  const notifications = overrides.notifications ?? new EventBridgeNotificationChannel(config);
  const oracle = overrides.oracle ?? new BedrockEscalationOracle(config);
  const knowledge = new KnowledgeIndex({ store, now });
  const lifecycle = new HelpRequestLifecycle({
    store,
    knowledge,
    notifications,
    statsWindow: config.statsWindow,
    now,
  });

  return {
    config,
    store,
    knowledge,
    notifications,
    oracle,
    lifecycle,
    openSession(call: CallerInfo): ConversationSession {
      return new ConversationSession({
        call,
        store,
        knowledge,
        lifecycle,
        oracle,
        settings: config,
        now,
      });
    },
  };
}
