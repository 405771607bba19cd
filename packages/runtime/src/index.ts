// Engine
export { KnowledgeIndex, SIMILARITY_THRESHOLD, NO_KNOWLEDGE_CONTEXT, type KnowledgeIndexOptions } from './lib/knowledge-index.js';
export {
  HelpRequestLifecycle,
  type HelpRequestLifecycleOptions,
  type ResolveOutcome,
  type ResolveFailureReason,
} from './lib/help-request-service.js';
export {
  ConversationSession,
  type CallerInfo,
  type ConversationSessionOptions,
  type SessionSettings,
  type SessionSummary,
  type SessionEndReason,
  type UtteranceOutcome,
} from './lib/conversation-session.js';
export { ConversationContext } from './lib/conversation-context.js';
export { CallEventQueue } from './lib/call-event-queue.js';
export { createDeskRuntime, type DeskRuntime, type DeskRuntimeOverrides } from './lib/runtime.js';

// Adapters
export type { DeskStore } from './lib/store.js';
export { DynamoDBStore } from './lib/dynamodb.js';
export { MemoryStore, emptyMemoryStoreState, type MemoryStoreState } from './lib/memory-store.js';
export {
  ConsoleNotificationChannel,
  EventBridgeNotificationChannel,
  type NotificationChannel,
  type NotificationRecord,
} from './lib/notifications.js';
export { BedrockEscalationOracle, contentToText, type EscalationOracle, type BedrockEscalationOracleOptions } from './lib/oracle.js';
export { parseVerdict, type EscalationVerdict } from './lib/verdict.js';

// Support
export { loadRuntimeConfig, validateRuntimeConfig, createTestConfig } from './lib/config.js';
export * from './lib/errors.js';
export * from './lib/prompts.js';
export { parseSeedKnowledge } from './lib/seed.js';
export { tokenize, jaccard, textSimilarity } from './lib/similarity.js';

// Handlers
export { routeSupervisorRequest, corsHeaders, type SupervisorApiRequest, type SupervisorApiResponse } from './handlers/supervisor-api.js';

export * from './types/index.js';
