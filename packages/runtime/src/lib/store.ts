import type {
  CallRecord,
  CallRecordDraft,
  HelpRequest,
  HelpRequestDraft,
  KnowledgeEntry,
  KnowledgeEntryDraft,
} from '../types/index.js';

/**
 * Durable persistence used by the engine. Status transitions are
 * conditional: they succeed only while the request is still pending.
 */
export interface DeskStore {
  // Help requests
  createHelpRequest(request: HelpRequestDraft): Promise<string>;
  getHelpRequest(id: string): Promise<HelpRequest | undefined>;
  /** Pending requests, newest first */
  listPending(): Promise<HelpRequest[]>;
  /** Most recent requests of any status, newest first */
  listRecent(limit: number): Promise<HelpRequest[]>;
  updateHelpRequestResolved(id: string, answer: string, resolver: string, resolvedAt: string): Promise<boolean>;
  updateHelpRequestTimeout(id: string, resolvedAt: string): Promise<boolean>;

  // Knowledge
  createKnowledgeEntry(entry: KnowledgeEntryDraft): Promise<string>;
  /** All entries in creation order */
  listAllKnowledge(): Promise<KnowledgeEntry[]>;
  incrementKnowledgeUsage(id: string): Promise<void>;
  /** Case-insensitive substring match on question or answer, most used first */
  textSearchKnowledge(query: string): Promise<KnowledgeEntry[]>;

  // Call records
  createCallRecord(record: CallRecordDraft): Promise<string>;
  linkHelpRequestToCall(callId: string, requestId: string): Promise<void>;
  endCallRecord(callId: string, endedAt: string, transcript: string): Promise<void>;
  /** Most recent calls, newest first */
  listRecentCalls(limit: number): Promise<CallRecord[]>;
}

export function byUsageDesc(a: KnowledgeEntry, b: KnowledgeEntry): number {
  return b.usageCount - a.usageCount;
}

export function byCreatedDesc<T extends { createdAt: string }>(a: T, b: T): number {
  return b.createdAt.localeCompare(a.createdAt);
}
