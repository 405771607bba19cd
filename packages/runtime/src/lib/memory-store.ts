import { ulid } from 'ulid';
import { byCreatedDesc, byUsageDesc, type DeskStore } from './store.js';
import type {
  CallRecord,
  CallRecordDraft,
  HelpRequest,
  HelpRequestDraft,
  KnowledgeEntry,
  KnowledgeEntryDraft,
} from '../types/index.js';

export interface MemoryStoreState {
  helpRequests: HelpRequest[];
  knowledge: KnowledgeEntry[];
  calls: CallRecord[];
}

export function emptyMemoryStoreState(): MemoryStoreState {
  return { helpRequests: [], knowledge: [], calls: [] };
}

/**
 * In-process DeskStore for development/testing.
 * Every operation runs load → mutate → save without suspending, so the
 * conditional transitions are check-and-set within one process. Reads hand
 * out copies; nothing outside the store shares its records.
 */
export class MemoryStore implements DeskStore {
  private state: MemoryStoreState;

  constructor(initial: MemoryStoreState = emptyMemoryStoreState()) {
    this.state = structuredClone(initial);
  }

  protected load(): MemoryStoreState {
    return this.state;
  }

  protected save(state: MemoryStoreState): void {
    this.state = state;
  }

  async createHelpRequest(request: HelpRequestDraft): Promise<string> {
    const state = this.load();
    const id = ulid();
    state.helpRequests.push(structuredClone({ ...request, id }));
    this.save(state);
    return id;
  }

  async getHelpRequest(id: string): Promise<HelpRequest | undefined> {
    const found = this.load().helpRequests.find(request => request.id === id);
    return found ? structuredClone(found) : undefined;
  }

  async listPending(): Promise<HelpRequest[]> {
    return this.load().helpRequests
      .filter(request => request.status === 'pending')
      .reverse()
      .sort(byCreatedDesc)
      .map(request => structuredClone(request));
  }

  async listRecent(limit: number): Promise<HelpRequest[]> {
    return [...this.load().helpRequests]
      .reverse()
      .sort(byCreatedDesc)
      .slice(0, limit)
      .map(request => structuredClone(request));
  }

  async updateHelpRequestResolved(id: string, answer: string, resolver: string, resolvedAt: string): Promise<boolean> {
    const state = this.load();
    const index = state.helpRequests.findIndex(request => request.id === id);
    const current = state.helpRequests[index];
    if (!current || current.status !== 'pending') {
      return false;
    }

    state.helpRequests[index] = {
      ...current,
      status: 'resolved',
      resolvedAt,
      supervisorAnswer: answer,
      supervisorName: resolver,
    };
    this.save(state);
    return true;
  }

  async updateHelpRequestTimeout(id: string, resolvedAt: string): Promise<boolean> {
    const state = this.load();
    const index = state.helpRequests.findIndex(request => request.id === id);
    const current = state.helpRequests[index];
    if (!current || current.status !== 'pending') {
      return false;
    }

    state.helpRequests[index] = { ...current, status: 'timeout', resolvedAt };
    this.save(state);
    return true;
  }

  async createKnowledgeEntry(entry: KnowledgeEntryDraft): Promise<string> {
    const state = this.load();
    const id = ulid();
    state.knowledge.push(structuredClone({ ...entry, id }));
    this.save(state);
    return id;
  }

  async listAllKnowledge(): Promise<KnowledgeEntry[]> {
    return this.load().knowledge.map(entry => structuredClone(entry));
  }

  async incrementKnowledgeUsage(id: string): Promise<void> {
    const state = this.load();
    const entry = state.knowledge.find(candidate => candidate.id === id);
    if (!entry) {
      throw new Error(`Knowledge entry ${id} not found`);
    }
    entry.usageCount += 1;
    entry.updatedAt = new Date().toISOString();
    this.save(state);
  }

  async textSearchKnowledge(query: string): Promise<KnowledgeEntry[]> {
    const needle = query.toLowerCase();
    return this.load().knowledge
      .filter(entry =>
        entry.question.toLowerCase().includes(needle) ||
        entry.answer.toLowerCase().includes(needle)
      )
      .sort(byUsageDesc)
      .map(entry => structuredClone(entry));
  }

  async createCallRecord(record: CallRecordDraft): Promise<string> {
    const state = this.load();
    const id = ulid();
    state.calls.push(structuredClone({ ...record, id }));
    this.save(state);
    return id;
  }

  async linkHelpRequestToCall(callId: string, requestId: string): Promise<void> {
    const state = this.load();
    const call = state.calls.find(candidate => candidate.id === callId);
    if (!call) {
      throw new Error(`Call record ${callId} not found`);
    }
    call.helpRequestIds.push(requestId);
    call.resolvedByAi = false;
    this.save(state);
  }

  async endCallRecord(callId: string, endedAt: string, transcript: string): Promise<void> {
    const state = this.load();
    const call = state.calls.find(candidate => candidate.id === callId);
    if (!call) {
      throw new Error(`Call record ${callId} not found`);
    }
    call.endedAt = endedAt;
    call.transcript = transcript;
    this.save(state);
  }

  async listRecentCalls(limit: number): Promise<CallRecord[]> {
    return [...this.load().calls]
      .reverse()
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .slice(0, limit)
      .map(call => structuredClone(call));
  }
}
