import { KnowledgeLookupError, describeError } from './errors.js';
import { textSimilarity } from './similarity.js';
import type { DeskStore } from './store.js';
import type { KnowledgeEntry, SeedKnowledge } from '../types/index.js';

export const SIMILARITY_THRESHOLD = 0.6;
export const NO_KNOWLEDGE_CONTEXT = 'No learned knowledge yet.';

export interface KnowledgeIndexOptions {
  store: DeskStore;
  now?: () => Date;
}

/**
 * In-memory snapshot of learned answers, backed by the store.
 *
 * The snapshot is a read-only array swapped by assignment; `learn` appends by
 * copying. Usage counts are incremented in the store only, so the snapshot's
 * `usageCount` values are as of the last refresh.
 */
export class KnowledgeIndex {
  private store: DeskStore;
  private now: () => Date;
  private snapshot: ReadonlyArray<KnowledgeEntry> = [];
  private inFlightRefreshes = new Set<KnowledgeEntry[]>();
  private refreshesStarted = 0;
  private appliedGeneration = 0;

  constructor(options: KnowledgeIndexOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reload every entry from the store. The previous snapshot stays active if
   * the load fails. When refreshes overlap, only the most recently started
   * one that completes may replace the snapshot.
   */
  async refresh(): Promise<void> {
    const generation = ++this.refreshesStarted;
    const learned: KnowledgeEntry[] = [];
    this.inFlightRefreshes.add(learned);

    try {
      const loaded = await this.store.listAllKnowledge();
      if (generation < this.appliedGeneration) {
        return;
      }
      const loadedIds = new Set(loaded.map(entry => entry.id));
      this.snapshot = [...loaded, ...learned.filter(entry => !loadedIds.has(entry.id))];
      this.appliedGeneration = generation;
      console.log(`📚 Knowledge index refreshed: ${this.snapshot.length} entries`);
    } finally {
      this.inFlightRefreshes.delete(learned);
    }
  }

  /**
   * First cached entry whose word overlap with the question reaches the
   * threshold, else the store's best substring match.
   *
   * @throws KnowledgeLookupError when the store fallback fails
   */
  async search(question: string): Promise<KnowledgeEntry | undefined> {
    const query = question.trim().toLowerCase();
    if (!query) {
      return undefined;
    }

    let match = this.snapshot.find(entry => textSimilarity(query, entry.question) >= SIMILARITY_THRESHOLD);

    if (!match) {
      let candidates: KnowledgeEntry[];
      try {
        candidates = await this.store.textSearchKnowledge(query);
      } catch (error) {
        throw new KnowledgeLookupError({ cause: error });
      }
      match = candidates[0];
    }

    if (!match) {
      return undefined;
    }

    try {
      await this.store.incrementKnowledgeUsage(match.id);
    } catch (error) {
      console.warn(`⚠️  Failed to record usage for knowledge entry ${match.id}: ${describeError(error)}`);
    }

    return match;
  }

  /**
   * Persist a supervisor answer and make it visible to subsequent searches
   */
  async learn(question: string, answer: string, helpRequestId?: string): Promise<string> {
    const timestamp = this.now().toISOString();
    const draft = {
      question,
      answer,
      source: 'supervisor' as const,
      helpRequestId,
      createdAt: timestamp,
      updatedAt: timestamp,
      usageCount: 0,
    };

    const id = await this.store.createKnowledgeEntry(draft);
    this.append({ ...draft, id });
    console.log(`🧠 Learned answer for "${question}" (${id})`);
    return id;
  }

  /**
   * Bulk-create seed entries
   */
  async seed(entries: SeedKnowledge): Promise<string[]> {
    const ids: string[] = [];

    for (const { question, answer } of entries) {
      const timestamp = this.now().toISOString();
      const draft = {
        question,
        answer,
        source: 'seed' as const,
        createdAt: timestamp,
        updatedAt: timestamp,
        usageCount: 0,
      };
      const id = await this.store.createKnowledgeEntry(draft);
      this.append({ ...draft, id });
      ids.push(id);
    }

    console.log(`🌱 Seeded ${ids.length} knowledge entries`);
    return ids;
  }

  /**
   * Top entries by usage, rendered for the system prompt
   */
  promptContext(limit = 10): string {
    // Array.prototype.sort is stable, so ties keep snapshot order
    const top = [...this.snapshot]
      .sort((a, b) => b.usageCount - a.usageCount)
      .slice(0, limit);

    if (top.length === 0) {
      return NO_KNOWLEDGE_CONTEXT;
    }

    const lines = ['Learned Knowledge:'];
    for (const entry of top) {
      lines.push(`Q: ${entry.question}`, `A: ${entry.answer}`, '');
    }
    return lines.join('\n');
  }

  entries(): ReadonlyArray<KnowledgeEntry> {
    return this.snapshot;
  }

  private append(entry: KnowledgeEntry): void {
    this.snapshot = [...this.snapshot, entry];
    for (const learned of this.inFlightRefreshes) {
      learned.push(entry);
    }
  }
}
