import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  CallRecordSchema,
  HelpRequestSchema,
  KnowledgeEntrySchema,
  MemoryStore,
  emptyMemoryStoreState,
  type MemoryStoreState,
} from '@deskloop/runtime';

const StoreFileSchema = z.object({
  helpRequests: z.array(HelpRequestSchema),
  knowledge: z.array(KnowledgeEntrySchema),
  calls: z.array(CallRecordSchema),
});

/**
 * MemoryStore persisted to `<dir>/store.json`, so separate CLI processes
 * (a simulated call, then a supervisor resolving it) share state.
 * Every operation re-reads the file.
 */
export class LocalFileStore extends MemoryStore {
  private filePath: string;

  constructor(storeDir: string = '.deskloop') {
    super();
    this.filePath = path.join(storeDir, 'store.json');
    if (!fs.existsSync(storeDir)) {
      fs.mkdirSync(storeDir, { recursive: true });
    }
  }

  get path(): string {
    return this.filePath;
  }

  protected override load(): MemoryStoreState {
    if (!fs.existsSync(this.filePath)) {
      return emptyMemoryStoreState();
    }

    const data = fs.readFileSync(this.filePath, 'utf-8');
    const parsed = StoreFileSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      throw new Error(`Local store ${this.filePath} is corrupt: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return parsed.data;
  }

  protected override save(state: MemoryStoreState): void {
    fs.writeFileSync(this.filePath, JSON.stringify(state, null, 2), 'utf-8');
  }
}
