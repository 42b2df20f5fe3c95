import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { JSONFile } from 'lowdb/node';
import type { z } from 'zod';

import {
  documentLayoutSchema,
  taskSchema,
  userSchema,
  type DataDocument
} from './schema.ts';

export function createEmptyDocument(): DataDocument {
  return { users: [], tasks: [] };
}

// Position of each stored entry: a record the services can use, or raw data kept as it was
type Slot<T> = { kind: 'record'; record: T } | { kind: 'unreadable'; raw: unknown };

interface LoadedDocument {
  document: DataDocument;
  userSlots: Slot<DataDocument['users'][number]>[];
  taskSlots: Slot<DataDocument['tasks'][number]>[];
}

function readCollection<T, Input>(entries: unknown[], schema: z.ZodType<T, z.ZodTypeDef, Input>) {
  const records: T[] = [];
  const slots: Slot<T>[] = [];
  for (const raw of entries) {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
      slots.push({ kind: 'record', record: parsed.data });
    } else {
      slots.push({ kind: 'unreadable', raw });
    }
  }
  return { records, slots };
}

/*
  Rebuilds a collection for writing: unreadable entries go back in their old
  positions, surviving records keep theirs and new records follow at the end.
*/
function writeCollection<T>(records: T[], slots: Slot<T>[]): unknown[] {
  const remaining = new Set<T>(records);
  const entries: unknown[] = [];
  for (const slot of slots) {
    if (slot.kind === 'unreadable') {
      entries.push(slot.raw);
    } else if (remaining.delete(slot.record)) {
      entries.push(slot.record);
    }
  }
  return [...entries, ...remaining];
}

/**
 * Holds the users and tasks collections in one JSON document on disk.
 *
 * Every operation reads the whole file and, for mutations, rewrites it.
 * Writes land in a temporary file that is renamed over the target, so an
 * interrupted write leaves the previous document in place. Operations on the
 * same instance are queued and run one at a time.
 *
 * Records that do not match the stored shape are hidden from reads but written
 * back untouched, and unknown keys on records are kept.
 */
export class JsonDocumentStore {
  readonly filePath: string;
  private readonly adapter: JSONFile<unknown>;
  private queue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.adapter = new JSONFile<unknown>(this.filePath);
  }

  async load(): Promise<DataDocument> {
    return (await this.loadSlots()).document;
  }

  async save(document: DataDocument): Promise<void> {
    await this.write(document);
  }

  read<T>(query: (document: DataDocument) => T): Promise<T> {
    return this.enqueue(async () => query(await this.load()));
  }

  /*
    Loads the document, applies the mutation and saves the result.
    Nothing is written when the mutation throws.
  */
  update<T>(mutation: (document: DataDocument) => T): Promise<T> {
    return this.enqueue(async () => {
      const { document, userSlots, taskSlots } = await this.loadSlots();
      const result = mutation(document);
      await this.write({
        users: writeCollection(document.users, userSlots),
        tasks: writeCollection(document.tasks, taskSlots)
      });
      return result;
    });
  }

  /*
    Reads the whole document.
    A missing file, unparsable JSON, or a file without users/tasks arrays is
    replaced by the empty document instead of failing the caller.
  */
  private async loadSlots(): Promise<LoadedDocument> {
    const empty: LoadedDocument = { document: createEmptyDocument(), userSlots: [], taskSlots: [] };

    let raw: unknown;
    try {
      raw = await this.adapter.read();
    } catch (error) {
      if (error instanceof SyntaxError) {
        console.warn(`Data file ${this.filePath} is not valid JSON, using an empty document`);
        return empty;
      }
      throw error;
    }

    if (raw === null) {
      return empty;
    }

    const layout = documentLayoutSchema.safeParse(raw);
    if (!layout.success) {
      console.warn(`Data file ${this.filePath} does not hold users/tasks arrays, using an empty document`);
      return empty;
    }

    const users = readCollection(layout.data.users, userSchema.passthrough());
    const tasks = readCollection(layout.data.tasks, taskSchema.passthrough());
    const skipped = users.slots.length - users.records.length + tasks.slots.length - tasks.records.length;
    if (skipped > 0) {
      console.warn(`Data file ${this.filePath} has ${skipped} unreadable record(s), keeping them as stored`);
    }

    return {
      document: { users: users.records, tasks: tasks.records },
      userSlots: users.slots,
      taskSlots: tasks.slots
    };
  }

  private async write(document: { users: unknown[]; tasks: unknown[] }): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await this.adapter.write(document);
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(work);
    // The next operation waits for this one whatever its outcome; the outcome itself goes to the caller
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
