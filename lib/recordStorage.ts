import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

/** Whole-collection persistence for the JSON-record stores. */
export interface RecordStorage<T> {
  load(): Promise<T[]>;
  save(records: T[]): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON array per file. A missing file reads as an empty collection;
 * records that fail the schema are skipped with a warning. An unreadable or
 * unparseable file throws, so nothing gets saved over it.
 */
export class JsonFileStorage<T> implements RecordStorage<T> {
  constructor(
    private readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  async load(): Promise<T[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error(`${this.filePath} does not hold a JSON array`);
    }

    const items: unknown[] = parsed;
    const records: T[] = [];
    items.forEach((item, index) => {
      const result = this.schema.safeParse(item);
      if (result.success) {
        records.push(result.data);
      } else {
        console.warn(`[RecordStorage] Skipping invalid record ${index} in ${this.filePath}:`, result.error.message);
      }
    });
    return records;
  }

  async save(records: T[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(records, null, 2), 'utf-8');
  }
}

export class MemoryStorage<T> implements RecordStorage<T> {
  private records: T[];

  constructor(initial: T[] = []) {
    this.records = [...initial];
  }

  async load(): Promise<T[]> {
    return [...this.records];
  }

  async save(records: T[]): Promise<void> {
    this.records = [...records];
  }
}
