import { v4 as uuidv4 } from 'uuid';
import { RecordStorage } from './recordStorage';
import { DocumentInput, DocumentPatch, GeneratedDocument } from './types';

export class DocumentStore {
  constructor(private readonly storage: RecordStorage<GeneratedDocument>) {}

  async create(input: DocumentInput): Promise<GeneratedDocument> {
    const now = new Date().toISOString();
    const doc: GeneratedDocument = {
      id: uuidv4(),
      title: input.title,
      content: input.content,
      templateId: input.templateId ?? null,
      templateName: input.templateName ?? null,
      filledValues: input.filledValues ?? {},
      createdAt: now,
      updatedAt: now,
    };

    const docs = await this.storage.load();
    await this.storage.save([...docs, doc]);
    console.log('[DOCUMENT STORE] Saved document', doc.id, `"${doc.title}"`);
    return doc;
  }

  /** Newest first. */
  async list(): Promise<GeneratedDocument[]> {
    const docs = await this.storage.load();
    return docs.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async get(id: string): Promise<GeneratedDocument | null> {
    const docs = await this.storage.load();
    return docs.find((d) => d.id === id) ?? null;
  }

  async update(id: string, patch: DocumentPatch): Promise<GeneratedDocument | null> {
    const docs = await this.storage.load();
    const index = docs.findIndex((d) => d.id === id);
    if (index === -1) {
      return null;
    }

    const current = docs[index];
    const updated: GeneratedDocument = {
      ...current,
      title: patch.title ?? current.title,
      content: patch.content ?? current.content,
      filledValues: patch.filledValues ?? current.filledValues,
      updatedAt: new Date().toISOString(),
    };
    docs[index] = updated;
    await this.storage.save(docs);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const docs = await this.storage.load();
    const remaining = docs.filter((d) => d.id !== id);
    if (remaining.length === docs.length) {
      return false;
    }
    await this.storage.save(remaining);
    return true;
  }
}
