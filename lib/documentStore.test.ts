import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DocumentStore } from './documentStore';
import { MemoryStorage } from './recordStorage';
import { GeneratedDocument } from './types';

describe('DocumentStore', () => {
  let store: DocumentStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    store = new DocumentStore(new MemoryStorage<GeneratedDocument>());
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('creates documents with ids and timestamps', async () => {
    vi.setSystemTime(new Date('2024-06-01T00:00:00.000Z'));
    const doc = await store.create({
      title: 'Acme NDA',
      content: 'Agreement between Acme and Globex.',
      templateId: 'tpl-nda',
      templateName: 'Mutual NDA',
      filledValues: { party_a: 'Acme', party_b: 'Globex' },
    });

    expect(doc).toEqual({
      id: expect.any(String),
      title: 'Acme NDA',
      content: 'Agreement between Acme and Globex.',
      templateId: 'tpl-nda',
      templateName: 'Mutual NDA',
      filledValues: { party_a: 'Acme', party_b: 'Globex' },
      createdAt: '2024-06-01T00:00:00.000Z',
      updatedAt: '2024-06-01T00:00:00.000Z',
    });
  });

  it('defaults the optional fields', async () => {
    const doc = await store.create({ title: 'Note', content: 'Text' });
    expect(doc).toMatchObject({ templateId: null, templateName: null, filledValues: {} });
  });

  it('lists newest-created first', async () => {
    vi.setSystemTime(new Date('2024-06-01T00:00:00.000Z'));
    const first = await store.create({ title: 'First', content: '' });
    vi.setSystemTime(new Date('2024-06-02T00:00:00.000Z'));
    const second = await store.create({ title: 'Second', content: '' });

    expect((await store.list()).map((d) => d.id)).toEqual([second.id, first.id]);
  });

  it('updates title, content and values', async () => {
    vi.setSystemTime(new Date('2024-06-01T00:00:00.000Z'));
    const doc = await store.create({ title: 'Draft', content: 'v1' });
    vi.setSystemTime(new Date('2024-06-03T00:00:00.000Z'));

    const updated = await store.update(doc.id, { title: 'Final', filledValues: { a: 1 } });
    expect(updated).toMatchObject({
      title: 'Final',
      content: 'v1',
      filledValues: { a: 1 },
      createdAt: '2024-06-01T00:00:00.000Z',
      updatedAt: '2024-06-03T00:00:00.000Z',
    });
    expect(await store.update('missing', { title: 'x' })).toBeNull();
  });

  it('deletes by id', async () => {
    const doc = await store.create({ title: 'Note', content: '' });
    expect(await store.delete(doc.id)).toBe(true);
    expect(await store.delete(doc.id)).toBe(false);
    expect(await store.get(doc.id)).toBeNull();
  });
});
