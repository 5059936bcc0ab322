import PizZip from 'pizzip';
import { NextRequest } from 'next/server';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createMemoryServices, getServices, setServices } from '@/lib/services';
import { ScriptedEndpoint } from '@/lib/testing';
import { GET as listDocuments, POST as createDocument } from './route';
import { DELETE as deleteDocument, GET as getDocument, PUT as updateDocument } from './[id]/route';
import { GET as downloadDocument } from './[id]/download/route';

const params = (id: string) => ({ params: Promise.resolve({ id }) });

describe('/api/documents', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    setServices(createMemoryServices(new ScriptedEndpoint()));
  });

  afterEach(() => {
    setServices(undefined);
    vi.restoreAllMocks();
  });

  it('creates, lists, updates and deletes documents', async () => {
    const created = await createDocument(
      new NextRequest('http://localhost/api/documents', {
        method: 'POST',
        body: JSON.stringify({ title: 'Memo', content: 'Hello' }),
      })
    );
    expect(created.status).toBe(201);
    const { id } = await created.json();

    expect((await (await listDocuments()).json()).total).toBe(1);

    const updated = await updateDocument(
      new NextRequest('http://localhost', { method: 'PUT', body: JSON.stringify({ title: 'Final memo' }) }),
      params(id)
    );
    expect(await updated.json()).toMatchObject({ id, title: 'Final memo', content: 'Hello' });

    expect((await deleteDocument(new NextRequest('http://localhost'), params(id))).status).toBe(204);
    expect((await getDocument(new NextRequest('http://localhost'), params(id))).status).toBe(404);
  });

  it('downloads a document as docx', async () => {
    const doc = await getServices().documents.create({ title: 'Q3 Invoice / ACME', content: 'Total: 100' });

    const res = await downloadDocument(new NextRequest('http://localhost'), params(doc.id));

    expect(res.headers.get('Content-Disposition')).toBe('attachment; filename="Q3_Invoice_ACME.docx"');
    const zip = new PizZip(Buffer.from(await res.arrayBuffer()));
    expect(zip.file('word/document.xml')?.asText()).toContain('Total: 100');
  });

  it('returns 404 when downloading a missing document', async () => {
    const res = await downloadDocument(new NextRequest('http://localhost'), params('missing'));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Document not found' });
  });
});
