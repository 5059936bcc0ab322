import { NextRequest } from 'next/server';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createMemoryServices, setServices } from '@/lib/services';
import { makeTemplate, ScriptedEndpoint } from '@/lib/testing';
import { GET as listTemplates, POST as createTemplate } from './route';
import { DELETE as deleteTemplate, GET as getTemplate, PUT as updateTemplate } from './[id]/route';
import { GET as getFields } from './[id]/fields/route';
import { POST as matchTemplate } from './match/route';
import { POST as uploadTemplate } from './upload/route';

const nda = makeTemplate();
const params = (id: string) => ({ params: Promise.resolve({ id }) });

function jsonRequest(url: string, method: string, body: unknown): NextRequest {
  return new NextRequest(url, { method, body: JSON.stringify(body) });
}

function uploadRequest(form: FormData): NextRequest {
  return new NextRequest('http://localhost/api/templates/upload', { method: 'POST', body: form });
}

describe('/api/templates', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    setServices(createMemoryServices(new ScriptedEndpoint(), [nda]));
  });

  afterEach(() => {
    setServices(undefined);
    vi.restoreAllMocks();
  });

  it('lists and searches templates', async () => {
    const all = await listTemplates(new NextRequest('http://localhost/api/templates'));
    expect(await all.json()).toEqual({ items: [nda], total: 1 });

    const none = await listTemplates(new NextRequest('http://localhost/api/templates?search=invoice'));
    expect(await none.json()).toEqual({ items: [], total: 0 });
  });

  it('creates a template', async () => {
    const res = await createTemplate(
      jsonRequest('http://localhost/api/templates', 'POST', { name: 'Memo', content: 'To: {recipient}' })
    );
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ name: 'Memo', category: 'custom', isActive: true });
  });

  it('validates new templates', async () => {
    const res = await createTemplate(jsonRequest('http://localhost/api/templates', 'POST', { content: 'x' }));
    expect(res.status).toBe(400);
  });

  it('reads, updates and deletes by id', async () => {
    expect(await (await getTemplate(new NextRequest('http://localhost'), params('tpl-nda'))).json()).toEqual(nda);

    const updated = await updateTemplate(jsonRequest('http://localhost', 'PUT', { isActive: false }), params('tpl-nda'));
    expect(await updated.json()).toMatchObject({ id: 'tpl-nda', isActive: false });

    const deleted = await deleteTemplate(new NextRequest('http://localhost'), params('tpl-nda'));
    expect(deleted.status).toBe(204);

    const missing = await getTemplate(new NextRequest('http://localhost'), params('tpl-nda'));
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Template with id 'tpl-nda' was not found." });
  });

  it('lists the fields of a template', async () => {
    const res = await getFields(new NextRequest('http://localhost'), params('tpl-nda'));
    expect(await res.json()).toEqual({
      templateId: 'tpl-nda',
      templateName: 'Mutual NDA',
      fields: ['party_a', 'party_b'],
      fieldDescriptions: { party_a: 'Value for party_a', party_b: 'Value for party_b' },
      templatePreview: 'Agreement between {party_a} and {party_b}.',
    });
  });

  it('matches free text to a template', async () => {
    const hit = await matchTemplate(jsonRequest('http://localhost', 'POST', { text: 'I need an NDA' }));
    expect((await hit.json()).template).toMatchObject({ id: 'tpl-nda' });

    const miss = await matchTemplate(jsonRequest('http://localhost', 'POST', { text: 'weather today' }));
    expect(await miss.json()).toEqual({ template: null });
  });

  describe('upload', () => {
    it('creates a template from a text file', async () => {
      const form = new FormData();
      form.append('file', new File(['Dear {name},'], 'welcome-letter.txt', { type: 'text/plain' }));
      form.append('description', 'Greeting');

      const res = await uploadTemplate(uploadRequest(form));
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        name: 'welcome-letter',
        description: 'Greeting',
        content: 'Dear {name},',
        category: 'custom',
      });
    });

    it('requires a file', async () => {
      const res = await uploadTemplate(uploadRequest(new FormData()));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'No file uploaded' });
    });

    it('rejects unsupported file types', async () => {
      const form = new FormData();
      form.append('file', new File(['%PDF'], 'contract.pdf'));

      const res = await uploadTemplate(uploadRequest(form));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Unsupported file type. Accepted: docx, txt, md' });
    });

    it('rejects an empty file', async () => {
      const form = new FormData();
      form.append('file', new File(['  \n'], 'blank.md'));

      const res = await uploadTemplate(uploadRequest(form));
      expect(res.status).toBe(400);
    });
  });
});
