import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { createDocumentSchema } from '@/lib/validation';

/** GET /api/documents: saved documents, newest first */
export async function GET() {
  try {
    const items = await getServices().documents.list();
    return NextResponse.json({ items, total: items.length });
  } catch (error) {
    console.error('[DOCUMENTS_GET]', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}

/** POST /api/documents: save a document written outside the chat flow */
export async function POST(req: NextRequest) {
  try {
    const body = createDocumentSchema.parse(await req.json());
    const doc = await getServices().documents.create(body);
    return NextResponse.json(doc, { status: 201 });
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json({ error: error.errors }, { status: 400 });
    }
    console.error('[DOCUMENTS_POST]', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
