import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { createTemplateSchema } from '@/lib/validation';

/** GET /api/templates: list templates, newest-updated first */
export async function GET(req: NextRequest) {
  try {
    const search = req.nextUrl.searchParams.get('search') || undefined;
    const items = await getServices().templates.list(search);
    return NextResponse.json({ items, total: items.length });
  } catch (error) {
    console.error('[TEMPLATES_GET]', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}

/** POST /api/templates: create a template */
export async function POST(req: NextRequest) {
  try {
    const body = createTemplateSchema.parse(await req.json());
    const template = await getServices().templates.create(body);
    return NextResponse.json(template, { status: 201 });
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json({ error: error.errors }, { status: 400 });
    }
    console.error('[TEMPLATES_POST]', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
