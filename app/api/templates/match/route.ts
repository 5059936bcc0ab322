import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { matchTemplate } from '@/lib/templateMatcher';
import { matchTemplateSchema } from '@/lib/validation';

/** POST /api/templates/match: best active template for a free-text request */
export async function POST(req: NextRequest) {
  try {
    const { text } = matchTemplateSchema.parse(await req.json());
    const templates = await getServices().templates.listActive();
    return NextResponse.json({ template: matchTemplate(text, templates) });
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json({ error: error.errors }, { status: 400 });
    }
    console.error('[TEMPLATES_MATCH]', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
