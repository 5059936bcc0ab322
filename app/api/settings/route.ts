import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { settingsUpdateSchema } from '@/lib/settingsStore';

/** GET /api/settings: current model settings */
export async function GET() {
  try {
    return NextResponse.json(await getServices().settings.load());
  } catch (error) {
    console.error('[SETTINGS_GET]', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}

/** POST /api/settings: partial update, returns the merged settings */
export async function POST(req: NextRequest) {
  try {
    const patch = settingsUpdateSchema.parse(await req.json());
    return NextResponse.json(await getServices().settings.update(patch));
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json({ error: error.errors }, { status: 400 });
    }
    console.error('[SETTINGS_POST]', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
