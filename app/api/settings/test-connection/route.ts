import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { ollamaProbe, testConnection } from '@/lib/connectionTest';
import { getServices } from '@/lib/services';
import { settingsUpdateSchema } from '@/lib/settingsStore';

/**
 * POST /api/settings/test-connection: probe a model server with the saved
 * settings, overridden by any fields in the body (nothing is saved).
 */
export async function POST(req: NextRequest) {
  let overrides: z.infer<typeof settingsUpdateSchema>;
  try {
    overrides = settingsUpdateSchema.parse(await req.json());
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json({ error: error.errors }, { status: 400 });
    }
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  const settings = { ...(await getServices().settings.load()), ...overrides };
  try {
    const report = await testConnection(settings, ollamaProbe(settings.baseUrl));
    return NextResponse.json(report);
  } catch (error) {
    console.error('[SETTINGS_TEST_CONNECTION]', error);
    return NextResponse.json(
      { error: `Connection failed: ${error instanceof Error ? error.message : String(error)}` },
      { status: 400 }
    );
  }
}
