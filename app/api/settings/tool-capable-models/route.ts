import { NextResponse } from 'next/server';
import { TOOL_CAPABLE_MODELS } from '@/lib/config';

/** GET /api/settings/tool-capable-models */
export async function GET() {
  return NextResponse.json({ models: TOOL_CAPABLE_MODELS });
}
