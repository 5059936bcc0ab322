// app/api/chat/route.ts

import { NextRequest, NextResponse } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { chatMessageSchema } from '@/lib/validation';

export async function POST(request: NextRequest) {
  try {
    const body = chatMessageSchema.parse(await request.json());
    const sessionId = body.sessionId ?? uuidv4();

    const { orchestrator } = getServices();
    const result = await orchestrator.processMessage({
      sessionId,
      message: body.message,
      templateId: body.templateId,
    });

    console.log('[CHAT API] Turn state:', result.state, 'for session', sessionId);
    return NextResponse.json(result);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json({ error: error.errors }, { status: 400 });
    }
    if (error instanceof SyntaxError) {
      return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
    }
    console.error('Chat error:', error);
    return NextResponse.json({ error: 'Failed to process message' }, { status: 500 });
  }
}
