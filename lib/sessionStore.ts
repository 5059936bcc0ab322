import { ChatSession } from './types';

export function createSession(id: string): ChatSession {
  return {
    id,
    state: 'idle',
    messages: [],
    selectedTemplateId: null,
    collectedValues: {},
    generatedDocument: null,
    documentTitle: null,
    createdAt: new Date(),
  };
}

/**
 * Conversations live only in process memory; concurrent turns on the same id
 * are last-write-wins.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ChatSession>();

  get(sessionId: string): ChatSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  getOrCreate(sessionId: string): ChatSession {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }
    const session = createSession(sessionId);
    this.sessions.set(sessionId, session);
    console.log('[SESSION STORE] Created session', sessionId, '- total sessions:', this.sessions.size);
    return session;
  }

  reset(sessionId: string): ChatSession {
    const session = createSession(sessionId);
    this.sessions.set(sessionId, session);
    return session;
  }

  get size(): number {
    return this.sessions.size;
  }
}
