import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SystemMessage, ToolMessage } from '@langchain/core/messages';
import { extractTextContent } from '../modelEndpoint';
import { createMemoryServices, Services } from '../services';
import { makeTemplate, ScriptedEndpoint, textReply, toolReply } from '../testing';
import { documentCreatedReply, FALLBACK_REPLY } from './BaseAgent';
import { isResetCommand, RESET_REPLY } from './Orchestrator';

const nda = makeTemplate();
const retired = makeTemplate({ id: 'tpl-old', name: 'Retired Lease', isActive: false });
const values = { party_a: 'Acme', party_b: 'Globex' };
const createdReply = documentCreatedReply("Document 'Acme NDA' has been created using the 'Mutual NDA' template.");

function setup(endpoint: ScriptedEndpoint): Services {
  return createMemoryServices(endpoint, [nda, retired]);
}

describe('isResetCommand', () => {
  it('matches the reset words regardless of case and padding', () => {
    expect(isResetCommand('  Start Over ')).toBe(true);
    expect(isResetCommand('reset the form')).toBe(false);
  });
});

describe('Orchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('reset', () => {
    it('discards the conversation without calling the model', async () => {
      const endpoint = new ScriptedEndpoint([textReply('Which template?')]);
      const { orchestrator, sessions } = setup(endpoint);
      await orchestrator.processMessage({ sessionId: 's1', message: 'I need an NDA', templateId: 'tpl-nda' });

      const response = await orchestrator.processMessage({ sessionId: 's1', message: 'RESET' });

      expect(response).toEqual({
        sessionId: 's1',
        reply: RESET_REPLY,
        templateId: null,
        state: 'idle',
        pendingFields: [],
        collectedValues: {},
        generatedDocument: null,
        documentTitle: null,
        documentSaved: false,
        savedDocumentId: null,
      });
      expect(endpoint.chatCalls).toHaveLength(1);
      expect(sessions.get('s1')?.messages).toEqual([]);
      expect(sessions.get('s1')?.selectedTemplateId).toBeNull();
    });
  });

  describe('tool-calling mode', () => {
    it('returns plain replies and records both turns', async () => {
      const endpoint = new ScriptedEndpoint([textReply('Hello! What do you need?')]);
      const { orchestrator, sessions } = setup(endpoint);

      const response = await orchestrator.processMessage({ sessionId: 's1', message: 'hi' });

      expect(response.reply).toBe('Hello! What do you need?');
      expect(response.state).toBe('conversing');
      expect(response.documentSaved).toBe(false);
      const history = sessions.get('s1')?.messages ?? [];
      expect(history.map((m) => [m.getType(), extractTextContent(m.content)])).toEqual([
        ['human', 'hi'],
        ['ai', 'Hello! What do you need?'],
      ]);
    });

    it('falls back to a fixed reply for empty text', async () => {
      const { orchestrator } = setup(new ScriptedEndpoint([textReply('')]));
      const response = await orchestrator.processMessage({ sessionId: 's1', message: 'hi' });
      expect(response.reply).toBe(FALLBACK_REPLY);
    });

    it('sends the template listing and a match hint in the system prompt', async () => {
      const endpoint = new ScriptedEndpoint([textReply('Sure.')]);
      const { orchestrator } = setup(endpoint);

      await orchestrator.processMessage({ sessionId: 's1', message: 'I need an NDA' });

      const [call] = endpoint.chatCalls;
      const system = call.messages[0];
      expect(system).toBeInstanceOf(SystemMessage);
      const prompt = extractTextContent(system.content);
      expect(prompt).toContain(
        'AVAILABLE TEMPLATES:\n- Mutual NDA (ID: tpl-nda): Confidentiality agreement between two parties\n\n'
      );
      expect(prompt).not.toContain('Retired Lease');
      expect(prompt).toContain('LIKELY TEMPLATE FOR THE LATEST REQUEST:\n- Mutual NDA (ID: tpl-nda)');
      expect(call.tools?.map((t) => t.function.name)).toEqual([
        'list_templates',
        'select_template',
        'get_template_fields',
        'generate_document',
      ]);
    });

    it('saves the document and skips the follow-up call', async () => {
      const endpoint = new ScriptedEndpoint([
        toolReply(
          '',
          { name: 'generate_document', args: { template_id: 'tpl-nda', title: 'Acme NDA', values }, id: 'c1' },
          { name: 'list_templates', args: {}, id: 'c2' }
        ),
      ]);
      const { orchestrator, documents, sessions } = setup(endpoint);

      const response = await orchestrator.processMessage({ sessionId: 's1', message: 'Acme and Globex' });

      const stored = await documents.list();
      expect(stored).toHaveLength(1);
      expect(response).toEqual({
        sessionId: 's1',
        reply: createdReply,
        templateId: 'tpl-nda',
        state: 'document_saved',
        pendingFields: [],
        collectedValues: values,
        generatedDocument: 'Agreement between Acme and Globex.',
        documentTitle: 'Acme NDA',
        documentSaved: true,
        savedDocumentId: stored[0].id,
      });
      expect(endpoint.chatCalls).toHaveLength(1);
      expect(sessions.get('s1')?.state).toBe('document_saved');
    });

    it('reports an endpoint error without touching history', async () => {
      const endpoint = new ScriptedEndpoint([
        { ok: false, error: 'Connection error: connect ECONNREFUSED' },
        textReply('Back again.'),
      ]);
      const { orchestrator, sessions } = setup(endpoint);

      const failed = await orchestrator.processMessage({ sessionId: 's1', message: 'hi' });
      expect(failed.state).toBe('error');
      expect(failed.reply).toBe('Error: Connection error: connect ECONNREFUSED');
      expect(sessions.get('s1')?.messages).toEqual([]);
      expect(sessions.get('s1')?.state).toBe('idle');

      const next = await orchestrator.processMessage({ sessionId: 's1', message: 'hi' });
      expect(next.state).toBe('conversing');
      expect(next.reply).toBe('Back again.');
    });

    it('feeds tool results back for a follow-up reply', async () => {
      const endpoint = new ScriptedEndpoint([
        toolReply('Let me check.', { name: 'select_template', args: { template_id: 'tpl-nda' } }),
        textReply('Who are the two parties?'),
      ]);
      const { orchestrator, sessions } = setup(endpoint);

      const response = await orchestrator.processMessage({ sessionId: 's1', message: 'NDA please' });

      expect(response.reply).toBe('Who are the two parties?');
      expect(response.templateId).toBe('tpl-nda');
      expect(response.pendingFields).toEqual(['party_a', 'party_b']);
      expect(response.state).toBe('conversing');

      const history = sessions.get('s1')?.messages ?? [];
      expect(history.map((m) => m.getType())).toEqual(['human', 'ai', 'tool', 'ai']);
      const toolMessage = history[2];
      expect(toolMessage).toBeInstanceOf(ToolMessage);
      expect(toolMessage instanceof ToolMessage && toolMessage.tool_call_id).toBe('call_0');
      expect(JSON.parse(extractTextContent(toolMessage.content))).toEqual({
        success: true,
        template: { id: 'tpl-nda', name: 'Mutual NDA', description: 'Confidentiality agreement between two parties' },
      });

      expect(endpoint.chatCalls[1].messages.map((m) => m.getType())).toEqual(['system', 'human', 'ai', 'tool']);
    });

    it('keeps the first reply when the follow-up call fails', async () => {
      const endpoint = new ScriptedEndpoint([
        toolReply('Let me check.', { name: 'list_templates', args: {} }),
        { ok: false, error: 'Connection error: timeout' },
      ]);
      const { orchestrator } = setup(endpoint);

      const response = await orchestrator.processMessage({ sessionId: 's1', message: 'what do you have?' });

      expect(response.reply).toBe('Let me check.');
      expect(response.state).toBe('conversing');
    });

    it('returns malformed tool arguments to the model as an error', async () => {
      const endpoint = new ScriptedEndpoint([
        toolReply('', { name: 'get_template_fields', args: {}, id: 'c1' }),
        textReply('Which template did you mean?'),
      ]);
      const { orchestrator, sessions } = setup(endpoint);

      const response = await orchestrator.processMessage({ sessionId: 's1', message: 'fields?' });

      expect(response.reply).toBe('Which template did you mean?');
      const toolMessage = sessions.get('s1')?.messages[2];
      expect(toolMessage && JSON.parse(extractTextContent(toolMessage.content))).toEqual({
        success: false,
        error: 'Invalid arguments for get_template_fields: template_id: Required',
      });
    });

    it('preselects an active template passed with the message', async () => {
      const { orchestrator } = setup(new ScriptedEndpoint([textReply('Who are the parties?'), textReply('Ok.')]));

      const selected = await orchestrator.processMessage({ sessionId: 's1', message: 'start', templateId: 'tpl-nda' });
      expect(selected.templateId).toBe('tpl-nda');
      expect(selected.pendingFields).toEqual(['party_a', 'party_b']);

      const ignored = await orchestrator.processMessage({ sessionId: 's2', message: 'start', templateId: 'tpl-old' });
      expect(ignored.templateId).toBeNull();
    });

    it('lists fields named like object properties as pending', async () => {
      const signature = makeTemplate({ id: 'tpl-sig', name: 'Signature Block', content: 'By {constructor} and {toString}' });
      const services = createMemoryServices(new ScriptedEndpoint([textReply('Who signs?')]), [signature]);

      const response = await services.orchestrator.processMessage({
        sessionId: 's1',
        message: 'start',
        templateId: 'tpl-sig',
      });

      expect(response.pendingFields).toEqual(['constructor', 'tostring']);
    });
  });

  describe('structured-prompt mode', () => {
    const directive = (templateId: string) =>
      JSON.stringify({ action: 'generate_document', template_id: templateId, title: 'Acme NDA', values }, null, 1);

    it('generates the document from the fenced directive', async () => {
      const endpoint = new ScriptedEndpoint([], [{ ok: true, value: `All set.\n\`\`\`json\n${directive('tpl-nda')}\n\`\`\`` }]);
      const services = setup(endpoint);
      await services.settings.update({ useToolCalling: false });

      const response = await services.orchestrator.processMessage({ sessionId: 's1', message: 'Acme and Globex' });

      expect(endpoint.chatCalls).toHaveLength(0);
      expect(endpoint.completeCalls[0]).toContain('CONVERSATION HISTORY:\nUser: Acme and Globex\n');
      expect(endpoint.completeCalls[0]).toContain('Current user message: Acme and Globex');
      expect(response.reply).toBe(`All set.\n\n${createdReply}`);
      expect(response.state).toBe('document_saved');
      expect(response.generatedDocument).toBe('Agreement between Acme and Globex.');
      expect(await services.documents.list()).toHaveLength(1);
    });

    it('returns the raw reply when the directive cannot be carried out', async () => {
      const raw = `Done.\n\`\`\`json\n${directive('missing')}\n\`\`\``;
      const endpoint = new ScriptedEndpoint([], [{ ok: true, value: raw }]);
      const services = setup(endpoint);
      await services.settings.update({ useToolCalling: false });

      const response = await services.orchestrator.processMessage({ sessionId: 's1', message: 'go' });

      expect(response.reply).toBe(raw);
      expect(response.state).toBe('conversing');
      expect(await services.documents.list()).toEqual([]);
    });

    it('reports an endpoint error without touching history', async () => {
      const endpoint = new ScriptedEndpoint([], [{ ok: false, error: 'Connection error: refused' }]);
      const services = setup(endpoint);
      await services.settings.update({ useToolCalling: false });

      const response = await services.orchestrator.processMessage({ sessionId: 's1', message: 'hi' });

      expect(response.state).toBe('error');
      expect(response.reply).toBe('Error: Connection error: refused');
      expect(services.sessions.get('s1')?.messages).toEqual([]);
    });
  });

  it('reads the settings on every message', async () => {
    const endpoint = new ScriptedEndpoint([textReply('From chat.')], [{ ok: true, value: 'From completion.' }]);
    const services = setup(endpoint);

    await services.orchestrator.processMessage({ sessionId: 's1', message: 'one' });
    await services.settings.update({ useToolCalling: false });
    const second = await services.orchestrator.processMessage({ sessionId: 's1', message: 'two' });

    expect(second.reply).toBe('From completion.');
    expect(endpoint.completeCalls[0]).toContain('User: one\nAssistant: From chat.\nUser: two');
  });
});
