// Fixtures shared by the test suites.

import type { BaseMessage } from '@langchain/core/messages';
import type { ToolDefinition } from '@langchain/core/language_models/base';
import { AssistantReply, EndpointResult, ModelEndpoint } from './modelEndpoint';
import { ModelSettings, Template } from './types';

export function makeTemplate(overrides: Partial<Template> = {}): Template {
  return {
    id: 'tpl-nda',
    name: 'Mutual NDA',
    description: 'Confidentiality agreement between two parties',
    content: 'Agreement between {party_a} and {party_b}.',
    category: 'legal',
    isActive: true,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export interface RecordedChat {
  messages: BaseMessage[];
  settings: ModelSettings;
  tools?: ToolDefinition[];
}

/** Model endpoint that answers from queues of canned results. */
export class ScriptedEndpoint implements ModelEndpoint {
  readonly chatCalls: RecordedChat[] = [];
  readonly completeCalls: string[] = [];

  constructor(
    private readonly chatResults: EndpointResult<AssistantReply>[] = [],
    private readonly completeResults: EndpointResult<string>[] = []
  ) {}

  async chat(
    messages: BaseMessage[],
    settings: ModelSettings,
    tools?: ToolDefinition[]
  ): Promise<EndpointResult<AssistantReply>> {
    this.chatCalls.push({ messages: [...messages], settings, tools });
    return this.chatResults.shift() ?? { ok: false, error: 'no scripted chat result' };
  }

  async complete(prompt: string): Promise<EndpointResult<string>> {
    this.completeCalls.push(prompt);
    return this.completeResults.shift() ?? { ok: false, error: 'no scripted completion' };
  }
}

export function textReply(text: string): EndpointResult<AssistantReply> {
  return { ok: true, value: { text, toolCalls: [] } };
}

export function toolReply(
  text: string,
  ...toolCalls: Array<{ name: string; args: Record<string, unknown>; id?: string }>
): EndpointResult<AssistantReply> {
  return { ok: true, value: { text, toolCalls } };
}
