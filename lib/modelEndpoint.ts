import { ChatOllama, Ollama } from "@langchain/ollama";
import type { BaseMessage, MessageContent } from "@langchain/core/messages";
import type { ToolCall } from "@langchain/core/messages/tool";
import type { ToolDefinition } from "@langchain/core/language_models/base";
import { CHAT_TIMEOUT_MS, GENERATE_TIMEOUT_MS } from "./config";
import { ModelSettings } from "./types";

export type EndpointResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface AssistantReply {
  text: string;
  toolCalls: ToolCall[];
}

/**
 * The locally hosted model server. Implementations never throw: transport
 * failures, timeouts and bad statuses come back as `{ ok: false }`.
 */
export interface ModelEndpoint {
  chat(
    messages: BaseMessage[],
    settings: ModelSettings,
    tools?: ToolDefinition[]
  ): Promise<EndpointResult<AssistantReply>>;
  complete(prompt: string, settings: ModelSettings): Promise<EndpointResult<string>>;
}

export function extractTextContent(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }

  return content
    .map((block) => ("text" in block && typeof block.text === "string" ? block.text : ""))
    .join("");
}

function describeError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `Connection error: no response from the model server within ${timeoutMs / 1000}s`;
    }
    return `Connection error: ${error.message}`;
  }
  return `Connection error: ${String(error)}`;
}

function samplingOptions(settings: ModelSettings) {
  return {
    baseUrl: settings.baseUrl.replace(/\/+$/, ""),
    model: settings.modelName,
    temperature: settings.temperature,
    topP: settings.topP,
    topK: settings.topK,
    numCtx: settings.numCtx,
    repeatPenalty: settings.repeatPenalty,
  };
}

export class OllamaEndpoint implements ModelEndpoint {
  async chat(
    messages: BaseMessage[],
    settings: ModelSettings,
    tools?: ToolDefinition[]
  ): Promise<EndpointResult<AssistantReply>> {
    const model = new ChatOllama(samplingOptions(settings));
    const options = { signal: AbortSignal.timeout(CHAT_TIMEOUT_MS) };

    try {
      const result =
        tools && tools.length > 0
          ? await model.bindTools(tools).invoke(messages, options)
          : await model.invoke(messages, options);

      return {
        ok: true,
        value: {
          text: extractTextContent(result.content),
          toolCalls: result.tool_calls ?? [],
        },
      };
    } catch (error) {
      console.error("[OllamaEndpoint] Chat call failed:", error);
      return { ok: false, error: describeError(error, CHAT_TIMEOUT_MS) };
    }
  }

  async complete(prompt: string, settings: ModelSettings): Promise<EndpointResult<string>> {
    const model = new Ollama(samplingOptions(settings));

    try {
      const text = await model.invoke(prompt, { signal: AbortSignal.timeout(GENERATE_TIMEOUT_MS) });
      return { ok: true, value: text };
    } catch (error) {
      console.error("[OllamaEndpoint] Generate call failed:", error);
      return { ok: false, error: describeError(error, GENERATE_TIMEOUT_MS) };
    }
  }
}
