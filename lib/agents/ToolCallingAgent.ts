import { AIMessage, ToolMessage } from "@langchain/core/messages";
import type { ToolCall } from "@langchain/core/messages/tool";
import { AgentTurn, BaseAgent, documentCreatedReply, FALLBACK_REPLY } from "./BaseAgent";
import { parseToolCall, TOOL_DEFINITIONS, ToolOutcome } from "./tools";

const TOOL_INSTRUCTIONS = `INSTRUCTIONS:
1. When user wants to create a document, first call list_templates or directly select_template if you know which one fits
2. After selecting, call get_template_fields to see what information is needed
3. Ask the user for ALL required information through conversation
4. Only call generate_document when you have collected ALL required values from the user
5. Be conversational and helpful - confirm information and ask clarifying questions

IMPORTANT: Do not make up information. Always ask the user for required values.`;

/** Drives a turn through the model's native tool-calling protocol. */
export class ToolCallingAgent extends BaseAgent {
  async respond(userMessage: string): Promise<AgentTurn> {
    const systemMessage = this.getSystemMessage(
      `${await this.buildTemplateContext(userMessage)}\n\n${TOOL_INSTRUCTIONS}`
    );
    const humanMessage = this.getHumanMessage(userMessage);

    const first = await this.endpoint.chat(
      [systemMessage, ...this.session.messages, humanMessage],
      this.settings,
      TOOL_DEFINITIONS
    );
    if (!first.ok) {
      return this.endpointError(first.error);
    }

    this.addToHistory(humanMessage);
    const { text, toolCalls } = first.value;

    if (toolCalls.length === 0) {
      this.addToHistory(this.getAIMessage(text));
      return this.reply(text || FALLBACK_REPLY);
    }

    const calls: ToolCall[] = toolCalls.map((call, index) => ({
      ...call,
      id: call.id ?? `call_${index}`,
    }));
    const executed: Array<{ call: ToolCall; outcome: ToolOutcome }> = [];

    for (const call of calls) {
      const invocation = parseToolCall(call.name, call.args);
      console.log("[ToolCallingAgent] Executing tool", call.name);
      const outcome = await this.executor.execute(invocation, this.session);

      if (outcome.kind === "document_generated" && invocation.tool === "generate_document") {
        // remaining calls in this batch are dropped
        const reply = documentCreatedReply(outcome.payload.message);
        this.addToHistory(this.getAIMessage(reply));
        return this.documentSaved(reply, invocation.templateId, invocation.values, outcome.payload);
      }
      executed.push({ call, outcome });
    }

    this.addToHistory(new AIMessage({ content: text, tool_calls: calls }));
    for (const { call, outcome } of executed) {
      this.addToHistory(
        new ToolMessage({
          content: JSON.stringify(outcome.payload),
          tool_call_id: call.id ?? "",
          name: call.name,
        })
      );
    }

    let reply = text;
    const followUp = await this.endpoint.chat(
      [systemMessage, ...this.session.messages],
      this.settings,
      TOOL_DEFINITIONS
    );
    if (followUp.ok && followUp.value.text) {
      reply = followUp.value.text;
      this.addToHistory(this.getAIMessage(reply));
    } else if (!followUp.ok) {
      console.warn("[ToolCallingAgent] Follow-up call failed, keeping first reply:", followUp.error);
    }

    return this.reply(reply || FALLBACK_REPLY);
  }
}
