import { BaseMessage, HumanMessage } from "@langchain/core/messages";
import { cleanJSON, stripJsonBlock, JSON_FENCE } from "../cleanJSON";
import { extractTextContent } from "../modelEndpoint";
import { AgentTurn, BaseAgent, documentCreatedReply } from "./BaseAgent";
import { parseToolCall, ToolInvocation } from "./tools";

export const HISTORY_WINDOW = 10;
export const ACTION_MARKER = '"action": "generate_document"';

export function renderHistory(messages: BaseMessage[]): string {
  return messages
    .slice(-HISTORY_WINDOW)
    .map((m) => `${m instanceof HumanMessage ? "User" : "Assistant"}: ${extractTextContent(m.content)}`)
    .join("\n");
}

/** The generate_document directive embedded in a reply, if there is a usable one. */
export function findGenerateAction(reply: string): ToolInvocation | null {
  if (!reply.includes(JSON_FENCE) || !reply.includes(ACTION_MARKER)) {
    return null;
  }

  const data = cleanJSON(reply);
  if (!data || typeof data !== "object" || !("action" in data) || data.action !== "generate_document") {
    return null;
  }

  const args = {
    template_id: "template_id" in data ? data.template_id : undefined,
    title: "title" in data ? data.title : undefined,
    values: "values" in data ? data.values : undefined,
  };
  return parseToolCall("generate_document", args);
}

/**
 * Fallback for models without native tool calling: the whole exchange is one
 * prompt, and the model signals completion with a fenced JSON directive.
 */
export class StructuredPromptAgent extends BaseAgent {
  async respond(userMessage: string): Promise<AgentTurn> {
    const humanMessage = this.getHumanMessage(userMessage);
    const context = await this.buildTemplateContext(userMessage);
    const history = renderHistory([...this.session.messages, humanMessage]);

    const prompt = `${context}

CONVERSATION HISTORY:
${history}

INSTRUCTIONS:
You are helping the user create a document. Based on the conversation:
1. If user wants to create a document, identify the best matching template
2. Ask for required information conversationally
3. When you have ALL required information, output a JSON block to generate the document

To generate a document, include this JSON block in your response:
\`\`\`json
{"action": "generate_document", "template_id": "...", "title": "...", "values": {"field1": "value1", ...}}
\`\`\`

Current user message: ${userMessage}

Respond naturally. If you need more information, ask for it. Only include the JSON block when you have everything needed.`;

    const result = await this.endpoint.complete(prompt, this.settings);
    if (!result.ok) {
      return this.endpointError(result.error);
    }

    this.addToHistory(humanMessage);
    const raw = result.value;

    const action = findGenerateAction(raw);
    if (action && action.tool === "generate_document") {
      const outcome = await this.executor.execute(action, this.session);
      if (outcome.kind === "document_generated") {
        const reply = [stripJsonBlock(raw), documentCreatedReply(outcome.payload.message)]
          .filter(Boolean)
          .join("\n\n");
        this.addToHistory(this.getAIMessage(reply));
        return this.documentSaved(reply, action.templateId, action.values, outcome.payload);
      }
      console.warn("[StructuredPromptAgent] Document action not executed:", outcome.payload);
    } else if (action) {
      console.warn("[StructuredPromptAgent] Ignoring unusable document action:", action);
    }

    this.addToHistory(this.getAIMessage(raw));
    return this.reply(raw);
  }
}
