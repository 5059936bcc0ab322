import { SystemMessage, HumanMessage, AIMessage, BaseMessage } from "@langchain/core/messages";
import { ModelEndpoint } from "../modelEndpoint";
import { matchTemplate } from "../templateMatcher";
import { TemplateStore } from "../templateStore";
import { ChatSession, FieldValues, ModelSettings, Template } from "../types";
import { TurnEvent } from "./conversationState";
import { DocumentGeneratedPayload, ToolExecutor } from "./tools";

export const FALLBACK_REPLY = "I'm here to help you create documents. What would you like to create?";

export function documentCreatedReply(message: string): string {
  return `✅ **Document Created!**\n\n${message}\n\nYour document has been saved to the Documents section.`;
}

export interface AgentContext {
  session: ChatSession;
  settings: ModelSettings;
  templates: TemplateStore;
  endpoint: ModelEndpoint;
  executor: ToolExecutor;
}

export type AgentTurn =
  | { event: Exclude<TurnEvent, "document_saved" | "reset">; reply: string }
  | {
      event: "document_saved";
      reply: string;
      templateId: string;
      values: FieldValues;
      document: DocumentGeneratedPayload;
    };

export abstract class BaseAgent {
  protected session: ChatSession;
  protected settings: ModelSettings;
  protected templates: TemplateStore;
  protected endpoint: ModelEndpoint;
  protected executor: ToolExecutor;

  constructor(context: AgentContext) {
    this.session = context.session;
    this.settings = context.settings;
    this.templates = context.templates;
    this.endpoint = context.endpoint;
    this.executor = context.executor;
  }

  abstract respond(userMessage: string): Promise<AgentTurn>;

  protected getSystemMessage(content: string): SystemMessage {
    return new SystemMessage(content);
  }

  protected getHumanMessage(content: string): HumanMessage {
    return new HumanMessage(content);
  }

  protected getAIMessage(content: string): AIMessage {
    return new AIMessage(content);
  }

  protected addToHistory(message: BaseMessage): void {
    this.session.messages.push(message);
  }

  /**
   * System prompt plus the active-template listing. While nothing is
   * selected, the best keyword match for the latest message is offered as a
   * hint.
   */
  protected async buildTemplateContext(userMessage: string): Promise<string> {
    const templates = await this.templates.listActive();
    const sections = [this.settings.systemPrompt, `AVAILABLE TEMPLATES:\n${formatTemplateListing(templates)}`];

    if (!this.session.selectedTemplateId) {
      const likely = matchTemplate(userMessage, templates);
      if (likely) {
        sections.push(`LIKELY TEMPLATE FOR THE LATEST REQUEST:\n- ${likely.name} (ID: ${likely.id})`);
      }
    }

    return sections.join("\n\n");
  }

  protected reply(reply: string): AgentTurn {
    return { event: "reply", reply };
  }

  protected endpointError(error: string): AgentTurn {
    console.error(`[${this.constructor.name}] Model endpoint error:`, error);
    return { event: "endpoint_error", reply: `Error: ${error}` };
  }

  protected documentSaved(
    reply: string,
    templateId: string,
    values: FieldValues,
    document: DocumentGeneratedPayload
  ): AgentTurn {
    return { event: "document_saved", reply, templateId, values, document };
  }
}

export function formatTemplateListing(templates: Template[]): string {
  return templates
    .filter((t) => t.isActive)
    .map((t) => `- ${t.name} (ID: ${t.id}): ${t.description || "No description"}`)
    .join("\n");
}
