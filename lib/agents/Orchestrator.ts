import { DocumentStore } from "../documentStore";
import { ModelEndpoint } from "../modelEndpoint";
import { extractTemplateFields } from "../placeholders";
import { SessionStore } from "../sessionStore";
import { SettingsProvider } from "../settingsStore";
import { TemplateStore } from "../templateStore";
import { ChatResponse, ChatSession } from "../types";
import { AgentContext, AgentTurn, BaseAgent } from "./BaseAgent";
import { transition, turnState } from "./conversationState";
import { StructuredPromptAgent } from "./StructuredPromptAgent";
import { ToolCallingAgent } from "./ToolCallingAgent";
import { ToolExecutor } from "./tools";

export const RESET_COMMANDS = ["reset", "start over", "cancel", "new", "clear"];
export const RESET_REPLY = "🔄 Conversation reset. How can I help you create a document today?";

export function isResetCommand(message: string): boolean {
  return RESET_COMMANDS.includes(message.trim().toLowerCase());
}

export interface OrchestratorDeps {
  templates: TemplateStore;
  documents: DocumentStore;
  sessions: SessionStore;
  settings: SettingsProvider;
  endpoint: ModelEndpoint;
}

export interface IncomingMessage {
  sessionId: string;
  message: string;
  templateId?: string;
}

export class Orchestrator {
  private readonly executor: ToolExecutor;

  constructor(private readonly deps: OrchestratorDeps) {
    this.executor = new ToolExecutor(deps.templates, deps.documents);
  }

  async processMessage({ sessionId, message, templateId }: IncomingMessage): Promise<ChatResponse> {
    console.log("[Orchestrator] Processing message for session", sessionId);

    // read on every message so settings changes apply to the next turn
    const settings = await this.deps.settings.load();

    if (isResetCommand(message)) {
      return this.reset(sessionId);
    }

    const session = this.deps.sessions.getOrCreate(sessionId);

    if (templateId && templateId !== session.selectedTemplateId) {
      const template = await this.deps.templates.get(templateId);
      if (template?.isActive) {
        session.selectedTemplateId = template.id;
      } else {
        console.warn("[Orchestrator] Ignoring unknown or inactive template", templateId);
      }
    }

    const context: AgentContext = {
      session,
      settings,
      templates: this.deps.templates,
      endpoint: this.deps.endpoint,
      executor: this.executor,
    };
    const agent: BaseAgent = settings.useToolCalling
      ? new ToolCallingAgent(context)
      : new StructuredPromptAgent(context);

    const turn = await agent.respond(message);
    session.state = transition(session.state, turn.event);
    console.log("[Orchestrator] Turn finished:", turn.event, "- session state:", session.state);

    return this.buildResponse(session, turn);
  }

  reset(sessionId: string): ChatResponse {
    const session = this.deps.sessions.reset(sessionId);
    session.state = transition(session.state, "reset");
    console.log("[Orchestrator] Session reset", sessionId);

    return {
      sessionId,
      reply: RESET_REPLY,
      templateId: null,
      state: session.state,
      pendingFields: [],
      collectedValues: {},
      generatedDocument: null,
      documentTitle: null,
      documentSaved: false,
      savedDocumentId: null,
    };
  }

  /** Fields of the selected template that have no collected value yet. */
  async pendingFields(session: ChatSession): Promise<string[]> {
    if (!session.selectedTemplateId) {
      return [];
    }
    const template = await this.deps.templates.get(session.selectedTemplateId);
    if (!template) {
      return [];
    }
    const { fields } = extractTemplateFields(template.content);
    return Object.keys(fields).filter((field) => !Object.hasOwn(session.collectedValues, field));
  }

  private async buildResponse(session: ChatSession, turn: AgentTurn): Promise<ChatResponse> {
    const state = turnState(session.state, turn.event);

    if (turn.event === "document_saved") {
      return {
        sessionId: session.id,
        reply: turn.reply,
        templateId: turn.templateId,
        state,
        pendingFields: await this.pendingFields(session),
        collectedValues: turn.values,
        generatedDocument: turn.document.content,
        documentTitle: turn.document.title,
        documentSaved: true,
        savedDocumentId: turn.document.documentId,
      };
    }

    return {
      sessionId: session.id,
      reply: turn.reply,
      templateId: session.selectedTemplateId,
      state,
      pendingFields: await this.pendingFields(session),
      collectedValues: session.collectedValues,
      generatedDocument: null,
      documentTitle: null,
      documentSaved: false,
      savedDocumentId: null,
    };
  }
}
