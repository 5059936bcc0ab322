import type { BaseMessage } from "@langchain/core/messages";

export interface Template {
  id: string;
  name: string;
  description: string | null;
  content: string; // raw body; may be a rich-text delta JSON string
  category: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface TemplateInput {
  name: string;
  description?: string | null;
  content: string;
  category?: string;
  isActive?: boolean;
}

export type TemplatePatch = Partial<TemplateInput>;

export type FieldValues = Record<string, unknown>;

export interface GeneratedDocument {
  id: string;
  title: string;
  content: string;
  templateId: string | null;
  templateName: string | null;
  filledValues: FieldValues;
  createdAt: string;
  updatedAt: string;
}

export interface DocumentInput {
  title: string;
  content: string;
  templateId?: string | null;
  templateName?: string | null;
  filledValues?: FieldValues;
}

export interface DocumentPatch {
  title?: string;
  content?: string;
  filledValues?: FieldValues;
}

/** Field name -> human-readable prompt for that field. */
export type PlaceholderMap = Record<string, string>;

export type ConversationState = "idle" | "conversing" | "document_saved" | "error";

export interface ChatSession {
  id: string;
  state: ConversationState;
  messages: BaseMessage[];
  selectedTemplateId: string | null;
  collectedValues: FieldValues;
  generatedDocument: string | null;
  documentTitle: string | null;
  createdAt: Date;
}

export interface ChatResponse {
  sessionId: string;
  reply: string;
  templateId: string | null;
  state: ConversationState;
  pendingFields: string[];
  collectedValues: FieldValues;
  generatedDocument: string | null;
  documentTitle: string | null;
  documentSaved: boolean;
  savedDocumentId: string | null;
}

export interface ModelSettings {
  baseUrl: string;
  modelName: string;
  useToolCalling: boolean;
  systemPrompt: string;
  temperature: number;
  topP: number;
  topK: number;
  numCtx: number;
  repeatPenalty: number;
}
