import { z } from "zod";
import type { ToolDefinition } from "@langchain/core/language_models/base";
import { DocumentStore } from "../documentStore";
import { fillTemplate } from "../fillTemplate";
import { extractTemplateFields } from "../placeholders";
import { TemplateStore } from "../templateStore";
import { ChatSession, FieldValues, PlaceholderMap, Template } from "../types";

export const TOOL_NAMES = ["list_templates", "select_template", "get_template_fields", "generate_document"] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export const TEMPLATE_PREVIEW_LENGTH = 500;
export const DEFAULT_DOCUMENT_TITLE = "Untitled Document";

// Catalog sent to the model endpoint with every tool-calling request
export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "list_templates",
      description:
        "List all available document templates. Call this to see what templates are available before selecting one.",
      parameters: { type: "object", properties: {}, required: [] },
    },
  },
  {
    type: "function",
    function: {
      name: "select_template",
      description:
        "Select a template to use for document creation. Call this when you've identified which template the user needs.",
      parameters: {
        type: "object",
        properties: {
          template_id: { type: "string", description: "The ID of the template to use" },
          reason: { type: "string", description: "Brief explanation of why this template was selected" },
        },
        required: ["template_id"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "get_template_fields",
      description:
        "Get the required fields/placeholders for a specific template. Call this after selecting a template to know what information to collect.",
      parameters: {
        type: "object",
        properties: {
          template_id: { type: "string", description: "The ID of the template" },
        },
        required: ["template_id"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "generate_document",
      description:
        "Generate and save the final document with all collected values. Call this ONLY when you have ALL required information from the user.",
      parameters: {
        type: "object",
        properties: {
          template_id: { type: "string", description: "The ID of the template to use" },
          title: { type: "string", description: "Title for the generated document" },
          values: {
            type: "object",
            description: "Key-value pairs of field names and their values collected from the user",
          },
        },
        required: ["template_id", "title", "values"],
      },
    },
  },
];

function parseJsonString(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

const selectTemplateArgs = z.object({
  template_id: z.string().min(1),
  reason: z.string().optional(),
});

const templateFieldsArgs = z.object({
  template_id: z.string().min(1),
});

const generateDocumentArgs = z.object({
  template_id: z.string().min(1),
  title: z
    .string()
    .default(DEFAULT_DOCUMENT_TITLE)
    .transform((title) => (title.trim() ? title : DEFAULT_DOCUMENT_TITLE)),
  // small models sometimes send the values object as a JSON string
  values: z.preprocess(parseJsonString, z.record(z.unknown())).default({}),
});

export type ToolInvocation =
  | { tool: "list_templates" }
  | { tool: "select_template"; templateId: string; reason?: string }
  | { tool: "get_template_fields"; templateId: string }
  | { tool: "generate_document"; templateId: string; title: string; values: FieldValues }
  | { tool: "malformed"; name: ToolName; issues: string; raw: unknown }
  | { tool: "unknown"; name: string };

function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

function malformed(name: ToolName, error: z.ZodError, raw: unknown): ToolInvocation {
  const issues = error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
  return { tool: "malformed", name, issues, raw };
}

/** Validate a model-requested call into one of the known invocation shapes. */
export function parseToolCall(name: string, rawArgs: unknown): ToolInvocation {
  if (!isToolName(name)) {
    return { tool: "unknown", name };
  }

  const args = parseJsonString(rawArgs) ?? {};

  switch (name) {
    case "list_templates":
      return { tool: "list_templates" };

    case "select_template": {
      const parsed = selectTemplateArgs.safeParse(args);
      if (!parsed.success) return malformed(name, parsed.error, rawArgs);
      return { tool: "select_template", templateId: parsed.data.template_id, reason: parsed.data.reason };
    }

    case "get_template_fields": {
      const parsed = templateFieldsArgs.safeParse(args);
      if (!parsed.success) return malformed(name, parsed.error, rawArgs);
      return { tool: "get_template_fields", templateId: parsed.data.template_id };
    }

    case "generate_document": {
      const parsed = generateDocumentArgs.safeParse(args);
      if (!parsed.success) return malformed(name, parsed.error, rawArgs);
      return {
        tool: "generate_document",
        templateId: parsed.data.template_id,
        title: parsed.data.title,
        values: parsed.data.values,
      };
    }
  }
}

export interface TemplateSummary {
  id: string;
  name: string;
  description: string | null;
}

export interface TemplateFieldsPayload {
  templateId: string;
  templateName: string;
  fields: string[];
  fieldDescriptions: PlaceholderMap;
  templatePreview: string;
}

export interface DocumentGeneratedPayload {
  success: true;
  documentId: string;
  title: string;
  content: string;
  message: string;
}

export interface ToolFailurePayload {
  success: false;
  error: string;
}

export type ToolOutcome =
  | { kind: "templates"; payload: { templates: TemplateSummary[] } }
  | { kind: "template_selected"; payload: { success: true; template: TemplateSummary } }
  | { kind: "template_fields"; payload: TemplateFieldsPayload }
  | { kind: "document_generated"; payload: DocumentGeneratedPayload }
  | { kind: "failed"; payload: ToolFailurePayload };

function summarize(template: Template): TemplateSummary {
  return { id: template.id, name: template.name, description: template.description };
}

function failed(error: string): ToolOutcome {
  return { kind: "failed", payload: { success: false, error } };
}

export function previewText(text: string): string {
  return text.length > TEMPLATE_PREVIEW_LENGTH ? `${text.slice(0, TEMPLATE_PREVIEW_LENGTH)}...` : text;
}

export class ToolExecutor {
  constructor(
    private readonly templates: TemplateStore,
    private readonly documents: DocumentStore
  ) {}

  async execute(invocation: ToolInvocation, session: ChatSession): Promise<ToolOutcome> {
    try {
      return await this.dispatch(invocation, session);
    } catch (error) {
      console.error(`[ToolExecutor] ${invocation.tool} failed:`, error);
      return failed(`Tool ${invocation.tool} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async dispatch(invocation: ToolInvocation, session: ChatSession): Promise<ToolOutcome> {
    switch (invocation.tool) {
      case "list_templates": {
        const templates = await this.templates.listActive();
        return { kind: "templates", payload: { templates: templates.map(summarize) } };
      }

      case "select_template": {
        const template = await this.templates.get(invocation.templateId);
        if (!template) return failed("Template not found");
        session.selectedTemplateId = template.id;
        console.log("[ToolExecutor] Selected template", template.id, invocation.reason ?? "");
        return { kind: "template_selected", payload: { success: true, template: summarize(template) } };
      }

      case "get_template_fields": {
        const template = await this.templates.get(invocation.templateId);
        if (!template) return failed("Template not found");
        const { text, fields } = extractTemplateFields(template.content);
        return {
          kind: "template_fields",
          payload: {
            templateId: template.id,
            templateName: template.name,
            fields: Object.keys(fields),
            fieldDescriptions: fields,
            templatePreview: previewText(text),
          },
        };
      }

      case "generate_document":
        return this.generateDocument(invocation, session);

      case "malformed":
        console.warn(`[ToolExecutor] Malformed arguments for ${invocation.name}:`, invocation.issues, invocation.raw);
        return failed(`Invalid arguments for ${invocation.name}: ${invocation.issues}`);

      case "unknown":
        return failed(`Unknown tool: ${invocation.name}`);
    }
  }

  private async generateDocument(
    invocation: Extract<ToolInvocation, { tool: "generate_document" }>,
    session: ChatSession
  ): Promise<ToolOutcome> {
    const template = await this.templates.get(invocation.templateId);
    if (!template) return failed("Template not found");

    const { text } = extractTemplateFields(template.content);
    const content = fillTemplate(text, invocation.values);

    const doc = await this.documents.create({
      title: invocation.title,
      content,
      templateId: template.id,
      templateName: template.name,
      filledValues: invocation.values,
    });

    session.generatedDocument = content;
    session.documentTitle = invocation.title;
    session.collectedValues = invocation.values;

    return {
      kind: "document_generated",
      payload: {
        success: true,
        documentId: doc.id,
        title: invocation.title,
        content,
        message: `Document '${invocation.title}' has been created using the '${template.name}' template.`,
      },
    };
  }
}
