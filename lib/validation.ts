import { z } from 'zod';

const fieldValuesSchema = z.record(z.unknown());

// Stored records

export const templateRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable().default(null),
  content: z.string(),
  category: z.string().default('custom'),
  isActive: z.boolean().default(true),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const documentRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  templateId: z.string().nullable().default(null),
  templateName: z.string().nullable().default(null),
  filledValues: fieldValuesSchema.default({}),
  createdAt: z.string(),
  updatedAt: z.string(),
});

// Request bodies

export const createTemplateSchema = z.object({
  name: z.string().min(1, 'Template name is required').max(200),
  description: z.string().nullable().optional(),
  content: z.string(),
  category: z.string().min(1).optional(),
  isActive: z.boolean().optional(),
});

export const updateTemplateSchema = createTemplateSchema.partial();

export const createDocumentSchema = z.object({
  title: z.string().min(1, 'Document title is required'),
  content: z.string(),
  templateId: z.string().nullable().optional(),
  templateName: z.string().nullable().optional(),
  filledValues: fieldValuesSchema.optional(),
});

export const updateDocumentSchema = z.object({
  title: z.string().min(1).optional(),
  content: z.string().optional(),
  filledValues: fieldValuesSchema.optional(),
});

export const chatMessageSchema = z.object({
  message: z.string().min(1, 'Message is required'),
  sessionId: z.string().min(1).optional(),
  templateId: z.string().min(1).optional(),
});

export const matchTemplateSchema = z.object({
  text: z.string().min(1),
});

export const ACCEPTED_TEMPLATE_EXTENSIONS = ['docx', 'txt', 'md'] as const;

export const MAX_TEMPLATE_FILE_BYTES = 5 * 1024 * 1024; // 5MB
