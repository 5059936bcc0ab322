import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_OLLAMA_BASE_URL, DEFAULT_TOOL_MODEL } from './config';
import { ModelSettings } from './types';

export const DEFAULT_SYSTEM_PROMPT = `You are an intelligent document assistant. Your primary task is to help users create documents based on templates.

When a user asks to create a document (like NDA, contract, letter, etc.):
1. First, identify which template best matches their request
2. Ask for any required information to fill the template
3. Once you have all needed information, generate the document

Always be helpful, professional, and accurate in your responses.`;

export const settingsSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  modelName: z.string().min(1).default(DEFAULT_TOOL_MODEL),
  useToolCalling: z.boolean().default(true),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().min(0).max(1).default(0.9),
  topK: z.number().int().min(1).default(40),
  numCtx: z.number().int().min(256).default(4096),
  repeatPenalty: z.number().min(0).default(1.1),
});

export const settingsUpdateSchema = z.object({
  baseUrl: z.string().url().optional(),
  modelName: z.string().min(1).optional(),
  useToolCalling: z.boolean().optional(),
  systemPrompt: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  topK: z.number().int().min(1).optional(),
  numCtx: z.number().int().min(256).optional(),
  repeatPenalty: z.number().min(0).optional(),
});

export type SettingsUpdate = z.infer<typeof settingsUpdateSchema>;

export function defaultSettings(): ModelSettings {
  return settingsSchema.parse({});
}

/** Source of the model settings; the chat service reads it on every message. */
export interface SettingsProvider {
  load(): Promise<ModelSettings>;
  update(patch: SettingsUpdate): Promise<ModelSettings>;
}

export class FileSettingsStore implements SettingsProvider {
  constructor(private readonly filePath: string) {}

  async load(): Promise<ModelSettings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch {
      return defaultSettings();
    }

    try {
      const parsed = settingsSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      console.warn('[SettingsStore] Invalid settings file, using defaults:', parsed.error.message);
    } catch (error) {
      console.warn('[SettingsStore] Could not parse settings file, using defaults:', error);
    }
    return defaultSettings();
  }

  async update(patch: SettingsUpdate): Promise<ModelSettings> {
    const current = await this.load();
    const updated: ModelSettings = { ...current, ...patch };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(updated, null, 2), 'utf-8');
    return updated;
  }
}

export class MemorySettingsStore implements SettingsProvider {
  private settings: ModelSettings;

  constructor(overrides: SettingsUpdate = {}) {
    this.settings = { ...defaultSettings(), ...overrides };
  }

  async load(): Promise<ModelSettings> {
    return { ...this.settings };
  }

  async update(patch: SettingsUpdate): Promise<ModelSettings> {
    this.settings = { ...this.settings, ...patch };
    return { ...this.settings };
  }
}
