import { z } from 'zod';
import { TemplateStore } from './templateStore';
import { Template } from './types';
import { createTemplateSchema } from './validation';

export const seedFileSchema = z.array(createTemplateSchema);

/** Insert seed templates whose names are not in the store yet. */
export async function seedTemplates(store: TemplateStore, raw: unknown): Promise<Template[]> {
  const entries = seedFileSchema.parse(raw);
  const existing = new Set((await store.list()).map((t) => t.name.toLowerCase()));

  const created: Template[] = [];
  for (const entry of entries) {
    if (existing.has(entry.name.toLowerCase())) {
      continue;
    }
    created.push(await store.create(entry));
    existing.add(entry.name.toLowerCase());
  }
  return created;
}
