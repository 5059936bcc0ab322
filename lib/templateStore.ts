import { v4 as uuidv4 } from 'uuid';
import { RecordStorage } from './recordStorage';
import { Template, TemplateInput, TemplatePatch } from './types';

export class TemplateStore {
  constructor(private readonly storage: RecordStorage<Template>) {}

  /** Newest-updated first, optionally filtered by name/description. */
  async list(search?: string): Promise<Template[]> {
    let templates = await this.storage.load();

    if (search) {
      const needle = search.toLowerCase();
      templates = templates.filter(
        (t) =>
          t.name.toLowerCase().includes(needle) ||
          (t.description ?? '').toLowerCase().includes(needle)
      );
    }

    return templates.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async listActive(): Promise<Template[]> {
    const templates = await this.list();
    return templates.filter((t) => t.isActive);
  }

  async get(id: string): Promise<Template | null> {
    const templates = await this.storage.load();
    return templates.find((t) => t.id === id) ?? null;
  }

  async create(input: TemplateInput): Promise<Template> {
    const now = new Date().toISOString();
    const template: Template = {
      id: uuidv4(),
      name: input.name,
      description: input.description ?? null,
      content: input.content,
      category: input.category ?? 'custom',
      isActive: input.isActive ?? true,
      createdAt: now,
      updatedAt: now,
    };

    const templates = await this.storage.load();
    await this.storage.save([...templates, template]);
    console.log('[TemplateStore] Created template', template.id, template.name);
    return template;
  }

  async update(id: string, patch: TemplatePatch): Promise<Template | null> {
    const templates = await this.storage.load();
    const index = templates.findIndex((t) => t.id === id);
    if (index === -1) {
      return null;
    }

    const current = templates[index];
    const updated: Template = {
      ...current,
      name: patch.name ?? current.name,
      description: patch.description !== undefined ? patch.description : current.description,
      content: patch.content ?? current.content,
      category: patch.category ?? current.category,
      isActive: patch.isActive ?? current.isActive,
      updatedAt: new Date().toISOString(),
    };
    templates[index] = updated;
    await this.storage.save(templates);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const templates = await this.storage.load();
    const remaining = templates.filter((t) => t.id !== id);
    if (remaining.length === templates.length) {
      return false;
    }
    await this.storage.save(remaining);
    return true;
  }
}
