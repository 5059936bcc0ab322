import { Orchestrator } from './agents/Orchestrator';
import { DOCUMENTS_FILE, SETTINGS_FILE, TEMPLATES_FILE } from './config';
import { DocumentStore } from './documentStore';
import { ModelEndpoint, OllamaEndpoint } from './modelEndpoint';
import { JsonFileStorage, MemoryStorage } from './recordStorage';
import { SessionStore } from './sessionStore';
import { FileSettingsStore, MemorySettingsStore, SettingsProvider } from './settingsStore';
import { TemplateStore } from './templateStore';
import { GeneratedDocument, Template } from './types';
import { documentRecordSchema, templateRecordSchema } from './validation';

export interface Services {
  templates: TemplateStore;
  documents: DocumentStore;
  sessions: SessionStore;
  settings: SettingsProvider;
  endpoint: ModelEndpoint;
  orchestrator: Orchestrator;
}

type ServiceParts = Omit<Services, 'orchestrator'>;

export function createServices(parts: ServiceParts): Services {
  return { ...parts, orchestrator: new Orchestrator(parts) };
}

export function createFileServices(): Services {
  return createServices({
    templates: new TemplateStore(new JsonFileStorage<Template>(TEMPLATES_FILE, templateRecordSchema)),
    documents: new DocumentStore(new JsonFileStorage<GeneratedDocument>(DOCUMENTS_FILE, documentRecordSchema)),
    sessions: new SessionStore(),
    settings: new FileSettingsStore(SETTINGS_FILE),
    endpoint: new OllamaEndpoint(),
  });
}

export function createMemoryServices(endpoint: ModelEndpoint, templates: Template[] = []): Services {
  return createServices({
    templates: new TemplateStore(new MemoryStorage(templates)),
    documents: new DocumentStore(new MemoryStorage<GeneratedDocument>()),
    sessions: new SessionStore(),
    settings: new MemorySettingsStore(),
    endpoint,
  });
}

// Kept on globalThis so dev-server module reloads don't drop live sessions
declare global {
  // eslint-disable-next-line no-var
  var templateAssistantServices: Services | undefined;
}

export function getServices(): Services {
  if (!globalThis.templateAssistantServices) {
    globalThis.templateAssistantServices = createFileServices();
  }
  return globalThis.templateAssistantServices;
}

/** Swap the process-wide services, e.g. for in-memory ones under test. */
export function setServices(services: Services | undefined): void {
  globalThis.templateAssistantServices = services;
}
