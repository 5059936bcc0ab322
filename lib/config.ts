import path from 'path';

export const DATA_DIR = process.env.DATA_DIR || path.join(process.cwd(), 'data');

export const TEMPLATES_FILE = path.join(DATA_DIR, 'templates.json');
export const DOCUMENTS_FILE = path.join(DATA_DIR, 'documents.json');
export const SETTINGS_FILE = path.join(DATA_DIR, 'settings.json');

export const DEFAULT_OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL || 'http://localhost:11434';

// Outbound model calls block the request until they finish or time out.
export const CHAT_TIMEOUT_MS = 180_000;
export const GENERATE_TIMEOUT_MS = 180_000;
export const CONNECTION_CHECK_TIMEOUT_MS = 5_000;
export const CONNECTION_TEST_GENERATE_TIMEOUT_MS = 30_000;

export const DEFAULT_TOOL_MODEL = 'llama3.1:8b';

// Models known to support native tool calling on Ollama.
export const TOOL_CAPABLE_MODELS = [
  'llama3.1:8b',
  'llama3.1:70b',
  'llama3.2:1b',
  'llama3.2:3b',
  'llama3.3:70b',
  'qwen2.5:7b',
  'qwen2.5:14b',
  'qwen2.5:32b',
  'qwen2.5:72b',
  'qwen2.5-coder:7b',
  'mistral:7b',
  'mistral-nemo:12b',
  'mixtral:8x7b',
  'mixtral:8x22b',
  'command-r:35b',
  'command-r-plus:104b',
  'hermes3:8b',
  'hermes3:70b',
  'athene-v2:72b',
  'nemotron:70b',
  'granite3-dense:8b',
];

export function supportsToolCalling(modelName: string): boolean {
  return TOOL_CAPABLE_MODELS.some((m) => m.includes(modelName) || modelName.includes(m));
}
