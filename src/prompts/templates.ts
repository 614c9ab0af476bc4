import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LoadedTemplate, TemplateEngine } from './template-engine.js';

import { collectTemplateSources, createTemplateEngine, loadTemplate, renderTemplate } from './template-engine.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const PROMPTS_DIR = join(__dirname, '..', 'prompts');

const TEMPLATE_FILES = {
  system: 'system.md',
  continueStep: 'continue-step.md',
  retryAfterError: 'retry-after-error.md',
  requestContext: 'request-context.md',
} as const;

export type TemplateKey = keyof typeof TEMPLATE_FILES;

const TEMPLATE_KEYS: readonly TemplateKey[] = ['system', 'continueStep', 'retryAfterError', 'requestContext'];

const TEMPLATE_SOURCES = collectTemplateSources(PROMPTS_DIR, Object.values(TEMPLATE_FILES));
const PROMPT_ENGINE: TemplateEngine = createTemplateEngine(TEMPLATE_SOURCES);

const TEMPLATE_REGISTRY = new Map<TemplateKey, LoadedTemplate>(
  TEMPLATE_KEYS.map((key): [TemplateKey, LoadedTemplate] => [key, loadTemplate(PROMPT_ENGINE, TEMPLATE_FILES[key])])
);

const templateFor = (key: TemplateKey): LoadedTemplate => {
  const template = TEMPLATE_REGISTRY.get(key);
  if (template === undefined) throw new Error(`prompt template not registered: ${key}`);
  return template;
};

export const renderPromptTemplate = (key: TemplateKey, context: Record<string, unknown>): string => (
  renderTemplate(PROMPT_ENGINE, templateFor(key), context)
);

export const getPromptTemplateSource = (key: TemplateKey): string => templateFor(key).source;
