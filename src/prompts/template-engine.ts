import { readFileSync } from 'node:fs';
import path from 'node:path';

import { Liquid, type Template } from 'liquidjs';

export interface LoadedTemplate {
  name: string;
  source: string;
  parsed: Template[];
}

export interface TemplateEngine {
  engine: Liquid;
  templates: Record<string, string>;
}

const toPosixPath = (value: string): string => value.split(path.sep).join('/');

export const templateKeyFromFilePath = (rootDir: string, filePath: string): string => {
  const normalized = toPosixPath(path.relative(rootDir, filePath));
  if (normalized.length > 0 && !normalized.startsWith('..')) {
    return normalized;
  }
  return toPosixPath(path.resolve(filePath));
};

// Files end with a newline that is not part of the prompt text.
const stripFinalNewline = (source: string): string => source.replace(/\r?\n$/, '');

export const collectTemplateSources = (
  rootDir: string,
  entryFiles: readonly string[],
): Record<string, string> => {
  const templates: Record<string, string> = {};
  entryFiles.forEach((entry) => {
    const resolved = path.resolve(rootDir, entry);
    let source: string;
    try {
      source = readFileSync(resolved, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new Error(`prompt template not found: ${resolved}`);
      }
      throw new Error(`failed to read prompt template: ${resolved} - ${error instanceof Error ? error.message : String(error)}`);
    }
    templates[templateKeyFromFilePath(rootDir, resolved)] = stripFinalNewline(source);
  });
  return templates;
};

export const createTemplateEngine = (templates: Record<string, string>): TemplateEngine => {
  const engine = new Liquid({
    templates,
    extname: '',
    cache: false,
    strictFilters: true,
    strictVariables: true,
  });
  return { engine, templates };
};

export const loadTemplate = (
  templateEngine: TemplateEngine,
  templateKey: string,
): LoadedTemplate => {
  if (!Object.prototype.hasOwnProperty.call(templateEngine.templates, templateKey)) {
    throw new Error(`template source missing for key: ${templateKey}`);
  }
  return {
    name: templateKey,
    source: templateEngine.templates[templateKey],
    parsed: templateEngine.engine.parse(templateEngine.templates[templateKey]),
  };
};

export const renderTemplate = (
  templateEngine: TemplateEngine,
  template: LoadedTemplate,
  context: Record<string, unknown>,
): string => {
  const rendered: unknown = templateEngine.engine.renderSync(template.parsed, context);
  if (typeof rendered === 'string') return rendered;
  return String(rendered);
};
