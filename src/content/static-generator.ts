import * as fs from 'fs';
import { z } from 'zod';
import { NotFoundError } from '../errors/index.js';
import type { ContentContext, ContentGenerator } from '../messaging/index.js';

const catalogueSchema = z.record(z.record(z.string()));

export type PromptCatalogue = z.infer<typeof catalogueSchema>;

export const DEFAULT_PROMPTS_URL = new URL('../../content/prompts.json', import.meta.url);

export function loadPromptCatalogue(source: URL | string = DEFAULT_PROMPTS_URL): PromptCatalogue {
  const raw: unknown = JSON.parse(fs.readFileSync(source, 'utf-8'));
  return catalogueSchema.parse(raw);
}

/** Replace `{{name}}` placeholders; unknown names render empty. */
export function renderTemplate(template: string, variables: Record<string, string> = {}): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_, name: string) => variables[name] ?? '');
}

/**
 * Content generator backed by a fixed prompt catalogue.
 */
export class StaticContentGenerator implements ContentGenerator {
  private catalogue: PromptCatalogue;

  constructor(catalogue: PromptCatalogue = loadPromptCatalogue()) {
    this.catalogue = catalogue;
  }

  async generate(_participantId: string, context: ContentContext): Promise<string> {
    const template = this.catalogue[context.flowType]?.[context.prompt];
    if (template === undefined) {
      throw new NotFoundError('prompt', `${context.flowType}/${context.prompt}`);
    }
    return renderTemplate(template, context.variables);
  }
}
