/**
 * Prompt Manager
 *
 * Named prompt templates with `{{variable}}` placeholders. Templates are
 * markdown files with optional YAML front matter:
 *
 * ```markdown
 * ---
 * title: Code review
 * variables: [code, language]
 * ---
 * Review the following {{language}} code: {{code}}
 * ```
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { errorMessage, PromptNotFoundError, PromptParseError } from '../errors.js';
import type { TemplateVars } from '../types.js';
import { renderTemplate } from '../utils/template.js';

const frontMatterSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  variables: z.array(z.string()).optional(),
}).passthrough();

export type PromptMeta = z.infer<typeof frontMatterSchema>;

export interface PromptTemplate {
  content: string;
  meta: PromptMeta;
}

const FRONT_MATTER_PATTERN = /^---\s*\n([\s\S]*?)\n---\s*\n?([\s\S]*)$/;

/**
 * Split a markdown file into front matter and body.
 *
 * @throws {PromptParseError} when the front matter is not valid YAML or has wrongly typed fields
 */
export function parsePromptFile(source: string, file = '<inline>'): PromptTemplate {
  const match = FRONT_MATTER_PATTERN.exec(source);
  if (!match) {
    return { content: source.trim(), meta: {} };
  }

  let raw: unknown;
  try {
    raw = parseYaml(match[1]);
  } catch (error) {
    throw new PromptParseError(`Invalid front matter: ${errorMessage(error)}`, file, { cause: error });
  }

  const meta = frontMatterSchema.safeParse(raw ?? {});
  if (!meta.success) {
    const issues = meta.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PromptParseError(`Invalid front matter (${issues})`, file);
  }

  return {
    content: match[2].trim(),
    meta: meta.data,
  };
}

/**
 * Collect `*.md` files below a directory.
 */
function listMarkdownFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listMarkdownFiles(path));
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      files.push(path);
    }
  }
  return files;
}

export class PromptManager {
  private readonly prompts = new Map<string, PromptTemplate>();

  /**
   * Load every markdown file under `dir`. `blog/intro.md` is named `blog_intro`.
   */
  static fromDirectory(dir: string): PromptManager {
    const manager = new PromptManager();
    if (!existsSync(dir)) {
      return manager;
    }

    for (const file of listMarkdownFiles(dir)) {
      const name = relative(dir, file).slice(0, -'.md'.length).split(sep).join('_');
      const template = parsePromptFile(readFileSync(file, 'utf-8'), file);
      manager.add(name, template.content, template.meta);
    }
    return manager;
  }

  get(name: string): string {
    return this.template(name).content;
  }

  getMeta(name: string): PromptMeta {
    return this.template(name).meta;
  }

  render(name: string, vars: TemplateVars = {}): string {
    return renderTemplate(this.get(name), vars);
  }

  add(name: string, content: string, meta: PromptMeta = {}): void {
    this.prompts.set(name, { content, meta });
  }

  exists(name: string): boolean {
    return this.prompts.has(name);
  }

  list(): string[] {
    return Array.from(this.prompts.keys()).sort();
  }

  private template(name: string): PromptTemplate {
    const template = this.prompts.get(name);
    if (!template) {
      throw new PromptNotFoundError(name);
    }
    return template;
  }
}
