/**
 * Prompt Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { PromptNotFoundError, PromptParseError } from '../../errors.js';
import { parsePromptFile, PromptManager } from '../../prompts/prompt-manager.js';

describe('parsePromptFile', () => {
  it('should split front matter from the body', () => {
    const template = parsePromptFile('---\ntitle: Review\nvariables: [code]\n---\nReview {{code}}\n');

    expect(template).toEqual({
      content: 'Review {{code}}',
      meta: { title: 'Review', variables: ['code'] },
    });
  });

  it('should treat a file without front matter as all body', () => {
    expect(parsePromptFile('\nJust text.\n')).toEqual({ content: 'Just text.', meta: {} });
  });

  it('should name the file when the front matter is not valid YAML', () => {
    const parse = () => parsePromptFile('---\ntitle: [unclosed\n---\nBody', 'prompts/broken.md');

    expect(parse).toThrow(PromptParseError);
    expect(parse).toThrow(/^Invalid front matter: .+ in prompts\/broken\.md$/s);
  });

  it('should reject wrongly typed front matter fields', () => {
    expect(() => parsePromptFile('---\nvariables: code\n---\nBody', 'review.md')).toThrow(
      'Invalid front matter (variables: Expected array, received string) in review.md'
    );
  });
});

describe('PromptManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'promptgate-prompts-'));
    writeFileSync(join(dir, 'review.md'), '---\ntitle: Code review\n---\nReview this {{language}} code:\n{{code}}\n');
    mkdirSync(join(dir, 'blog'));
    writeFileSync(join(dir, 'blog', 'intro.md'), 'Write an intro about {{topic}}.');
    writeFileSync(join(dir, 'notes.txt'), 'ignored');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load markdown files with nested names joined by underscores', () => {
    const prompts = PromptManager.fromDirectory(dir);

    expect(prompts.list()).toEqual(['blog_intro', 'review']);
    expect(prompts.getMeta('review')).toEqual({ title: 'Code review' });
  });

  it('should render variables', () => {
    const prompts = PromptManager.fromDirectory(dir);

    expect(prompts.render('review', { language: 'TypeScript', code: 'let x = 1;' })).toBe(
      'Review this TypeScript code:\nlet x = 1;'
    );
    expect(prompts.render('blog_intro', { topic: 'caching' })).toBe('Write an intro about caching.');
  });

  it('should throw for unknown prompts', () => {
    const prompts = new PromptManager();

    expect(() => prompts.get('missing')).toThrow(PromptNotFoundError);
    expect(() => prompts.render('missing')).toThrow("Prompt 'missing' not found");
  });

  it('should accept prompts added in code', () => {
    const prompts = new PromptManager();
    prompts.add('greet', 'Hello {{name}}');

    expect(prompts.exists('greet')).toBe(true);
    expect(prompts.render('greet', { name: 'Ada' })).toBe('Hello Ada');
  });

  it('should be empty when the directory is missing', () => {
    expect(PromptManager.fromDirectory(join(dir, 'missing')).list()).toEqual([]);
  });
});
