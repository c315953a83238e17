/**
 * Model Families
 *
 * Option adjustments keyed by model family. Adding a family here is enough
 * for the resolver to apply it.
 */

import type { RequestOptions } from '../types.js';

export interface ModelFamily {
  name: string;
  /** Model id fragments; each must start the id or follow a `-`, `/` or `.` */
  match: readonly string[];
  /** Options renamed for this family, old name to new name */
  renameOptions?: Readonly<Record<string, string>>;
  /** Options the family rejects */
  removeOptions?: readonly string[];
}

/**
 * Built-in families.
 */
export const MODEL_FAMILIES: readonly ModelFamily[] = [
  {
    // OpenAI reasoning models accept only the default sampling settings
    name: 'openai-reasoning',
    match: ['o1', 'o3', 'o4-mini'],
    renameOptions: { max_tokens: 'max_completion_tokens' },
    removeOptions: ['temperature', 'top_p'],
  },
];

function fragmentPattern(fragment: string): RegExp {
  const escaped = fragment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?:^|[-/.])${escaped}(?:$|[-.])`);
}

/**
 * Families whose fragments appear in the model id.
 */
export function findModelFamilies(
  model: string,
  families: readonly ModelFamily[] = MODEL_FAMILIES
): ModelFamily[] {
  return families.filter((family) => family.match.some((fragment) => fragmentPattern(fragment).test(model)));
}

/**
 * Apply every matching family's renames and removals to a copy of `options`.
 */
export function applyModelFamilies(
  model: string,
  options: Readonly<RequestOptions>,
  families: readonly ModelFamily[] = MODEL_FAMILIES
): RequestOptions {
  const adjusted: RequestOptions = { ...options };

  for (const family of findModelFamilies(model, families)) {
    for (const [from, to] of Object.entries(family.renameOptions ?? {})) {
      if (from in adjusted) {
        adjusted[to] = adjusted[from];
        delete adjusted[from];
      }
    }
    for (const key of family.removeOptions ?? []) {
      delete adjusted[key];
    }
  }

  return adjusted;
}
