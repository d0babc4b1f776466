/**
 * Email Template Renderer
 *
 * Compiles placeholder templates such as `<td>{person_name}</td>` against an
 * explicit placeholder → formatter mapping. Compilation fails when the
 * template text lacks a mapped placeholder, so a broken template is rejected
 * before anything is rendered or sent.
 */

import { TemplateError } from '@/lib/errors';
import type { TemplateName } from './types';

/**
 * Maps each required placeholder name to the function producing its value
 */
export type PlaceholderFormatters<TInput, TKey extends string = string> = Record<
  TKey,
  (input: TInput) => string
>;

export interface CompiledTemplate<TInput> {
  readonly name: TemplateName;
  readonly source: string;
  readonly placeholders: readonly string[];
  render(input: TInput): string;
}

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Placeholders from `required` that do not occur in `source`
 */
export function findMissingPlaceholders(source: string, required: readonly string[]): string[] {
  return required.filter((name) => !source.includes(`{${name}}`));
}

/**
 * Compile a template. Throws TemplateError listing every missing placeholder.
 *
 * Rendering substitutes mapped placeholders only; any other brace pair in
 * the template (inline CSS, for example) is copied through unchanged.
 */
export function compileTemplate<TInput, TKey extends string>(
  name: TemplateName,
  source: string,
  formatters: PlaceholderFormatters<TInput, TKey>
): CompiledTemplate<TInput> {
  const entries: Array<[string, (input: TInput) => string]> = Object.entries(formatters);
  const placeholders = entries.map(([key]) => key);

  const missing = findMissingPlaceholders(source, placeholders);
  if (missing.length > 0) {
    throw new TemplateError(name, missing);
  }

  const lookup = new Map(entries);

  return {
    name,
    source,
    placeholders,
    render(input: TInput): string {
      return source.replace(PLACEHOLDER_PATTERN, (match: string, key: string) => {
        const format = lookup.get(key);
        return format ? format(input) : match;
      });
    },
  };
}
