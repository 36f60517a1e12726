// Rule model: TOML text in, validated immutable RuleSet out

import { readFile } from 'node:fs/promises';
import { parse } from 'smol-toml';
import { RuleSetSchema } from '../types/index.js';
import type { RuleSet } from '../types/index.js';
import { MalformedConfigError, SourceUnavailableError } from './errors.js';

export { MalformedConfigError, SourceUnavailableError, EmbeddedRulesError } from './errors.js';
export { DEFAULT_RULES, EMBEDDED_SOURCE } from './defaults.js';

/**
 * Parse a rules document.
 *
 * The document needs the four tables critical, error, warning and info, each
 * with `keywords`, `color` and `icon`. Anything missing or of the wrong type
 * rejects the whole document.
 *
 * @param text - TOML source
 * @param origin - Where the text came from, used in error messages
 * @throws MalformedConfigError on a TOML syntax error or a shape violation
 */
export function parseRuleSet(text: string, origin = 'rules document'): RuleSet {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err: unknown) {
    // smol-toml appends a code excerpt after the first line
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedConfigError(origin, message.split('\n')[0] ?? message, { cause: err });
  }

  const result = RuleSetSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedConfigError(origin, issues);
  }

  return result.data;
}

/**
 * Read and parse a rules file.
 *
 * @throws SourceUnavailableError when the file is missing or unreadable
 * @throws MalformedConfigError when the contents do not parse
 */
export async function loadRuleFile(path: string): Promise<RuleSet> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new SourceUnavailableError(path, err);
  }
  return parseRuleSet(raw, path);
}
