// Line classifier: first matching rule in severity order wins

import { CATEGORY_PRIORITY } from '../types/index.js';
import type { ClassifiedLine, Rule, RuleSet } from '../types/index.js';
import { decorate } from '../output/decorate.js';

/**
 * True when any keyword occurs in the line, ignoring case.
 * A rule without keywords never matches.
 */
export function matchesRule(line: string, rule: Rule): boolean {
  if (rule.keywords.length === 0) return false;
  const haystack = line.toLowerCase();
  return rule.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

/**
 * Classify one line against the rule set.
 *
 * Rules are checked critical, error, warning, info; the first rule whose
 * keywords match decides the category and the decoration. Returns null when
 * no rule matches.
 */
export function classify(line: string, rules: RuleSet): ClassifiedLine | null {
  for (const category of CATEGORY_PRIORITY) {
    const rule = rules[category];
    if (matchesRule(line, rule)) {
      return {
        text: decorate(line, rule.color, rule.icon),
        category,
      };
    }
  }
  return null;
}
