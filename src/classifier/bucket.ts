import type { Buckets, LogCategory, RuleSet } from '../types/index.js';
import { classify } from './classify.js';

/**
 * Partition lines into the four category buckets in a single pass.
 *
 * Matched lines go in decorated; unmatched lines go to info verbatim.
 * Each bucket keeps the input order of its lines.
 */
export function bucket(lines: Iterable<string>, rules: RuleSet): Buckets {
  const buckets: Buckets = { critical: [], error: [], warning: [], info: [] };

  for (const line of lines) {
    const classified = classify(line, rules);
    if (classified) {
      buckets[classified.category].push(classified.text);
    } else {
      buckets.info.push(line);
    }
  }

  return buckets;
}

export function bucketCounts(buckets: Buckets): Record<LogCategory, number> {
  return {
    critical: buckets.critical.length,
    error: buckets.error.length,
    warning: buckets.warning.length,
    info: buckets.info.length,
  };
}
