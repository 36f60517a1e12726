// Rule set schema for the TOML rules document
// Unknown keys are stripped (zod default) so newer documents still load

import { z } from 'zod';

export const RuleSchema = z
  .object({
    keywords: z.array(z.string().min(1, 'keyword must not be empty')).readonly(),
    color: z.string(),
    icon: z.string(),
  })
  .readonly();

export const RuleSetSchema = z
  .object({
    critical: RuleSchema,
    error: RuleSchema,
    warning: RuleSchema,
    info: RuleSchema,
  })
  .readonly();

export type Rule = z.infer<typeof RuleSchema>;
export type RuleSet = z.infer<typeof RuleSetSchema>;

export type LogCategory = 'critical' | 'error' | 'warning' | 'info';

/** Worst first. The classifier stops at the first matching rule in this order. */
export const CATEGORY_PRIORITY: readonly LogCategory[] = [
  'critical',
  'error',
  'warning',
  'info',
] as const;

export interface ClassifiedLine {
  /** Icon plus colorized line. */
  text: string;
  category: LogCategory;
}

export type Buckets = Record<LogCategory, string[]>;

export interface ResolvedRules {
  rules: RuleSet;
  /** Path that supplied the rules, or "embedded". */
  source: string;
}
