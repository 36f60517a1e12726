// Barrel export for all type definitions
export {
  RuleSchema,
  RuleSetSchema,
  CATEGORY_PRIORITY,
} from './rules.js';
export type {
  Rule,
  RuleSet,
  LogCategory,
  ClassifiedLine,
  Buckets,
  ResolvedRules,
} from './rules.js';

export { TriageConfigSchema } from './config.js';
export type { TriageConfig } from './config.js';

export type {
  LogLevel,
  LogEntry,
  LogSink,
} from './log.js';
