// Package entry point - re-exports public API
export {
  RuleSchema,
  RuleSetSchema,
  CATEGORY_PRIORITY,
  TriageConfigSchema,
} from './types/index.js';

export type {
  Rule,
  RuleSet,
  LogCategory,
  ClassifiedLine,
  Buckets,
  ResolvedRules,
  TriageConfig,
  LogLevel,
  LogEntry,
  LogSink,
} from './types/index.js';

export {
  parseRuleSet,
  loadRuleFile,
  MalformedConfigError,
  SourceUnavailableError,
  EmbeddedRulesError,
  DEFAULT_RULES,
  EMBEDDED_SOURCE,
} from './rules/index.js';
export {
  resolveRuleSet,
  ruleCandidates,
  userConfigDir,
  SYSTEM_RULES_PATH,
} from './rules/resolver.js';
export type { RuleTier, RuleCandidate, ResolveRulesOptions } from './rules/resolver.js';

export { classify, matchesRule, bucket, bucketCounts } from './classifier/index.js';

export { decorate, isKnownColor, normalizeColorName, renderBanner, renderRunBanner } from './output/index.js';

export { loadConfig } from './config/index.js';

export { TriageLogger } from './logger/index.js';
export type { TriageLoggerOptions } from './logger/index.js';
export { RingBuffer } from './logger/ring-buffer.js';

export { readLogLines, splitLines, LogSourceError, STDIN_MARKER } from './source/index.js';
export type { LogSourceOptions } from './source/index.js';

export {
  runViewer,
  buildMenuChoices,
  renderAllSections,
  showInPager,
  ViewerUnavailableError,
} from './viewer/index.js';
export type { ViewerChoice, MenuChoice, ViewerOptions } from './viewer/index.js';
