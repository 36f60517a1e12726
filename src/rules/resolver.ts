// Rule set resolution with precedence chain:
// explicit path > user config dir > system-wide file > embedded default

import { homedir } from 'node:os';
import { isAbsolute, join } from 'node:path';
import type { LogSink, ResolvedRules, RuleSet } from '../types/index.js';
import { loadRuleFile, parseRuleSet } from './index.js';
import { DEFAULT_RULES, EMBEDDED_SOURCE } from './defaults.js';
import { EmbeddedRulesError, SourceUnavailableError } from './errors.js';

const APP_DIR = 'dmesg-triage';
const USER_RULES_FILE = 'rules.toml';

export const SYSTEM_RULES_PATH = join('/etc', APP_DIR, USER_RULES_FILE);

export type RuleTier = 'explicit' | 'user' | 'system';

export interface RuleCandidate {
  tier: RuleTier;
  path: string;
}

export interface ResolveRulesOptions {
  /** Path given with --rules. Tried first. */
  explicitPath?: string;
  /** Rules text used when no file tier succeeds. */
  embeddedDefault?: string;
  env?: NodeJS.ProcessEnv;
  systemPath?: string;
  logger: LogSink;
}

/**
 * Per-user config directory: $XDG_CONFIG_HOME, else $HOME/.config.
 * A relative XDG_CONFIG_HOME is invalid and ignored.
 */
export function userConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env['XDG_CONFIG_HOME'];
  if (xdg && isAbsolute(xdg)) return xdg;
  return join(env['HOME'] || homedir(), '.config');
}

/**
 * File tiers in the order they are tried.
 */
export function ruleCandidates(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  systemPath: string = SYSTEM_RULES_PATH,
): RuleCandidate[] {
  const candidates: RuleCandidate[] = [];
  if (explicitPath) {
    candidates.push({ tier: 'explicit', path: explicitPath });
  }
  candidates.push({ tier: 'user', path: join(userConfigDir(env), APP_DIR, USER_RULES_FILE) });
  candidates.push({ tier: 'system', path: systemPath });
  return candidates;
}

/**
 * Pick the active rule set. The first candidate that reads and parses wins;
 * every other outcome is logged and the next candidate is tried. The embedded
 * default is the last resort and must parse.
 *
 * @throws EmbeddedRulesError when the embedded default is itself malformed
 */
export async function resolveRuleSet(options: ResolveRulesOptions): Promise<ResolvedRules> {
  const { logger } = options;
  const candidates = ruleCandidates(options.explicitPath, options.env, options.systemPath);

  for (const candidate of candidates) {
    try {
      const rules = await loadRuleFile(candidate.path);
      logger.log('info', 'rules', `Using rules from ${candidate.path}`, { ...candidate });
      return { rules, source: candidate.path };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      logger.log('warn', 'rules', `Skipping ${candidate.tier} rules: ${message}`, {
        ...candidate,
        missing: err instanceof SourceUnavailableError && err.missing,
      });
    }
  }

  let rules: RuleSet;
  try {
    rules = parseRuleSet(options.embeddedDefault ?? DEFAULT_RULES, EMBEDDED_SOURCE);
  } catch (err: unknown) {
    throw new EmbeddedRulesError(err);
  }
  logger.log('info', 'rules', 'Using embedded default rules', { tier: EMBEDDED_SOURCE });
  return { rules, source: EMBEDDED_SOURCE };
}
