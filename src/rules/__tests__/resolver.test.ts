import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  resolveRuleSet,
  ruleCandidates,
  userConfigDir,
} from '../resolver.js';
import { EmbeddedRulesError } from '../errors.js';
import { EMBEDDED_SOURCE } from '../defaults.js';
import { TriageLogger } from '../../logger/index.js';

function rulesDoc(criticalIcon: string): string {
  return ['critical', 'error', 'warning', 'info']
    .map((name) => `[${name}]
keywords = ["${name}-kw"]
color = "red"
icon = "${name === 'critical' ? criticalIcon : name}"
`)
    .join('\n');
}

function writeRules(path: string, text: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, text);
}

describe('resolveRuleSet', () => {
  let root: string;
  let env: NodeJS.ProcessEnv;
  let userPath: string;
  let systemPath: string;
  let logger: TriageLogger;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'dmesg-triage-resolve-'));
    env = { XDG_CONFIG_HOME: join(root, 'xdg') };
    userPath = join(root, 'xdg', 'dmesg-triage', 'rules.toml');
    systemPath = join(root, 'etc', 'dmesg-triage', 'rules.toml');
    logger = new TriageLogger();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  const warnings = () =>
    logger.getRecentEntries().filter((e) => e.level === 'warn').map((e) => e.message);

  it('uses the explicit path when it parses', async () => {
    const explicit = join(root, 'mine.toml');
    writeRules(explicit, rulesDoc('X'));
    writeRules(userPath, rulesDoc('U'));

    const result = await resolveRuleSet({ explicitPath: explicit, env, systemPath, logger });

    expect(result.source).toBe(explicit);
    expect(result.rules.critical.icon).toBe('X');
    expect(warnings()).toEqual([]);
  });

  it('falls through a malformed explicit path to the user config, with a warning', async () => {
    const explicit = join(root, 'broken.toml');
    writeRules(explicit, '[critical]\nkeywords = ["x"]\n');
    writeRules(userPath, rulesDoc('U'));

    const result = await resolveRuleSet({ explicitPath: explicit, env, systemPath, logger });

    expect(result.source).toBe(userPath);
    expect(result.rules.critical.icon).toBe('U');
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toMatch(/^Skipping explicit rules: Malformed rules in /);
  });

  it('warns about a missing explicit path', async () => {
    const explicit = join(root, 'nope.toml');

    const result = await resolveRuleSet({ explicitPath: explicit, env, systemPath, logger });

    expect(result.source).toBe(EMBEDDED_SOURCE);
    expect(warnings()).toEqual([
      `Skipping explicit rules: Cannot read rules file ${explicit}: file not found`,
      `Skipping user rules: Cannot read rules file ${userPath}: file not found`,
      `Skipping system rules: Cannot read rules file ${systemPath}: file not found`,
    ]);
  });

  it('uses the system-wide file when the user file is malformed', async () => {
    writeRules(userPath, 'not = [valid');
    writeRules(systemPath, rulesDoc('S'));

    const result = await resolveRuleSet({ env, systemPath, logger });

    expect(result.source).toBe(systemPath);
    expect(result.rules.critical.icon).toBe('S');
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toMatch(/^Skipping user rules: /);
  });

  it('warns about each absent file tier before using the embedded default', async () => {
    const result = await resolveRuleSet({ env, systemPath, logger, embeddedDefault: rulesDoc('D') });

    expect(result.source).toBe('embedded');
    expect(result.rules.critical.icon).toBe('D');
    const warned = logger.getRecentEntries().filter((e) => e.level === 'warn');
    expect(warned.map((e) => [e.meta?.['tier'], e.meta?.['missing']])).toEqual([
      ['user', true],
      ['system', true],
    ]);
    expect(logger.getRecentEntries().filter((e) => e.level === 'debug')).toEqual([]);
  });

  it('returns the embedded default when every tier is invalid', async () => {
    const explicit = join(root, 'broken.toml');
    writeRules(explicit, 'garbage');
    writeRules(userPath, '[info]\n');
    writeRules(systemPath, '');

    const result = await resolveRuleSet({ explicitPath: explicit, env, systemPath, logger });

    expect(result.source).toBe(EMBEDDED_SOURCE);
    expect(result.rules.critical.keywords).toContain('panic');
    expect(warnings()).toHaveLength(3);
  });

  it('fails hard when the embedded default does not parse', async () => {
    await expect(
      resolveRuleSet({ env, systemPath, logger, embeddedDefault: '[critical]\n' }),
    ).rejects.toBeInstanceOf(EmbeddedRulesError);
  });
});

describe('userConfigDir', () => {
  it('prefers XDG_CONFIG_HOME', () => {
    expect(userConfigDir({ XDG_CONFIG_HOME: '/cfg', HOME: '/home/tester' })).toBe('/cfg');
  });

  it('falls back to $HOME/.config when XDG_CONFIG_HOME is unset or empty', () => {
    expect(userConfigDir({ HOME: '/home/tester' })).toBe('/home/tester/.config');
    expect(userConfigDir({ XDG_CONFIG_HOME: '', HOME: '/home/tester' })).toBe('/home/tester/.config');
  });

  it('ignores a relative XDG_CONFIG_HOME', () => {
    expect(userConfigDir({ XDG_CONFIG_HOME: 'relative/cfg', HOME: '/home/tester' })).toBe(
      '/home/tester/.config',
    );
  });
});

describe('ruleCandidates', () => {
  it('lists explicit, user and system tiers in order', () => {
    const candidates = ruleCandidates('/tmp/mine.toml', { XDG_CONFIG_HOME: '/cfg' }, '/etc/x.toml');
    expect(candidates).toEqual([
      { tier: 'explicit', path: '/tmp/mine.toml' },
      { tier: 'user', path: '/cfg/dmesg-triage/rules.toml' },
      { tier: 'system', path: '/etc/x.toml' },
    ]);
  });

  it('omits the explicit tier when no path is given', () => {
    const candidates = ruleCandidates(undefined, { XDG_CONFIG_HOME: '/cfg' });
    expect(candidates.map((c) => c.tier)).toEqual(['user', 'system']);
    expect(candidates[1]!.path).toBe('/etc/dmesg-triage/rules.toml');
  });
});
