#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { TriageLogger } from '../logger/index.js';
import { resolveRuleSet } from '../rules/resolver.js';
import { readLogLines, LogSourceError, STDIN_MARKER } from '../source/index.js';
import { bucket } from '../classifier/index.js';
import { openTerminalInput, renderAllSections, runViewer } from '../viewer/index.js';
import { palette, renderRunBanner } from '../output/index.js';
import type { LogEntry, ResolvedRules, TriageConfig } from '../types/index.js';

const program = new Command();

/** Echo log entries to stderr: warnings always, the rest under --verbose. */
function printEntry(entry: LogEntry, verbose: boolean): void {
  switch (entry.level) {
    case 'fatal':
    case 'error':
      console.error(palette.error(`error: ${entry.message}`));
      break;
    case 'warn':
      console.error(palette.warning(`warning: ${entry.message}`));
      break;
    default:
      if (verbose) console.error(palette.dim(`${entry.level}: ${entry.message}`));
  }
}

program
  .name('dmesg-triage')
  .description('Sort kernel log lines into severity buckets and browse them interactively')
  .version('0.1.0')
  .showHelpAfterError('(run dmesg-triage --help for usage information)')
  .addHelpText('after', `
Examples:
  $ sudo dmesg-triage
  $ dmesg-triage --file /var/log/kern.log
  $ journalctl -k --no-pager | dmesg-triage --file -
  $ dmesg-triage --rules ./my-rules.toml --pager "most"

Rules lookup order:
  --rules <path>, $XDG_CONFIG_HOME/dmesg-triage/rules.toml,
  /etc/dmesg-triage/rules.toml, built-in defaults
`)
  .option('-f, --file <path>', 'Read the log from a file ("-" for stdin) instead of the live log')
  .option('-r, --rules <path>', 'Rules file (TOML)')
  .option('--command <cmd>', 'Command producing the live log (default: dmesg)')
  .option('--pager <cmd>', 'Pager used to show a section (default: less -R)')
  .option('--log-file <path>', 'Write structured JSON logs to this file')
  .option('--verbose', 'Print debug output to stderr')
  .action(async (options: {
    file?: string;
    rules?: string;
    command?: string;
    pager?: string;
    logFile?: string;
    verbose?: boolean;
  }) => {
    // a. Load config with CLI overrides
    let config: TriageConfig;
    try {
      config = loadConfig({
        file: options.file,
        rules: options.rules,
        command: options.command,
        pager: options.pager,
        logFile: options.logFile,
        verbose: options.verbose,
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`Configuration error: ${msg}\n`);
      console.error('Check your DMESG_TRIAGE_* environment variables or CLI flags.');
      process.exit(1);
    }

    // b. Logger, echoed to the terminal
    const logger = new TriageLogger({
      logFile: config.logFile,
      level: config.verbose ? 'debug' : 'info',
    });
    logger.on('entry', (entry: LogEntry) => printEntry(entry, config.verbose));

    const fail = async (message: string): Promise<never> => {
      logger.log('fatal', 'cli', message);
      await logger.flush();
      process.exit(1);
    };

    // c. Resolve the active rule set
    let resolved: ResolvedRules;
    try {
      resolved = await resolveRuleSet({ explicitPath: config.rules, logger });
    } catch (err) {
      return fail(err instanceof Error ? err.message : String(err));
    }

    // d. Read and classify the log
    let lines: string[];
    try {
      lines = await readLogLines({ file: config.file, command: config.command });
    } catch (err) {
      if (err instanceof LogSourceError) {
        return fail(`Log source error: ${err.message}`);
      }
      throw err;
    }
    logger.log('debug', 'cli', `Read ${lines.length} log lines`);
    const buckets = bucket(lines, resolved.rules);

    // e. Browse. With the log on stdin, the menu reads keys from the terminal.
    console.log(renderRunBanner(buckets, resolved.source));
    const input = config.file === STDIN_MARKER ? openTerminalInput() : process.stdin;
    if (!input) {
      logger.log('warn', 'cli', 'No terminal for the menu; printing all sections');
      process.stdout.write(renderAllSections(buckets));
    } else {
      await runViewer(buckets, { pager: config.pager, logger, input });
    }

    await logger.flush();
    process.exit(0);
  });

// f. Top-level error handling
try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
}
