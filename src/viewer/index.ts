// Interactive section menu over the classified buckets
// Uses @inquirer/prompts select; Ctrl+C ends the session like "Exit"

import { select } from '@inquirer/prompts';
import { CATEGORY_PRIORITY } from '../types/index.js';
import type { Buckets, LogCategory, LogSink } from '../types/index.js';
import { showInPager, ViewerUnavailableError } from './pager.js';

export { showInPager, ViewerUnavailableError } from './pager.js';
export { openTerminalInput } from './terminal.js';

export type ViewerChoice = LogCategory | 'exit';

export interface MenuChoice {
  name: string;
  value: ViewerChoice;
}

/** Minimal writable interface for testability. */
interface WritableOutput {
  write(data: string): boolean;
}

export interface ViewerOptions {
  /** Pager command line used by the default `page` implementation. */
  pager: string;
  logger: LogSink;
  /** Prompt for a section. Defaults to an inquirer select. */
  choose?: (choices: MenuChoice[]) => Promise<ViewerChoice>;
  /** Display a section's content. Defaults to showInPager. */
  page?: (content: string) => Promise<void>;
  output?: WritableOutput;
  /** Keyboard input for the default prompt. Defaults to process.stdin. */
  input?: NodeJS.ReadableStream;
}

const SECTION_LABELS: Record<LogCategory, string> = {
  critical: '🔥 Criticals',
  error: '❌ Errors',
  warning: '⚠️  Warnings',
  info: 'ℹ️  Ok',
};

export function buildMenuChoices(buckets: Buckets): MenuChoice[] {
  return [
    ...CATEGORY_PRIORITY.map((category) => ({
      name: `${SECTION_LABELS[category]} (${buckets[category].length})`,
      value: category,
    })),
    { name: '🚪 Exit', value: 'exit' },
  ];
}

function promptSection(
  choices: MenuChoice[],
  input?: NodeJS.ReadableStream,
): Promise<ViewerChoice> {
  return select(
    {
      message: 'Section:',
      choices,
      pageSize: choices.length,
    },
    input ? { input } : undefined,
  );
}

/**
 * Every section one after another, for when no menu can be shown.
 */
export function renderAllSections(buckets: Buckets): string {
  return buildMenuChoices(buckets)
    .flatMap(({ name, value }) => {
      if (value === 'exit') return [];
      return [`== ${name} ==`, ...buckets[value], ''];
    })
    .join('\n');
}

/** ExitPromptError from @inquirer/prompts, raised on Ctrl+C. */
function isPromptCancel(err: unknown): boolean {
  return err instanceof Error && err.name === 'ExitPromptError';
}

/**
 * Run the menu loop until the user picks Exit or cancels the prompt.
 *
 * When the pager cannot be launched the section is written to `output`
 * directly and the loop continues.
 */
export async function runViewer(buckets: Buckets, options: ViewerOptions): Promise<void> {
  const choose = options.choose ?? ((choices: MenuChoice[]) => promptSection(choices, options.input));
  const page = options.page ?? ((content: string) => showInPager(content, options.pager));
  const output = options.output ?? process.stdout;
  const choices = buildMenuChoices(buckets);

  for (;;) {
    output.write('\n✔ Choose a section to view:\n\n');

    let choice: ViewerChoice;
    try {
      choice = await choose(choices);
    } catch (err: unknown) {
      if (isPromptCancel(err)) {
        output.write('Exited via Ctrl+C.\n');
        return;
      }
      throw err;
    }

    if (choice === 'exit') {
      output.write('Exiting...\n');
      return;
    }

    const content = buckets[choice].join('\n');
    try {
      await page(content);
    } catch (err: unknown) {
      if (!(err instanceof ViewerUnavailableError)) throw err;
      options.logger.log('warn', 'viewer', `${err.message}; printing section directly`);
      output.write(content === '' ? '' : `${content}\n`);
    }
  }
}
