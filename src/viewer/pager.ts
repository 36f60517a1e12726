// Pipe text through an external pager (less -R by default)

import { spawn } from 'node:child_process';
import { splitCommand } from '../source/index.js';

export class ViewerUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ViewerUnavailableError';
  }
}

/**
 * Show content in the pager and resolve once the pager exits.
 *
 * Content is written only after the process has spawned, so a missing pager
 * surfaces as ViewerUnavailableError rather than a broken pipe.
 */
export function showInPager(content: string, pagerCommand: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const parsed = splitCommand(pagerCommand);
    if (!parsed) {
      reject(new ViewerUnavailableError('No pager command configured'));
      return;
    }

    const child = spawn(parsed.program, parsed.args, {
      stdio: ['pipe', 'inherit', 'inherit'],
    });

    child.once('error', (err) => {
      reject(new ViewerUnavailableError(
        `Could not launch pager "${pagerCommand}": ${err.message}`,
        { cause: err },
      ));
    });

    child.stdin.on('error', (err: Error) => {
      // The user quit the pager before it read everything
      if ('code' in err && err.code === 'EPIPE') return;
      reject(err);
    });

    child.once('spawn', () => {
      child.stdin.end(content.endsWith('\n') ? content : `${content}\n`);
    });

    child.once('close', () => resolve());
  });
}
