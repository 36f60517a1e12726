import { openSync } from 'node:fs';
import { ReadStream } from 'node:tty';

/**
 * Open the controlling terminal for keyboard input. Needed when the log
 * itself arrives on stdin. Returns null when there is no terminal.
 */
export function openTerminalInput(): ReadStream | null {
  let fd: number;
  try {
    fd = openSync('/dev/tty', 'r');
  } catch {
    return null;
  }
  return new ReadStream(fd);
}
