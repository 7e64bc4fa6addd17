/**
 * User-facing alerts for a failed gate.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface Notifier {
  alert(title: string, message: string): Promise<void>;
}

/**
 * Escape a value for use inside an AppleScript string literal
 */
export function escapeAppleScript(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Builds the AppleScript for a blocking stop-icon dialog
 */
export function buildDialogScript(title: string, message: string): string {
  return (
    `display dialog "${escapeAppleScript(message)}" with title "${escapeAppleScript(title)}" ` +
    'buttons {"OK"} default button "OK" with icon stop'
  );
}

/**
 * Modal dialog through osascript; blocks until the user dismisses it
 */
export class OsascriptNotifier implements Notifier {
  async alert(title: string, message: string): Promise<void> {
    await execFileAsync('osascript', ['-e', buildDialogScript(title, message)]);
  }
}

export class ConsoleNotifier implements Notifier {
  constructor(private readonly write: (line: string) => void = (line) => console.error(line)) {}

  async alert(title: string, message: string): Promise<void> {
    this.write(`${title}: ${message}`);
  }
}

/**
 * A dialog on macOS when enabled, otherwise a console line through `write`
 */
export function createNotifier(dialog: boolean, write?: (line: string) => void): Notifier {
  return dialog && process.platform === 'darwin' ? new OsascriptNotifier() : new ConsoleNotifier(write);
}
