/**
 * Step outputs for GitHub Actions: `key=value` lines appended to the file
 * named by $GITHUB_OUTPUT.
 */

import { promises as fs } from 'node:fs';

import { ReleaseError } from '../errors.js';

export type OutputValue = string | number | boolean;

export function formatGithubOutput(values: Record<string, OutputValue>): string {
  return Object.entries(values)
    .map(([key, value]) => {
      const text = String(value);
      if (/[\r\n]/.test(text)) {
        throw new ReleaseError(`Output "${key}" must be a single line`, { operation: 'writeGithubOutput' });
      }
      return `${key}=${text}\n`;
    })
    .join('');
}

export async function appendGithubOutput(filePath: string, values: Record<string, OutputValue>): Promise<void> {
  await fs.appendFile(filePath, formatGithubOutput(values), 'utf-8');
}
