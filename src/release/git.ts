/**
 * Git access for the assembler: only the tag list is needed.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface GitClient {
  listTags(): Promise<string[]>;
}

export class GitCliClient implements GitClient {
  constructor(private readonly cwd: string) {}

  async listTags(): Promise<string[]> {
    const { stdout } = await execFileAsync('git', ['tag', '--list'], { cwd: this.cwd });
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}

export function createGitClient(cwd: string): GitClient {
  return new GitCliClient(cwd);
}
