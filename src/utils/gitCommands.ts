/**
 * git command execution.
 *
 * Uses spawn() with array arguments, never a shell, so paths and revision
 * names are passed through literally.
 *
 * @example
 * const { stdout } = await execGitCommand(['rev-parse', 'HEAD'], repoPath);
 */

import { spawn } from 'child_process';

export interface GitCommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Non-zero exit from git. stderr is kept for classification.
 */
export class GitCommandError extends Error {
  constructor(
    public readonly args: readonly string[],
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(stderr.trim() || `git ${args[0] ?? ''} failed with code ${exitCode}`);
    this.name = 'GitCommandError';
  }
}

/**
 * Run git and resolve with stdout, stderr and exit code regardless of status.
 * Rejects only when git itself cannot be started.
 */
export function runGitCommand(args: string[], cwd: string): Promise<GitCommandResult> {
  return new Promise((resolve, reject) => {
    const git = spawn('git', args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0', LC_ALL: 'C' }
    });

    const stdout: Buffer[] = [];
    let stderr = '';

    git.stdout.on('data', (data: Buffer) => {
      stdout.push(data);
    });

    git.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    git.on('close', (code: number | null) => {
      resolve({ stdout: Buffer.concat(stdout).toString('utf-8'), stderr, code: code ?? 1 });
    });

    git.on('error', (error: Error) => {
      reject(error);
    });
  });
}

/**
 * Run git and resolve with stdout, rejecting with GitCommandError on failure
 */
export async function execGitCommand(args: string[], cwd: string): Promise<string> {
  const result = await runGitCommand(args, cwd);
  if (result.code !== 0) {
    throw new GitCommandError(args, result.code, result.stderr);
  }
  return result.stdout;
}

/**
 * Split NUL-terminated output from `-z` commands
 */
export function splitNul(output: string): string[] {
  return output.split('\0').filter(entry => entry.length > 0);
}
