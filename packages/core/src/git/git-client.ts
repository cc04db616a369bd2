/**
 * Git-backed implementation of the VcsClient capability.
 */

import { spawn } from 'node:child_process';
import { GitCommandError } from '../errors/index.js';
import type { CommandResult, CommandRunner, VcsClient } from '../types/index.js';

export async function spawnCommand(command: string, args: string[], cwd: string): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data) => { stdout += data.toString(); });
    proc.stderr.on('data', (data) => { stderr += data.toString(); });

    proc.on('close', (code) => {
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });

    proc.on('error', reject);
  });
}

export interface GitClientOptions {
  cwd: string;
  gitPath?: string;
  runner?: CommandRunner;
}

export class GitClient implements VcsClient {
  private cwd: string;
  private gitPath: string;
  private runner: CommandRunner;

  constructor(options: GitClientOptions) {
    this.cwd = options.cwd;
    this.gitPath = options.gitPath ?? 'git';
    this.runner = options.runner ?? spawnCommand;
  }

  async stageAll(): Promise<void> {
    await this.run(['add', '.']);
  }

  /**
   * `git diff --cached --quiet` exits 1 when the index has changes and 0
   * when it has none. Any other outcome is a failure.
   */
  async hasStagedChanges(): Promise<boolean> {
    const args = ['diff', '--cached', '--quiet'];
    const result = await this.exec(args);
    if (result.exitCode === 0) return false;
    if (result.exitCode === 1) return true;
    throw new GitCommandError(args.join(' '), result.exitCode, result.stderr || result.stdout);
  }

  async commit(message: string): Promise<void> {
    await this.run(['commit', '-m', message]);
  }

  async push(): Promise<void> {
    await this.run(['push'], 'Check the remote and your credentials');
  }

  async pull(): Promise<void> {
    await this.run(['pull'], 'Resolve conflicts or network issues, then run again');
  }

  private async run(args: string[], hint?: string): Promise<string> {
    const result = await this.exec(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args.join(' '), result.exitCode, result.stderr || result.stdout, hint);
    }
    return result.stdout;
  }

  private async exec(args: string[]): Promise<CommandResult> {
    try {
      return await this.runner(this.gitPath, args, this.cwd);
    } catch (error) {
      throw new GitCommandError(
        args.join(' '),
        null,
        error instanceof Error ? error.message : String(error),
        `Make sure ${this.gitPath} is installed and on PATH`,
      );
    }
  }
}
