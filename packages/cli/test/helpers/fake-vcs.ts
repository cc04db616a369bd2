import { GitCommandError, type Logger, type VcsClient } from '@reposnap/core';

export type VcsCall = 'stageAll' | 'hasStagedChanges' | 'commit' | 'push' | 'pull';

export interface FakeVcsOptions {
  staged?: boolean;
  failOn?: VcsCall;
}

/**
 * In-memory VcsClient that records every call.
 */
export class FakeVcs implements VcsClient {
  readonly calls: VcsCall[] = [];
  readonly commitMessages: string[] = [];
  private staged: boolean;
  private failOn?: VcsCall;

  constructor(options: FakeVcsOptions = {}) {
    this.staged = options.staged ?? true;
    this.failOn = options.failOn;
  }

  async stageAll(): Promise<void> {
    this.record('stageAll');
  }

  async hasStagedChanges(): Promise<boolean> {
    this.record('hasStagedChanges');
    return this.staged;
  }

  async commit(message: string): Promise<void> {
    this.record('commit');
    this.commitMessages.push(message);
  }

  async push(): Promise<void> {
    this.record('push');
  }

  async pull(): Promise<void> {
    this.record('pull');
  }

  private record(call: VcsCall): void {
    this.calls.push(call);
    if (this.failOn === call) {
      throw new GitCommandError(call, 1, `simulated ${call} failure`);
    }
  }
}

export function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`),
  };
  return { lines, logger };
}
