/**
 * Config Tests
 *
 * Resolution order (options, environment, defaults) and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_COUNTER_SNAPSHOT,
  DEFAULT_TIMESTAMP_SNAPSHOT,
  defaultDestDir,
  loadEnvFile,
  loadProjectEnv,
  resolveCounterSnapshotConfig,
  resolveTimestampSnapshotConfig,
} from '../src/config/config.js';
import { ConfigError } from '../src/errors/index.js';

describe('resolveCounterSnapshotConfig', () => {
  const workDir = '/work/MyProject';

  describe('default values', () => {
    it('should derive the project name from the work directory', () => {
      const resolved = resolveCounterSnapshotConfig({ workDir }, {});
      expect(resolved.projectName).toBe('MyProject');
    });

    it('should default the destination to the desktop', () => {
      const resolved = resolveCounterSnapshotConfig({ workDir }, {});
      expect(resolved.destDir).toBe(defaultDestDir());
      expect(resolved.destDir).toBe(path.join(os.homedir(), 'Desktop'));
    });

    it('should apply default keep, counter file and commit policy', () => {
      const resolved = resolveCounterSnapshotConfig({ workDir }, {});
      expect(resolved.keep).toBe(3);
      expect(resolved.counterPath).toBe('/work/MyProject/.snapshot_count');
      expect(resolved.commitPolicy).toBe('if-staged');
    });
  });

  describe('environment', () => {
    it('should read values from the environment', () => {
      const resolved = resolveCounterSnapshotConfig({ workDir }, {
        REPOSNAP_DEST_DIR: '/backups',
        REPOSNAP_KEEP: '5',
        REPOSNAP_PROJECT: 'Renamed',
        REPOSNAP_COUNTER_FILE: 'state/count',
        REPOSNAP_COMMIT_POLICY: 'always',
      });

      expect(resolved).toEqual({
        workDir,
        projectName: 'Renamed',
        destDir: '/backups',
        keep: 5,
        counterPath: '/work/MyProject/state/count',
        commitPolicy: 'always',
      });
    });

    it('should treat blank variables as unset', () => {
      const resolved = resolveCounterSnapshotConfig({ workDir }, { REPOSNAP_KEEP: '  ', REPOSNAP_PROJECT: '' });
      expect(resolved.keep).toBe(DEFAULT_COUNTER_SNAPSHOT.keep);
      expect(resolved.projectName).toBe('MyProject');
    });

    it('should expand ~ in paths', () => {
      const resolved = resolveCounterSnapshotConfig({ workDir }, { REPOSNAP_DEST_DIR: '~/Snapshots' });
      expect(resolved.destDir).toBe(path.join(os.homedir(), 'Snapshots'));
    });
  });

  describe('options', () => {
    it('should prefer options over the environment', () => {
      const resolved = resolveCounterSnapshotConfig(
        { workDir, destDir: 'out', keep: 1, commitPolicy: 'if-staged' },
        { REPOSNAP_DEST_DIR: '/backups', REPOSNAP_KEEP: '5', REPOSNAP_COMMIT_POLICY: 'always' },
      );

      expect(resolved.destDir).toBe('/work/MyProject/out');
      expect(resolved.keep).toBe(1);
      expect(resolved.commitPolicy).toBe('if-staged');
    });
  });

  describe('validation', () => {
    it('should reject a non-numeric keep', () => {
      expect(() => resolveCounterSnapshotConfig({ workDir }, { REPOSNAP_KEEP: 'many' })).toThrow(ConfigError);
    });

    it('should reject a negative keep', () => {
      expect(() => resolveCounterSnapshotConfig({ workDir, keep: -1 }, {})).toThrow(/keep/);
    });

    it('should reject keeping zero snapshots', () => {
      expect(() => resolveCounterSnapshotConfig({ workDir, keep: 0 }, {})).toThrow(/^Invalid configuration: keep: /);
      expect(() => resolveCounterSnapshotConfig({ workDir }, { REPOSNAP_KEEP: '0' })).toThrow(ConfigError);
    });

    it('should reject an unknown commit policy', () => {
      expect(() => resolveCounterSnapshotConfig({ workDir }, { REPOSNAP_COMMIT_POLICY: 'never' })).toThrow(
        /^Invalid configuration: commitPolicy: /,
      );
    });
  });
});

describe('resolveTimestampSnapshotConfig', () => {
  const workDir = '/work/MyProject';

  it('should apply defaults', () => {
    const resolved = resolveTimestampSnapshotConfig({ workDir }, {});

    expect(resolved.projectName).toBe('MyProject');
    expect(resolved.snapshotsDir).toBe('/work/MyProject/snapshots');
    expect(resolved.logPath).toBe('/work/MyProject/last_agent_log.txt');
    expect(resolved.excludeDirs).toEqual([...DEFAULT_TIMESTAMP_SNAPSHOT.excludeDirs]);
    expect(resolved.excludeFiles).toEqual([]);
    expect(resolved.commitPolicy).toBe('always');
  });

  it('should always exclude the snapshots directory itself', () => {
    const resolved = resolveTimestampSnapshotConfig({ workDir, snapshotsDir: 'archive/zips' }, {});

    expect(resolved.snapshotsDir).toBe('/work/MyProject/archive/zips');
    expect(resolved.excludeDirs).toContain('zips');
  });

  it('should replace the exclusion list when one is given', () => {
    const resolved = resolveTimestampSnapshotConfig({ workDir, excludeDirs: ['.git'], excludeFiles: ['save.ts'] }, {});

    expect(resolved.excludeDirs).toEqual(['.git', 'snapshots']);
    expect(resolved.excludeFiles).toEqual(['save.ts']);
  });

  it('should read values from the environment', () => {
    const resolved = resolveTimestampSnapshotConfig({ workDir }, {
      REPOSNAP_SNAPSHOTS_DIR: '/var/snaps',
      REPOSNAP_LOG_FILE: 'logs/agent.txt',
      REPOSNAP_COMMIT_POLICY: 'if-staged',
    });

    expect(resolved.snapshotsDir).toBe('/var/snaps');
    expect(resolved.logPath).toBe('/work/MyProject/logs/agent.txt');
    expect(resolved.commitPolicy).toBe('if-staged');
  });
});

describe('loadEnvFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reposnap-env-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should return false when the file does not exist', () => {
    const env = {};
    expect(loadEnvFile(path.join(tempDir, '.reposnap.env'), env)).toBe(false);
    expect(env).toEqual({});
  });

  it('should load variables without overriding ones already set', async () => {
    const envFile = path.join(tempDir, '.reposnap.env');
    await fs.promises.writeFile(envFile, 'REPOSNAP_KEEP=7\nREPOSNAP_PROJECT=FromFile\n');
    const env: Record<string, string | undefined> = { REPOSNAP_PROJECT: 'FromShell' };

    expect(loadEnvFile(envFile, env)).toBe(true);
    expect(env).toEqual({ REPOSNAP_KEEP: '7', REPOSNAP_PROJECT: 'FromShell' });
  });
});

describe('loadProjectEnv', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reposnap-project-env-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should skip a missing default env file', () => {
    const env = {};
    expect(loadProjectEnv(tempDir, undefined, env)).toBe(false);
    expect(env).toEqual({});
  });

  it('should load the default env file from the work directory', async () => {
    await fs.promises.writeFile(path.join(tempDir, '.reposnap.env'), 'REPOSNAP_KEEP=4\n');
    const env: Record<string, string | undefined> = {};

    expect(loadProjectEnv(tempDir, undefined, env)).toBe(true);
    expect(env).toEqual({ REPOSNAP_KEEP: '4' });
  });

  it('should resolve a named env file against the work directory', async () => {
    await fs.promises.writeFile(path.join(tempDir, 'ci.env'), 'REPOSNAP_PROJECT=Named\n');
    const env: Record<string, string | undefined> = {};

    expect(loadProjectEnv(tempDir, 'ci.env', env)).toBe(true);
    expect(env).toEqual({ REPOSNAP_PROJECT: 'Named' });
  });

  it('should fail when a named env file does not exist', () => {
    expect(() => loadProjectEnv(tempDir, 'typo.env', {})).toThrow(
      'Invalid configuration: env file not found: typo.env',
    );
    expect(() => loadProjectEnv(tempDir, 'typo.env', {})).toThrow(ConfigError);
  });
});
