/**
 * Integration tests for CLI commands.
 *
 * Runs the generate command end to end in a scratch working directory,
 * covering relative output paths, the default config file and the
 * on-disk layout an Ansible playbook consumes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rm, writeFile, mkdir, readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createCliApp } from '../../src/cli/app.js';
import { handleGenerateCommand } from '../../src/cli/commands/generate.js';
import { handleVersionCommand } from '../../src/cli/commands/version.js';
import { withErrorHandling } from '../../src/cli/utils/errorHandling.js';
import type { CliContext } from '../../src/cli/types.js';
import type { LogEntry } from '../../src/utils/logger.js';

const EXPECTED_MEMBERSHIP = [
  '[zookeepernodes]',
  'lab0',
  '',
  '[namenodes]',
  'lab0',
  '',
  '[hadoopnodes]',
  'lab0',
  'lab1',
  '',
  '[journalnodes]',
  'lab0',
  '',
  '[historyservernodes]',
  'lab0',
  '',
  '[resourcemanagernodes]',
  'lab0',
  '',
  '[frontendnodes]',
  'lab0',
  '',
  '[monitornodes]',
  'lab0',
  '',
  '[datanodes]',
  'lab0',
  'lab1',
  '',
  '',
].join('\n');

describe('CLI Integration Tests', () => {
  let testDir: string;
  let originalCwd: string;
  let stdout: string[];
  let logs: LogEntry[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    originalCwd = process.cwd();
    testDir = join(tmpdir(), `vcluster-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });

    stdout = [];
    logs = [];
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    process.chdir(testDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.chdir(originalCwd);
    process.exitCode = undefined;
    await rm(testDir, { recursive: true, force: true }).catch(() => {});
  });

  function createContext(args: string[], env: Record<string, string> = {}): CliContext {
    return createCliApp({
      args,
      env,
      display: { colors: false },
      stdout: (text) => {
        stdout.push(text);
      },
      logSink: (line) => {
        logs.push(JSON.parse(line) as LogEntry);
      },
    });
  }

  describe('generate', () => {
    it('writes the full layout relative to the working directory', async () => {
      const result = handleGenerateCommand(
        createContext(['--name=lab', '--output', 'out', '-i', 'out/hosts', '10.1.0.1', '10.1.0.2'])
      );

      expect(result.exitCode).toBe(0);
      expect(stdout.join('')).toBe(EXPECTED_MEMBERSHIP);
      expect(await readFile(join(testDir, 'out', 'hosts'), 'utf-8')).toBe(EXPECTED_MEMBERSHIP);

      const hostVars = join(testDir, 'out', 'host_vars');
      expect((await readdir(hostVars)).sort()).toEqual(['lab0', 'lab1']);
      expect(await readFile(join(hostVars, 'lab0'), 'utf-8')).toBe(
        'ansible_ssh_host: 10.1.0.1\nzookeeper_id: 1\n'
      );
      expect(await readFile(join(hostVars, 'lab1'), 'utf-8')).toBe('ansible_ssh_host: 10.1.0.2\n');
    });

    it('defaults the output root to the working directory', async () => {
      handleGenerateCommand(createContext(['10.1.0.1']));

      expect(await readdir(join(testDir, 'host_vars'))).toEqual(['vcluster0']);
    });

    it('reads vcluster.toml from the working directory', async () => {
      await writeFile(
        join(testDir, 'vcluster.toml'),
        '[cluster]\nname = "fromfile"\n\n[output]\nroot = "generated"\n'
      );

      handleGenerateCommand(createContext(['10.1.0.1']));

      expect(await readdir(join(testDir, 'generated', 'host_vars'))).toEqual(['fromfile0']);
    });

    it('lets environment variables override vcluster.toml', async () => {
      await writeFile(join(testDir, 'vcluster.toml'), '[cluster]\nname = "fromfile"\n');

      handleGenerateCommand(createContext(['10.1.0.1'], { VCLUSTER_CLUSTER_NAME: 'fromenv' }));

      expect(await readdir(join(testDir, 'host_vars'))).toEqual(['fromenv0']);
    });

    it('lets flags override environment variables', async () => {
      handleGenerateCommand(
        createContext(['-n', 'fromflag', '10.1.0.1'], { VCLUSTER_NAME: 'fromenv' })
      );

      expect(await readdir(join(testDir, 'host_vars'))).toEqual(['fromflag0']);
    });

    it('reports an invalid vcluster.toml with exit 1', async () => {
      await writeFile(join(testDir, 'vcluster.toml'), '[cluster\nname = ');

      const result = handleGenerateCommand(createContext(['10.1.0.1']));

      expect(result.exitCode).toBe(1);
      expect(result.message).toMatch(/^Invalid TOML syntax: /);
      expect(stdout).toEqual([]);
      expect(consoleErrorSpy).toHaveBeenCalled();
    });

    it('reports an output root that is a file', async () => {
      await writeFile(join(testDir, 'taken'), 'x');

      const result = handleGenerateCommand(createContext(['-o', 'taken', '10.1.0.1']));

      expect(result.exitCode).toBe(1);
      expect(result.message).toBe(
        `Output path exists and is not a directory: ${join(testDir, 'taken', 'host_vars')}`
      );
      expect(logs.map((entry) => entry.event)).toEqual(['configuration_error']);
    });

    it('reports an unknown option', () => {
      const result = handleGenerateCommand(createContext(['--force', '10.1.0.1']));

      expect(result).toEqual({ exitCode: 1, message: 'Unknown option: --force' });
    });

    it('prints generate help without addresses', () => {
      const result = handleGenerateCommand(createContext(['--help']));

      expect(result.exitCode).toBe(0);
      expect(stdout.join('')).toContain('USAGE: vcluster generate [options]');
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('rejects an inventory path blocked by a file before printing the listing', async () => {
      await writeFile(join(testDir, 'blocker'), 'x');

      const result = handleGenerateCommand(
        createContext(['-o', 'out', '-i', 'blocker/sub/hosts', '10.1.0.1'])
      );

      expect(result.exitCode).toBe(1);
      expect(stdout).toEqual([]);
      expect(await readdir(join(testDir, 'out', 'host_vars'))).toEqual([]);
      expect(logs.map((entry) => entry.event)).toEqual(['configuration_error']);
      expect(logs[0]?.data?.code).toBe('inventory_not_writable');
    });
  });

  describe('withErrorHandling', () => {
    it('sets the exit code from the command result', () => {
      withErrorHandling(() => handleGenerateCommand(createContext(['--bogus'])));

      expect(process.exitCode).toBe(1);
    });

    it('reports thrown errors and sets exit code 1', () => {
      withErrorHandling(() => {
        throw new Error('boom');
      });

      expect(process.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith('Error: boom');
    });
  });

  describe('version', () => {
    it('prints the package version', () => {
      const result = handleVersionCommand();

      expect(result.exitCode).toBe(0);
      expect(consoleLogSpy).toHaveBeenCalledWith('vcluster v0.1.0');
    });
  });
});
