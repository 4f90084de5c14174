import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { prepareRun } from '../src/cli.js';
import { loggers } from '../src/lib/logger.js';
import type { LogEntry } from '../src/lib/logger.js';

describe('prepareRun', () => {
  let testDir: string;
  let stderr: MockInstance<typeof process.stderr.write>;

  const entries = (): LogEntry[] =>
    stderr.mock.calls.map(([chunk]) => JSON.parse(String(chunk)) as LogEntry);

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oauth-rest-cli-'));
    vi.stubEnv('OAUTH_REST_CONFIG', path.join(testDir, 'config.json'));
    vi.stubEnv('LOG_LEVEL', '');
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    delete process.env.OAUTH_REST_CLI_TEST;
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should log at debug level when no .env file exists', () => {
    prepareRun({ verbose: true }, testDir);

    expect(loggers.cli.getMinLevel()).toBe('debug');
    expect(entries().map((entry) => [entry.component, entry.message, entry.context])).toEqual([
      ['CLI', 'No .env file found, using process environment only', { dir: testDir }],
    ]);
  });

  it('should load .env before resolving settings', () => {
    fs.writeFileSync(path.join(testDir, '.env'), 'OAUTH_REST_CLI_TEST=loaded\n');

    prepareRun({ verbose: true }, testDir);

    expect(process.env.OAUTH_REST_CLI_TEST).toBe('loaded');
    expect(entries()).toEqual([]);
  });

  it('should let --quiet lower the log level', () => {
    prepareRun({ quiet: true }, testDir);

    expect(loggers.cli.getMinLevel()).toBe('error');
    expect(entries()).toEqual([]);
  });

  it('should default to warn', () => {
    prepareRun({}, testDir);

    expect(loggers.cli.getMinLevel()).toBe('warn');
  });
});
