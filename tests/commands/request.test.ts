import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';

vi.mock('ofetch', () => {
  class FetchError extends Error {
    statusCode?: number;
    status?: number;
    data?: unknown;
  }

  return {
    ofetch: Object.assign(vi.fn(), { raw: vi.fn() }),
    FetchError,
  };
});

import { ofetch } from 'ofetch';
import { cli } from '../../src/cli.js';
import { requiresBody } from '../../src/commands/request.js';
import { setupCommandEnv, stubAuthEnv, response } from './helpers.js';
import type { CommandTestEnv } from './helpers.js';

describe('Request Command', () => {
  let env: CommandTestEnv;

  beforeEach(() => {
    vi.mocked(ofetch).mockReset();
    vi.mocked(ofetch.raw).mockReset();
    env = setupCommandEnv();
  });

  afterEach(() => {
    env.cleanup();
  });

  describe('requiresBody', () => {
    it('should require a body for POST and PUT only', () => {
      expect(requiresBody('POST')).toBe(true);
      expect(requiresBody('put')).toBe(true);
      expect(requiresBody('GET')).toBe(false);
      expect(requiresBody('PATCH')).toBe(false);
      expect(requiresBody('DELETE')).toBe(false);
    });
  });

  it('should print the formatted response as the default command', async () => {
    stubAuthEnv();
    vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'cli-token', expires_in: 3600 });
    vi.mocked(ofetch.raw).mockResolvedValueOnce(response(200, '{"ok":true}'));

    await cli.parseAsync(['GET', '/reports/123'], { from: 'user' });

    expect(env.stdout()).toEqual(['{\n  "ok": true\n}']);
    expect(ofetch.raw).toHaveBeenCalledWith(
      'https://api.example.com/v1/reports/123',
      expect.objectContaining({ method: 'GET' })
    );
    expect(process.exitCode).toBeUndefined();
  });

  it('should cache the token for the next invocation', async () => {
    stubAuthEnv();
    vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'cli-token', expires_in: 3600 });
    vi.mocked(ofetch.raw).mockResolvedValue(response(204, ''));

    await cli.parseAsync(['request', 'delete', '/reports/1'], { from: 'user' });
    await cli.parseAsync(['DELETE', '/reports/2'], { from: 'user' });

    expect(ofetch).toHaveBeenCalledTimes(1);
    expect(env.stdout()).toEqual(['Request succeeded (no content).', 'Request succeeded (no content).']);
    const cached: unknown = JSON.parse(fs.readFileSync(env.cachePath, 'utf-8'));
    expect(cached).toMatchObject({ access_token: 'cli-token' });
  });

  it('should reject POST without a body before contacting any server', async () => {
    stubAuthEnv();

    await cli.parseAsync(['POST', '/reports'], { from: 'user' });

    expect(env.stderr()).toEqual(['Error: POST requires a body']);
    expect(process.exitCode).toBe(1);
    expect(ofetch).not.toHaveBeenCalled();
    expect(ofetch.raw).not.toHaveBeenCalled();
  });

  it('should report missing credentials with exit code 3', async () => {
    vi.stubEnv('API_BASE_URL', 'https://api.example.com/v1');

    await cli.parseAsync(['GET', '/reports'], { from: 'user' });

    expect(env.stderr()).toEqual([
      'Error: missing required settings: OAUTH_TOKEN_URL, OAUTH_CLIENT_ID, OAUTH_CLIENT_SECRET, OAUTH_SCOPE, OAUTH_GRANT_TYPE',
    ]);
    expect(process.exitCode).toBe(3);
  });

  it('should report API failures with exit code 2', async () => {
    stubAuthEnv();
    vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'cli-token', expires_in: 3600 });
    vi.mocked(ofetch.raw).mockResolvedValueOnce(response(404, 'not found'));

    await cli.parseAsync(['GET', '/missing'], { from: 'user' });

    expect(env.stdout()).toEqual([]);
    expect(env.stderr()).toEqual(['Error: request failed: 404 not found']);
    expect(process.exitCode).toBe(2);
  });

  it('should send an inline body for PUT', async () => {
    stubAuthEnv();
    vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'cli-token', expires_in: 3600 });
    vi.mocked(ofetch.raw).mockResolvedValueOnce(response(200, 'updated'));

    await cli.parseAsync(['PUT', '/reports/1', '{"name":"x"}'], { from: 'user' });

    expect(env.stdout()).toEqual(['updated']);
    expect(ofetch.raw).toHaveBeenCalledWith(
      'https://api.example.com/v1/reports/1',
      expect.objectContaining({ method: 'PUT', body: '{"name":"x"}' })
    );
  });
});
