/**
 * 指令測試共用：隔離環境變數與輸出
 */

import { vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ENV_VARS } from '../../src/types/config.js';

export interface CommandTestEnv {
  dir: string;
  cachePath: string;
  log: MockInstance<typeof console.log>;
  error: MockInstance<typeof console.error>;
  /** console.log 的輸出（每次呼叫一行） */
  stdout: () => string[];
  /** console.error 的輸出（每次呼叫一行） */
  stderr: () => string[];
  cleanup: () => void;
}

export function setupCommandEnv(): CommandTestEnv {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'oauth-rest-cmd-'));
  const cachePath = path.join(dir, 'cache', 'token.json');

  for (const name of Object.values(ENV_VARS)) {
    vi.stubEnv(name, '');
  }
  vi.stubEnv('OAUTH_REST_CONFIG', path.join(dir, 'config.json'));
  vi.stubEnv('TOKEN_CACHE_PATH', cachePath);
  vi.stubEnv('LOG_LEVEL', 'error');

  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  // 日誌寫到 stderr，測試中不輸出
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

  return {
    dir,
    cachePath,
    log,
    error,
    stdout: () => log.mock.calls.map((args) => args.map(String).join(' ')),
    stderr: () => error.mock.calls.map((args) => args.map(String).join(' ')),
    cleanup: () => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      process.exitCode = undefined;
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function stubAuthEnv(): void {
  vi.stubEnv('OAUTH_TOKEN_URL', 'https://idp.example.com/oauth2/v1/token');
  vi.stubEnv('OAUTH_CLIENT_ID', 'test-client');
  vi.stubEnv('OAUTH_CLIENT_SECRET', 'test-secret');
  vi.stubEnv('OAUTH_SCOPE', 'api.read');
  vi.stubEnv('OAUTH_GRANT_TYPE', 'client_credentials');
  vi.stubEnv('API_BASE_URL', 'https://api.example.com/v1');
}

export function response(status: number, body: string) {
  return Object.assign(new Response(null, { status }), { _data: body });
}
