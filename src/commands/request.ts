/**
 * Request Command
 * 發送 API 請求（預設指令）
 */

import { Command } from 'commander';
import { createServices, reportError } from './shared.js';

/**
 * POST / PUT 必須提供 body
 */
export function requiresBody(method: string): boolean {
  const upper = method.toUpperCase();
  return upper === 'POST' || upper === 'PUT';
}

export const requestCommand = new Command('request')
  .description('發送 API 請求，例如：request GET /reports/123')
  .argument('<method>', 'HTTP 方法 (GET, POST, PUT, PATCH, DELETE)')
  .argument('<path>', 'API 路徑（接在 API_BASE_URL 之後）')
  .argument('[body]', '請求內容：JSON 檔案路徑或 JSON 字串（POST / PUT 必填）')
  .addHelpText(
    'after',
    `
Examples:
  $ oauth-rest GET /reports/123
  $ oauth-rest POST /reports payload.json
  $ oauth-rest PUT /reports/123 '{"name":"updated"}'`
  )
  .action(async (method: string, path: string, body: string | undefined) => {
    const httpMethod = method.toUpperCase();

    try {
      if (requiresBody(httpMethod) && body === undefined) {
        throw new Error(`${httpMethod} requires a body`);
      }

      const { api } = createServices();
      const output = await api.execute(httpMethod, path, body);
      console.log(output);
    } catch (error) {
      reportError(error);
    }
  });
