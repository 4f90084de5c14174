/**
 * Response Formatter
 * 將 API 回應轉為可讀文字：JSON 縮排輸出，其他內容原樣返回
 */

import { FormatError } from './errors.js';

export const NO_CONTENT_MESSAGE = 'Request succeeded (no content).';

/**
 * 依第一個非空白字元判斷回應格式
 * `{` / `[` 視為 JSON，解析失敗拋出 FormatError（不退回純文字）
 */
export function formatResponseBody(raw: string): string {
  const text = raw.trim();
  if (text.length === 0) {
    return NO_CONTENT_MESSAGE;
  }

  if (text.startsWith('{') || text.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new FormatError(raw, error);
    }
    return JSON.stringify(parsed, null, 2);
  }

  return text;
}
