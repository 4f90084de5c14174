/**
 * Request Body
 * 請求內容來源：檔案路徑或直接的文字內容
 */

import fs from 'node:fs';
import { TextDecoder } from 'node:util';
import { RequestError } from './errors.js';

/**
 * 解析 body 參數
 * - 指向既有檔案：讀取檔案內容（須為 UTF-8，原樣送出，保留 BOM）
 * - 其他字串：直接當作內容
 * - 未提供：undefined（不送 body）
 * @throws RequestError 檔案不是有效的 UTF-8
 */
export function resolveRequestBody(bodyArg?: string): string | undefined {
  if (bodyArg === undefined || bodyArg === '') {
    return undefined;
  }

  if (isFile(bodyArg)) {
    return readUtf8File(bodyArg);
  }

  return bodyArg;
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

function readUtf8File(filePath: string): string {
  const bytes = fs.readFileSync(filePath);
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new RequestError(undefined, `body file is not valid UTF-8: ${filePath}`, error);
  }
}
