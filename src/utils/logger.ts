import * as fs from 'fs';
import * as path from 'path';
import type { Page } from 'playwright';
import { writeLog } from '../common/logger';

export function info(msg: string): void {
  writeLog('INFO', 'douyin', msg);
}

export function success(msg: string): void {
  writeLog('SUCCESS', 'douyin', msg);
}

export function warn(msg: string): void {
  writeLog('WARN', 'douyin', msg);
}

export function error(msg: string): void {
  writeLog('ERROR', 'douyin', msg);
}

/** artifacts 디렉토리 아래에 타임스탬프가 붙은 파일 경로를 만든다 */
export function artifactPath(artifactsDir: string, prefix: string, ext: string): string {
  fs.mkdirSync(artifactsDir, { recursive: true });
  const ts = new Date().toISOString().replace(/[:.]/g, '').slice(0, 15);
  return path.join(artifactsDir, `${prefix}_${ts}.${ext}`);
}

export async function captureFailure(
  page: Page,
  stepName: string,
  artifactsDir: string,
): Promise<string[]> {
  const saved: string[] = [];
  try {
    const screenshotPath = artifactPath(artifactsDir, `fail_${stepName}`, 'png');
    await page.screenshot({ path: screenshotPath, fullPage: true });
    saved.push(screenshotPath);
    error(`Screenshot saved: ${screenshotPath}`);
  } catch (e) {
    error(`Failed to capture screenshot: ${e}`);
  }

  try {
    const htmlPath = artifactPath(artifactsDir, `fail_${stepName}`, 'html');
    fs.writeFileSync(htmlPath, await page.content(), 'utf-8');
    saved.push(htmlPath);
    error(`HTML dump saved: ${htmlPath}`);
  } catch (e) {
    error(`Failed to capture HTML: ${e}`);
  }
  return saved;
}

// ── structured JSON log ─────────────────────────────────────────

export type StructuredLogPayload = Record<string, unknown>;

const REDACTED_KEYS = /^(cookie_value|token_value|session_token|ws_endpoint)$/;

export function getRunContext(): { run_id: string } {
  return { run_id: process.env.DOUYIN_RUN_ID ?? 'none' };
}

export function sanitizeLogPayload(data: StructuredLogPayload): StructuredLogPayload {
  const serialized = JSON.stringify(data, (key, val: unknown) => {
    if (typeof val === 'string' && REDACTED_KEYS.test(key)) return '[REDACTED]';
    return val;
  });
  const parsed: unknown = JSON.parse(serialized);
  return isRecord(parsed) ? parsed : {};
}

function isRecord(value: unknown): value is StructuredLogPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function logStructured(event: string, data: StructuredLogPayload): void {
  const payload = sanitizeLogPayload({ ...getRunContext(), ...data });
  info(`${event}: ${JSON.stringify(payload)}`);
}
