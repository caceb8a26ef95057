import * as fs from 'fs';
import * as path from 'path';
import { getCurrentLogDir } from './logger';

/**
 * 실패 산출물(스크린샷, HTML) 디렉토리를 만든다.
 * <ARTIFACTS_DIR 또는 당일 로그 디렉토리>/<name>/<ISO 시각>_<suffix>
 */
export function createDebugRunDir(name: string, suffix?: string, now: Date = new Date()): string {
  const base = (process.env.ARTIFACTS_DIR ?? '').trim() || getCurrentLogDir(now);
  const stamp = now.toISOString().replace(/[:.]/g, '-');
  const runDir = path.resolve(base, name, suffix ? `${stamp}_${suffix}` : stamp);
  fs.mkdirSync(runDir, { recursive: true });
  return runDir;
}
