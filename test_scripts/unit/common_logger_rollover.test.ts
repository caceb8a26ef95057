import fs from 'fs';
import path from 'path';
import os from 'os';
import { formatLogLine, getDateKey, resolveTodayLogFile, writeLog } from '../../src/common/logger';

describe('common logger rollover', () => {
  const previousLogDir = process.env.DOUYIN_LOG_DIR;
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-rollover-'));
    process.env.DOUYIN_LOG_DIR = tmp;
    jest.useFakeTimers();
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
    if (previousLogDir === undefined) delete process.env.DOUYIN_LOG_DIR;
    else process.env.DOUYIN_LOG_DIR = previousLogDir;
  });

  test('날짜가 바뀌면 새 yyyyMMdd 디렉토리에 쓴다', () => {
    jest.setSystemTime(new Date(2026, 1, 21, 10, 0, 0, 123));
    writeLog('INFO', 'douyin.upload', 'first');
    expect(fs.existsSync(path.join(tmp, '20260221', 'app.log'))).toBe(true);

    jest.setSystemTime(new Date(2026, 1, 22, 0, 0, 0, 1));
    writeLog('INFO', 'douyin.upload', 'second');

    const line = fs.readFileSync(path.join(tmp, '20260222', 'app.log'), 'utf-8').trim();
    expect(line).toBe('[2026-02-22 00:00:00.001] [INFO] [douyin.upload] second');
  });

  test('모듈/레벨에 따라 douyin.log, error.log로 나뉜다', () => {
    jest.setSystemTime(new Date(2026, 4, 1, 9, 30, 0, 0));
    writeLog('INFO', 'cover', 'cover only');
    writeLog('ERROR', 'douyin', 'broken');

    const read = (file: 'app.log' | 'error.log' | 'douyin.log') =>
      fs.readFileSync(resolveTodayLogFile(file), 'utf-8').trim().split('\n');
    expect(read('app.log')).toEqual([
      '[2026-05-01 09:30:00.000] [INFO] [cover] cover only',
      '[2026-05-01 09:30:00.000] [ERROR] [douyin] broken',
    ]);
    expect(read('douyin.log')).toEqual(['[2026-05-01 09:30:00.000] [ERROR] [douyin] broken']);
    expect(read('error.log')).toEqual(['[2026-05-01 09:30:00.000] [ERROR] [douyin] broken']);
  });

  test('formatLogLine은 Error와 객체를 문자열로 바꾼다', () => {
    const now = new Date(2026, 0, 9, 1, 2, 3, 4);
    expect(getDateKey(now)).toBe('20260109');
    expect(formatLogLine('WARN', 'm', new Error('bad'), now)).toBe('[2026-01-09 01:02:03.004] [WARN] [m] bad');
    expect(formatLogLine('INFO', 'm', { a: 1 }, now)).toBe('[2026-01-09 01:02:03.004] [INFO] [m] {"a":1}');
  });
});
