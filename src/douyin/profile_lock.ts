import * as fs from 'fs';
import * as path from 'path';
import * as log from '../utils/logger';
import { ProfileLockedError } from './errors';

export const PROFILE_LOCK_FILENAME = '.douyin-poster.lock';

export type ProfileLock = {
  path: string;
  pid: number;
  /** 죽은 프로세스의 lock을 넘겨받았으면 true */
  tookOver: boolean;
  release: () => void;
};

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM은 다른 사용자의 살아 있는 프로세스
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function readHolderPid(lockPath: string): number | null {
  try {
    const raw = fs.readFileSync(lockPath, 'utf-8').trim();
    const pid = parseInt(raw, 10);
    return Number.isFinite(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

function tryCreate(lockPath: string, pid: number): boolean {
  try {
    fs.writeFileSync(lockPath, `${pid}\n`, { flag: 'wx' });
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') return false;
    throw error;
  }
}

/**
 * 같은 프로필로 동시에 두 번 발행하지 않도록 프로필 디렉토리에 pid lock 파일을 만든다.
 * 보유 프로세스가 살아 있으면 ProfileLockedError, 죽었으면 넘겨받는다.
 */
export function acquireProfileLock(
  profileDir: string,
  pid: number = process.pid,
  isAlive: (pid: number) => boolean = isProcessAlive,
): ProfileLock {
  fs.mkdirSync(profileDir, { recursive: true });
  const lockPath = path.join(profileDir, PROFILE_LOCK_FILENAME);
  let tookOver = false;

  if (!tryCreate(lockPath, pid)) {
    const holder = readHolderPid(lockPath);
    if (holder !== null && holder !== pid && isAlive(holder)) {
      throw new ProfileLockedError(lockPath, holder);
    }
    log.warn(`[profile_lock] stale lock 정리 path=${lockPath} holder=${holder ?? 'unknown'}`);
    fs.rmSync(lockPath, { force: true });
    if (!tryCreate(lockPath, pid)) {
      throw new ProfileLockedError(lockPath, readHolderPid(lockPath) ?? -1);
    }
    tookOver = true;
  }

  let released = false;
  return {
    path: lockPath,
    pid,
    tookOver,
    release: () => {
      if (released) return;
      released = true;
      if (readHolderPid(lockPath) === pid) {
        fs.rmSync(lockPath, { force: true });
      }
    },
  };
}
