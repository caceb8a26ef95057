import * as log from '../utils/logger';
import { describeTarget, target, type Target } from './descriptors';
import type { PageDriver } from './driver';
import { NotLoggedInError } from './errors';
import { DOUYIN_SELECTORS } from './selectors';

export type LoginGateOptions = {
  timeoutMs: number;
  pollIntervalMs: number;
  /** 로그인된 상태에서만 보이는 요소. 기본은 이미지 게시 페이지의 제목 입력창 */
  signal?: Target;
  /** 로그인 후 다른 페이지로 이동되면 이 URL로 돌아온다 */
  returnUrl?: string;
  navigateTimeoutMs?: number;
};

export type LoginGateResult = {
  waitedMs: number;
  /** 운영자에게 수동 로그인을 요청했는지 */
  prompted: boolean;
  polls: number;
  /** returnUrl로 다시 이동한 횟수 */
  renavigations: number;
};

const DEFAULT_NAVIGATE_TIMEOUT_MS = 60_000;

/** origin + pathname이 같으면 같은 페이지로 본다 */
export function isSamePage(current: string, expected: string): boolean {
  try {
    const a = new URL(current);
    const b = new URL(expected);
    return a.origin === b.origin && a.pathname === b.pathname;
  } catch {
    return current === expected;
  }
}

/**
 * 로그인 판정은 로그인 상태에서만 렌더링되는 요소의 존재 여부로 한다.
 * 업로드 위젯이 커스텀이라 file input은 로그인 여부와 무관하게 없을 수 있다.
 * 로그인 직후 플랫폼이 다른 페이지로 보내면 returnUrl로 다시 이동한다.
 */
export async function ensureAuthenticated(
  driver: PageDriver,
  options: LoginGateOptions,
): Promise<LoginGateResult> {
  const signal = options.signal ?? target(DOUYIN_SELECTORS.titleInput);
  const startedAt = Date.now();
  let prompted = false;
  let polls = 0;
  let renavigations = 0;
  let lastUrl = driver.currentUrl();

  for (;;) {
    polls += 1;
    if (await driver.isVisible(signal)) {
      const waitedMs = Date.now() - startedAt;
      log.info(`[login] authenticated signal=${describeTarget(signal)} waited=${waitedMs}ms polls=${polls}`);
      return { waitedMs, prompted, polls, renavigations };
    }

    const elapsed = Date.now() - startedAt;
    if (elapsed >= options.timeoutMs) {
      log.error(`[login] 로그인 대기 시간 초과 (${options.timeoutMs}ms)`);
      throw new NotLoggedInError(describeTarget(signal), options.timeoutMs);
    }

    // 로그인 페이지에 머무는 동안은 건드리지 않고, URL이 바뀌었을 때만 돌아간다
    const currentUrl = driver.currentUrl();
    if (options.returnUrl && currentUrl !== lastUrl && !isSamePage(currentUrl, options.returnUrl)) {
      renavigations += 1;
      log.info(`[login] redirected to ${currentUrl}, returning to ${options.returnUrl}`);
      await driver.goto(options.returnUrl, options.navigateTimeoutMs ?? DEFAULT_NAVIGATE_TIMEOUT_MS);
      lastUrl = driver.currentUrl();
      continue;
    }
    lastUrl = currentUrl;

    if (!prompted) {
      prompted = true;
      log.warn(
        `[login] 로그인되지 않았습니다. 열린 브라우저 창에서 로그인하세요 ` +
        `(최대 ${Math.ceil(options.timeoutMs / 1000)}초 대기)`,
      );
    }
    await driver.pause(Math.min(options.pollIntervalMs, options.timeoutMs - elapsed));
  }
}
