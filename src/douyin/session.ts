import { spawn } from 'child_process';
import * as fs from 'fs';
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import * as log from '../utils/logger';
import { PlaywrightPageDriver, type PageDriver } from './driver';
import { ConnectionError } from './errors';

export interface SessionOptions {
  /** CDP endpoint, 예: http://127.0.0.1:9222 */
  endpoint: string;
  /** 로그인 상태가 유지되는 Chrome 프로필 디렉토리 */
  profileDir: string;
  /** DOUYIN_CHROME_PATH 값. 없으면 설치 경로를 탐색한다 */
  chromePath?: string;
  launchTimeoutMs: number;
  pollIntervalMs?: number;
}

export type SessionHandle = {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  driver: PageDriver;
  /** 이미 떠 있던 브라우저에 붙었으면 true, 새로 띄웠으면 false */
  attached: boolean;
  endpoint: string;
  profileDir: string;
};

export type ConnectDeps<T> = {
  /** timeoutMs 안에 붙지 못하면 reject 해야 한다 */
  connect: (endpoint: string, timeoutMs: number) => Promise<T>;
  resolveExecutable: () => string | null;
  launch: (executable: string, args: string[]) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export type ConnectResult<T> = {
  value: T;
  attached: boolean;
  executable?: string;
  attempts: number;
};

const DEFAULT_POLL_INTERVAL_MS = 1_000;
/** 이미 떠 있는 브라우저에 붙는 첫 시도의 상한 */
const ATTACH_TIMEOUT_MS = 5_000;

const PLATFORM_CHROME_CANDIDATES: Record<string, string[]> = {
  darwin: [
    '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
    '/Applications/Chromium.app/Contents/MacOS/Chromium',
  ],
  linux: [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
  ],
  win32: [
    'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
    'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
  ],
};

export function parseEndpointPort(endpoint: string): number {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConnectionError(endpoint, 'invalid endpoint url');
  }
  if (url.port) return parseInt(url.port, 10);
  return url.protocol === 'https:' || url.protocol === 'wss:' ? 443 : 80;
}

export function buildChromeArgs(port: number, profileDir: string): string[] {
  return [
    `--remote-debugging-port=${port}`,
    `--user-data-dir=${profileDir}`,
    '--no-first-run',
    '--no-default-browser-check',
  ];
}

export function resolveChromeExecutable(
  override: string | undefined,
  platform: NodeJS.Platform,
  exists: (filePath: string) => boolean,
  bundled: () => string,
): string | null {
  if (override) {
    if (exists(override)) return override;
    log.warn(`[session] DOUYIN_CHROME_PATH not found: ${override}`);
  }
  for (const candidate of PLATFORM_CHROME_CANDIDATES[platform] ?? []) {
    if (exists(candidate)) return candidate;
  }
  let fallback = '';
  try {
    fallback = bundled();
  } catch (error) {
    log.warn(`[session] bundled chromium unavailable: ${String(error)}`);
  }
  return fallback && exists(fallback) ? fallback : null;
}

/**
 * 먼저 기존 브라우저에 붙어 보고, 실패하면 Chrome을 띄운 뒤 endpoint가 열릴 때까지 재시도한다.
 * launchTimeoutMs 안에 붙지 못하면 마지막 원인과 함께 ConnectionError.
 */
export async function connectOrLaunch<T>(
  options: SessionOptions,
  deps: ConnectDeps<T>,
): Promise<ConnectResult<T>> {
  const sleep = deps.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const now = deps.now ?? Date.now;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

  try {
    const value = await deps.connect(options.endpoint, Math.min(ATTACH_TIMEOUT_MS, options.launchTimeoutMs));
    log.info(`[session] attached endpoint=${options.endpoint}`);
    return { value, attached: true, attempts: 1 };
  } catch (error) {
    log.info(`[session] no browser on ${options.endpoint}, launching (${String(error)})`);
  }

  const executable = deps.resolveExecutable();
  if (!executable) {
    throw new ConnectionError(options.endpoint, 'chrome executable not found (set DOUYIN_CHROME_PATH)');
  }
  const args = buildChromeArgs(parseEndpointPort(options.endpoint), options.profileDir);
  deps.launch(executable, args);
  log.info(`[session] launched executable=${executable} profileDir=${options.profileDir}`);

  const deadline = now() + options.launchTimeoutMs;
  let attempts = 1;
  let lastError: unknown = null;
  for (;;) {
    await sleep(pollIntervalMs);
    attempts += 1;
    try {
      const value = await deps.connect(options.endpoint, Math.max(1, deadline - now()));
      log.info(`[session] connected after launch attempts=${attempts}`);
      return { value, attached: false, executable, attempts };
    } catch (error) {
      lastError = error;
    }
    if (now() >= deadline) break;
  }

  throw new ConnectionError(
    options.endpoint,
    `launchTimeoutMs=${options.launchTimeoutMs} attempts=${attempts} lastError=${String(lastError)}`,
  );
}

function spawnDetached(executable: string, args: string[]): void {
  const child = spawn(executable, args, { detached: true, stdio: 'ignore' });
  child.on('error', (error) => {
    log.error(`[session] chrome spawn failed: ${String(error)}`);
  });
  child.unref();
}

export async function acquireSession(options: SessionOptions): Promise<SessionHandle> {
  fs.mkdirSync(options.profileDir, { recursive: true });

  const { value: browser, attached } = await connectOrLaunch<Browser>(options, {
    connect: async (endpoint, timeoutMs) => await chromium.connectOverCDP(endpoint, { timeout: timeoutMs }),
    resolveExecutable: () => resolveChromeExecutable(
      options.chromePath,
      process.platform,
      (p) => fs.existsSync(p),
      () => chromium.executablePath(),
    ),
    launch: spawnDetached,
  });

  const context = browser.contexts()[0];
  if (!context) {
    await browser.close();
    throw new ConnectionError(options.endpoint, 'browser exposes no default context');
  }
  const page = await context.newPage();
  return {
    browser,
    context,
    page,
    driver: new PlaywrightPageDriver(page),
    attached,
    endpoint: options.endpoint,
    profileDir: options.profileDir,
  };
}

/** CDP 연결만 끊는다. 브라우저와 페이지는 운영자가 볼 수 있게 남겨 둔다 */
export async function releaseSession(handle: SessionHandle): Promise<void> {
  try {
    await handle.browser.close();
  } catch (error) {
    log.warn(`[session] disconnect failed: ${String(error)}`);
  }
}
