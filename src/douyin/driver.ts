import { errors, type FileChooser, type Locator, type Page } from 'playwright';
import { describeTarget, type ElementDescriptor, type Target } from './descriptors';

export type WaitState = 'attached' | 'visible' | 'hidden';

export class WaitTimeoutError extends Error {
  readonly waitedFor: string;
  readonly state: WaitState | 'filechooser';
  readonly timeoutMs: number;

  constructor(waitedFor: string, state: WaitState | 'filechooser', timeoutMs: number) {
    super(`[WAIT_TIMEOUT] waitedFor=[${waitedFor}] state=${state} timeoutMs=${timeoutMs}`);
    this.name = 'WaitTimeoutError';
    this.waitedFor = waitedFor;
    this.state = state;
    this.timeoutMs = timeoutMs;
  }
}

export class FileChooserTimeoutError extends WaitTimeoutError {
  constructor(trigger: string, timeoutMs: number) {
    super(`filechooser after click ${trigger}`, 'filechooser', timeoutMs);
    this.name = 'FileChooserTimeoutError';
  }
}

/**
 * Workflow가 페이지에 요구하는 최소 기능.
 * 모든 조회는 ElementDescriptor로 하고, 모든 대기는 호출자가 준 timeout으로 제한된다.
 */
export interface PageDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  count(t: Target): Promise<number>;
  waitFor(t: Target, state: WaitState, timeoutMs: number): Promise<void>;
  isVisible(t: Target): Promise<boolean>;
  isEnabled(t: Target): Promise<boolean>;
  textContent(t: Target, timeoutMs: number): Promise<string>;
  click(t: Target, timeoutMs: number): Promise<void>;
  /** 기존 값을 지우고 교체한다 */
  fill(t: Target, value: string, timeoutMs: number): Promise<void>;
  /** 현재 포커스에 키 입력을 한 글자씩 보낸다 */
  typeText(text: string, delayMs?: number): Promise<void>;
  /** 요소 위로 포인터를 옮긴다. 박스가 없으면 false */
  pointerOver(t: Target): Promise<boolean>;
  /**
   * file chooser 가로채기를 먼저 건 뒤 trigger를 실행하고, 잡힌 chooser에 파일 목록을 한 번에 넣는다.
   * 성공/실패와 관계없이 반환 시점에는 가로채기가 해제되어 있다.
   */
  withFileChooser(trigger: () => Promise<void>, files: readonly string[], timeoutMs: number): Promise<void>;
  pause(ms: number): Promise<void>;
  currentUrl(): string;
}

type LocatorScope = Page | Locator;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function resolveDescriptor(scope: LocatorScope, d: ElementDescriptor): Locator {
  const root: LocatorScope = d.within ? resolveDescriptor(scope, d.within).first() : scope;
  let locator: Locator;
  switch (d.kind) {
    case 'placeholder':
      locator = root.getByPlaceholder(d.value, { exact: d.exact ?? false });
      break;
    case 'text':
      if (d.tag) {
        const hasText = d.exact ? new RegExp(`^\\s*${escapeRegExp(d.value)}\\s*$`) : d.value;
        locator = root.locator(d.tag, { hasText });
      } else {
        locator = root.getByText(d.value, { exact: d.exact ?? false });
      }
      break;
    case 'attribute': {
      const op = d.match === 'equals' ? '=' : '*=';
      locator = root.locator(`${d.tag ?? ''}[${d.attribute}${op}${JSON.stringify(d.value)}]`);
      break;
    }
    case 'role':
      locator = d.name === undefined
        ? root.getByRole(d.role)
        : root.getByRole(d.role, { name: d.name, exact: d.exact ?? false });
      break;
  }
  if (d.hasText !== undefined) locator = locator.filter({ hasText: d.hasText });
  if (d.excludeText !== undefined) locator = locator.filter({ hasNotText: d.excludeText });
  if (d.visibleOnly) locator = locator.filter({ visible: true });
  return locator;
}

export function resolveTarget(scope: LocatorScope, t: Target): Locator {
  const all = resolveDescriptor(scope, t.descriptor);
  const pick = t.pick ?? 'first';
  if (pick === 'first') return all.first();
  if (pick === 'last') return all.last();
  return all.nth(pick);
}

function isPlaywrightTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

export class PlaywrightPageDriver implements PageDriver {
  private readonly page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (error) {
      if (isPlaywrightTimeout(error)) throw new WaitTimeoutError(`domcontentloaded ${url}`, 'attached', timeoutMs);
      throw error;
    }
  }

  async count(t: Target): Promise<number> {
    return await resolveDescriptor(this.page, t.descriptor).count();
  }

  async waitFor(t: Target, state: WaitState, timeoutMs: number): Promise<void> {
    await this.mapTimeout(t, state, timeoutMs, async () => {
      await resolveTarget(this.page, t).waitFor({ state, timeout: timeoutMs });
    });
  }

  async isVisible(t: Target): Promise<boolean> {
    return await resolveTarget(this.page, t).isVisible();
  }

  async isEnabled(t: Target): Promise<boolean> {
    const locator = resolveTarget(this.page, t);
    if ((await locator.count()) === 0) return false;
    return await locator.isEnabled();
  }

  async textContent(t: Target, timeoutMs: number): Promise<string> {
    return await this.mapTimeout(t, 'attached', timeoutMs, async () => {
      return (await resolveTarget(this.page, t).textContent({ timeout: timeoutMs })) ?? '';
    });
  }

  async click(t: Target, timeoutMs: number): Promise<void> {
    await this.mapTimeout(t, 'visible', timeoutMs, async () => {
      await resolveTarget(this.page, t).click({ timeout: timeoutMs });
    });
  }

  async fill(t: Target, value: string, timeoutMs: number): Promise<void> {
    await this.mapTimeout(t, 'visible', timeoutMs, async () => {
      await resolveTarget(this.page, t).fill(value, { timeout: timeoutMs });
    });
  }

  async typeText(text: string, delayMs: number = 30): Promise<void> {
    await this.page.keyboard.type(text, { delay: delayMs });
  }

  async pointerOver(t: Target): Promise<boolean> {
    const box = await resolveTarget(this.page, t).boundingBox();
    if (!box) return false;
    const x = box.x + box.width / 2;
    const y = box.y + box.height / 2;
    // mouseenter가 확실히 발생하도록 두 번 움직인다
    await this.page.mouse.move(x, y);
    await this.page.waitForTimeout(300);
    await this.page.mouse.move(x + 5, y);
    return true;
  }

  async withFileChooser(trigger: () => Promise<void>, files: readonly string[], timeoutMs: number): Promise<void> {
    let chooser: FileChooser;
    try {
      // 먼저 실패한 쪽만 던지고 나머지의 rejection도 Promise.all이 처리한다
      [chooser] = await Promise.all([
        this.page.waitForEvent('filechooser', { timeout: timeoutMs }),
        trigger(),
      ]);
    } catch (error) {
      if (isPlaywrightTimeout(error)) throw new FileChooserTimeoutError('upload trigger', timeoutMs);
      throw error;
    }
    await chooser.setFiles([...files]);
  }

  currentUrl(): string {
    return this.page.url();
  }

  async pause(ms: number): Promise<void> {
    if (ms <= 0) return;
    await this.page.waitForTimeout(ms);
  }

  private async mapTimeout<T>(t: Target, state: WaitState, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isPlaywrightTimeout(error)) throw new WaitTimeoutError(describeTarget(t), state, timeoutMs);
      throw error;
    }
  }
}
