import { describeTarget, type PickPosition, type Target } from '../../src/douyin/descriptors';
import {
  FileChooserTimeoutError,
  WaitTimeoutError,
  type PageDriver,
  type WaitState,
} from '../../src/douyin/driver';
import { DOUYIN_SELECTORS } from '../../src/douyin/selectors';

export type FixtureAction = {
  type: 'goto' | 'click' | 'fill' | 'type' | 'hover' | 'chooser';
  key: string;
  value?: string;
  files?: string[];
};

export type MusicTrackFixture = {
  name: string;
  revealsUseButton: boolean;
};

export type SubmitButtonFixture = {
  label: string;
  /** isEnabled 확인 횟수가 이 값을 넘으면 활성화 */
  enabledAfterChecks?: number;
};

export type FixturePageOptions = {
  /** image: 이미지 게시 페이지, video: 동영상 업로드 페이지 */
  mode?: 'image' | 'video';
  /** 로그인 신호 확인 횟수가 이 값을 넘으면 로그인 완료. Infinity면 끝까지 미로그인 */
  loginAfterChecks?: number;
  /** 로그인 완료 순간 이동되는 URL. 이 URL에서는 게시 페이지 요소가 보이지 않는다 */
  loginRedirectUrl?: string;
  /** video 모드에서 업로드 후 제목 입력창이 나타나는지 */
  videoProcessed?: boolean;
  uploadTriggerPresent?: boolean;
  fileChooserOpens?: boolean;
  hotspotSuggestions?: string[];
  musicTracks?: MusicTrackFixture[];
  musicPanelClosesOnClose?: boolean;
  sidePanelMaskVisible?: boolean;
  submitButtons?: SubmitButtonFixture[];
  /** pause 실제 대기 상한 */
  maxPauseMs?: number;
};

const MUTATING: ReadonlySet<FixtureAction['type']> = new Set(['click', 'fill', 'type', 'hover', 'chooser']);

/**
 * 크리에이터 게시 페이지를 흉내 내는 in-process PageDriver.
 * DOUYIN_SELECTORS 항목과 동일한 descriptor 객체로만 요소를 찾는다.
 */
export class FixturePage implements PageDriver {
  readonly actions: FixtureAction[] = [];
  readonly waits: Array<{ key: string; state: WaitState; ok: boolean }> = [];
  readonly pauses: number[] = [];
  actionsBeforeLogin = 0;

  url: string | null = null;
  loggedIn: boolean;
  titleValue = '';
  descriptionValue = '';
  hotspotQuery: string | null = null;
  selectedHotspot: string | null = null;
  musicPanelOpen = false;
  maskVisible: boolean;
  hoveredTrack: number | null = null;
  selectedTrack: number | null = null;
  uploadedFiles: string[] = [];
  submittedLabel: string | null = null;

  private focus: string | null = null;
  private loginChecks = 0;
  private enabledChecks = 0;
  private readonly opts: Required<Omit<FixturePageOptions, 'loginRedirectUrl'>>;
  private readonly loginRedirectUrl: string | undefined;

  constructor(options: FixturePageOptions = {}) {
    this.opts = {
      mode: options.mode ?? 'image',
      videoProcessed: options.videoProcessed ?? true,
      loginAfterChecks: options.loginAfterChecks ?? 0,
      uploadTriggerPresent: options.uploadTriggerPresent ?? true,
      fileChooserOpens: options.fileChooserOpens ?? true,
      hotspotSuggestions: options.hotspotSuggestions ?? [],
      musicTracks: options.musicTracks ?? [],
      musicPanelClosesOnClose: options.musicPanelClosesOnClose ?? true,
      sidePanelMaskVisible: options.sidePanelMaskVisible ?? false,
      submitButtons: options.submitButtons ?? [{ label: '发布' }],
      maxPauseMs: options.maxPauseMs ?? 5,
    };
    this.loginRedirectUrl = options.loginRedirectUrl;
    this.loggedIn = this.opts.loginAfterChecks === 0;
    this.maskVisible = this.opts.sidePanelMaskVisible;
  }

  mutatingActions(): FixtureAction[] {
    return this.actions.filter((a) => MUTATING.has(a.type));
  }

  clicksOn(key: string): number {
    return this.actions.filter((a) => a.type === 'click' && a.key === key).length;
  }

  async goto(url: string): Promise<void> {
    this.url = url;
    this.record({ type: 'goto', key: 'page', value: url });
  }

  async count(t: Target): Promise<number> {
    return this.countOf(this.keyOf(t));
  }

  async waitFor(t: Target, state: WaitState, timeoutMs: number): Promise<void> {
    const key = this.keyOf(t);
    const index = this.pickIndex(t.pick, this.countOf(key));
    let ok: boolean;
    if (state === 'attached') ok = index >= 0 && index < this.countOf(key);
    else if (state === 'visible') ok = this.visible(key, index);
    else ok = !this.visible(key, index);
    this.waits.push({ key, state, ok });
    if (!ok) throw new WaitTimeoutError(describeTarget(t), state, timeoutMs);
  }

  async isVisible(t: Target): Promise<boolean> {
    const key = this.keyOf(t);
    if (key === this.loginSignalKey() && !this.loggedIn) {
      this.loginChecks += 1;
      if (this.loginChecks > this.opts.loginAfterChecks) {
        this.loggedIn = true;
        if (this.loginRedirectUrl !== undefined) this.url = this.loginRedirectUrl;
      }
    }
    return this.visible(key, this.pickIndex(t.pick, this.countOf(key)));
  }

  async isEnabled(t: Target): Promise<boolean> {
    const key = this.keyOf(t);
    if (key !== 'submitButton') return this.visible(key, 0);
    const button = this.submitCandidates()[0];
    if (!button) return false;
    this.enabledChecks += 1;
    return this.enabledChecks > (button.enabledAfterChecks ?? 0);
  }

  async textContent(t: Target, timeoutMs: number): Promise<string> {
    const key = this.keyOf(t);
    const index = this.pickIndex(t.pick, this.countOf(key));
    if (index < 0 || index >= this.countOf(key)) {
      throw new WaitTimeoutError(describeTarget(t), 'attached', timeoutMs);
    }
    switch (key) {
      case 'hotspotSuggestion':
        return ` ${this.opts.hotspotSuggestions[index] ?? ''} `;
      case 'submitButton':
        return this.submitCandidates()[index]?.label ?? '';
      case 'musicTrackLabel':
        return '使用';
      default:
        return '';
    }
  }

  async click(t: Target, timeoutMs: number): Promise<void> {
    const key = this.keyOf(t);
    const index = this.pickIndex(t.pick, this.countOf(key));
    if (!this.visible(key, index)) {
      throw new WaitTimeoutError(describeTarget(t), 'visible', timeoutMs);
    }
    this.record({ type: 'click', key });
    switch (key) {
      case 'descriptionEditor':
      case 'hotspotPrompt':
        this.focus = key;
        break;
      case 'hotspotSuggestion':
        this.selectedHotspot = this.opts.hotspotSuggestions[index] ?? null;
        break;
      case 'musicOpen':
        this.musicPanelOpen = true;
        this.maskVisible = true;
        this.hoveredTrack = null;
        break;
      case 'musicUseButton':
        this.selectedTrack = this.hoveredTrack;
        break;
      case 'musicPanelClose':
        if (this.opts.musicPanelClosesOnClose) this.closePanel();
        break;
      case 'sidePanelMask':
        this.closePanel();
        break;
      case 'submitButton':
        this.submittedLabel = this.submitCandidates()[index]?.label ?? null;
        break;
      default:
        break;
    }
  }

  async fill(t: Target, value: string, timeoutMs: number): Promise<void> {
    const key = this.keyOf(t);
    if (!this.visible(key, 0)) throw new WaitTimeoutError(describeTarget(t), 'visible', timeoutMs);
    this.record({ type: 'fill', key, value });
    if (key === 'titleInput' || key === 'videoTitleInput') this.titleValue = value;
  }

  async typeText(text: string): Promise<void> {
    const key = this.focus ?? 'none';
    this.record({ type: 'type', key, value: text });
    if (key === 'descriptionEditor') this.descriptionValue += text;
    if (key === 'hotspotPrompt') this.hotspotQuery = (this.hotspotQuery ?? '') + text;
  }

  async pointerOver(t: Target): Promise<boolean> {
    const key = this.keyOf(t);
    const index = this.pickIndex(t.pick, this.countOf(key));
    if (!this.visible(key, index)) return false;
    this.record({ type: 'hover', key, value: String(index) });
    if (key === 'musicTrackLabel') this.hoveredTrack = index;
    return true;
  }

  async withFileChooser(trigger: () => Promise<void>, files: readonly string[], timeoutMs: number): Promise<void> {
    await trigger();
    if (!this.opts.fileChooserOpens) {
      throw new FileChooserTimeoutError('upload trigger', timeoutMs);
    }
    this.uploadedFiles = [...files];
    this.record({ type: 'chooser', key: 'filechooser', files: [...files] });
  }

  async pause(ms: number): Promise<void> {
    this.pauses.push(ms);
    const wait = Math.min(ms, this.opts.maxPauseMs);
    if (wait > 0) await new Promise<void>((resolve) => setTimeout(resolve, wait));
  }

  currentUrl(): string {
    return this.url ?? '';
  }

  private loginSignalKey(): string {
    return this.opts.mode === 'video' ? 'uploadTrigger' : 'titleInput';
  }

  private redirected(): boolean {
    return this.loginRedirectUrl !== undefined && this.url === this.loginRedirectUrl;
  }

  private record(action: FixtureAction): void {
    if (MUTATING.has(action.type) && !this.loggedIn) this.actionsBeforeLogin += 1;
    this.actions.push(action);
  }

  private closePanel(): void {
    this.musicPanelOpen = false;
    this.maskVisible = false;
    this.hoveredTrack = null;
  }

  private keyOf(t: Target): string {
    const entry = Object.entries(DOUYIN_SELECTORS).find(([, d]) => d === t.descriptor);
    return entry ? entry[0] : describeTarget(t);
  }

  private pickIndex(pick: PickPosition | undefined, count: number): number {
    if (pick === undefined || pick === 'first') return 0;
    if (pick === 'last') return count - 1;
    return pick;
  }

  /** 실제 submitButton descriptor의 텍스트 조건을 그대로 적용한다 */
  private submitCandidates(): SubmitButtonFixture[] {
    const d = DOUYIN_SELECTORS.submitButton;
    return this.opts.submitButtons.filter((b) =>
      b.label.includes(d.value) && !(d.excludeText !== undefined && b.label.includes(d.excludeText)),
    );
  }

  private countOf(key: string): number {
    switch (key) {
      case 'musicTrackLabel':
        return this.musicPanelOpen ? this.opts.musicTracks.length : 0;
      case 'hotspotSuggestion':
        return this.hotspotQuery !== null ? this.opts.hotspotSuggestions.length : 0;
      case 'submitButton':
        return this.loggedIn ? this.submitCandidates().length : 0;
      case 'musicOpen':
        return this.loggedIn ? 2 : 0;
      default:
        return this.visible(key, 0) ? 1 : 0;
    }
  }

  private visible(key: string, index: number): boolean {
    if (this.redirected()) return false;
    switch (key) {
      case 'titleInput':
        return this.opts.mode === 'image' && this.loggedIn && index === 0;
      case 'videoTitleInput':
        return this.opts.mode === 'video'
          && this.loggedIn
          && this.opts.videoProcessed
          && this.uploadedFiles.length > 0
          && index === 0;
      case 'descriptionEditor':
      case 'hotspotPrompt':
        return this.loggedIn && index === 0;
      case 'musicOpen':
        return this.loggedIn && (index === 0 || index === 1);
      case 'uploadTrigger':
        return this.loggedIn && this.opts.uploadTriggerPresent;
      case 'hotspotSuggestion':
        return this.hotspotQuery !== null && index >= 0 && index < this.opts.hotspotSuggestions.length;
      case 'musicPanel':
      case 'musicPanelClose':
        return this.musicPanelOpen;
      case 'musicTrackLabel':
        return this.musicPanelOpen && index >= 0 && index < this.opts.musicTracks.length;
      case 'musicUseButton':
        return this.musicPanelOpen
          && this.hoveredTrack !== null
          && this.opts.musicTracks[this.hoveredTrack]?.revealsUseButton === true;
      case 'sidePanelMask':
        return this.maskVisible;
      case 'submitButton':
        return this.loggedIn && index >= 0 && index < this.submitCandidates().length;
      default:
        return false;
    }
  }
}
