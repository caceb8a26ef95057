import type { StepTimings } from '../common/config';
import * as log from '../utils/logger';
import { target } from './descriptors';
import { WaitTimeoutError, type PageDriver } from './driver';
import { NotLoggedInError, PublishError, StepTimeoutError } from './errors';
import { ensureAuthenticated, type LoginGateOptions } from './login_gate';
import {
  clickSubmit,
  dismissSidePanel,
  selectHotspot,
  selectMusic,
  setTitle,
  typeDescription,
  uploadImages,
  uploadVideo,
} from './publish_steps';
import { DOUYIN_SELECTORS as S } from './selectors';
import { PublishState, type FailureCode, type PostDescriptor } from './types';

export type PublishWorkflowOptions = {
  postUrl: string;
  steps: StepTimings;
  login: LoginGateOptions;
  /** debug 모드에서 발행 직전 운영자의 계속 신호를 기다린다 */
  waitForContinue?: () => Promise<void>;
  onStateChange?: (state: PublishState) => void;
  onFailure?: (failure: PublishFailure) => Promise<void>;
};

export type PublishFailure = {
  /** 마지막으로 도달한 상태 */
  state: PublishState;
  /** 실패한 단계 (도달하려던 상태) */
  step: PublishState;
  code: FailureCode;
  reason: string;
  waitedFor?: string;
};

export type StepRecord = {
  state: PublishState;
  startedAt: number;
  elapsedMs: number;
  skipped: boolean;
  detail?: string;
};

export type PublishResult = {
  success: boolean;
  state: PublishState;
  history: PublishState[];
  steps: StepRecord[];
  failure?: PublishFailure;
};

type Transition = {
  next: PublishState;
  skipped?: boolean;
  detail?: string;
};

export function isTerminalState(state: PublishState): boolean {
  return state === PublishState.SUBMITTED || state === PublishState.FAILED;
}

/**
 * 발행 상태 머신.
 * 상태는 한 방향으로만 진행하고, 단계 간 재시도나 롤백은 하지 않는다.
 * 실패 시 브라우저는 그대로 두어 운영자가 이어서 작업할 수 있게 한다.
 */
export class PublishWorkflow {
  private readonly driver: PageDriver;
  private readonly post: PostDescriptor;
  private readonly options: PublishWorkflowOptions;
  private authenticated = false;

  constructor(driver: PageDriver, post: PostDescriptor, options: PublishWorkflowOptions) {
    this.driver = driver;
    this.post = post;
    this.options = options;
  }

  async run(): Promise<PublishResult> {
    let state: PublishState = PublishState.START;
    const history: PublishState[] = [];
    const steps: StepRecord[] = [];
    let failure: PublishFailure | undefined;

    this.enter(state, history);
    while (!isTerminalState(state)) {
      const step = this.plannedStep(state);
      const startedAt = Date.now();
      try {
        const transition = await this.advance(state);
        steps.push({
          state: transition.next,
          startedAt,
          elapsedMs: Date.now() - startedAt,
          skipped: transition.skipped ?? false,
          ...(transition.detail !== undefined ? { detail: transition.detail } : {}),
        });
        state = transition.next;
      } catch (error) {
        failure = toFailure(error, state, step);
        log.error(`[workflow] failed state=${failure.state} step=${failure.step} code=${failure.code} reason=${failure.reason}`);
        state = PublishState.FAILED;
      }
      this.enter(state, history);
    }

    if (failure && this.options.onFailure) {
      try {
        await this.options.onFailure(failure);
      } catch (hookError) {
        log.warn(`[workflow] onFailure hook failed: ${String(hookError)}`);
      }
    }
    if (state === PublishState.SUBMITTED) {
      log.success(`[workflow] submitted history=${history.join('>')}`);
    }

    return {
      success: state === PublishState.SUBMITTED,
      state,
      history,
      steps,
      ...(failure ? { failure } : {}),
    };
  }

  /** 현재 상태에서 다음으로 도달하려는 상태 */
  plannedStep(state: PublishState): PublishState {
    switch (state) {
      case PublishState.START:
        return PublishState.NAVIGATED;
      case PublishState.NAVIGATED:
        return PublishState.AUTHENTICATED;
      case PublishState.AUTHENTICATED:
        return this.post.mediaType === 'video' ? PublishState.VIDEO_UPLOADED : PublishState.IMAGES_UPLOADED;
      case PublishState.IMAGES_UPLOADED:
      case PublishState.VIDEO_UPLOADED:
        return PublishState.TITLE_SET;
      case PublishState.TITLE_SET:
        return PublishState.DESCRIPTION_SET;
      case PublishState.DESCRIPTION_SET:
        if (this.post.hotspot) return PublishState.HOTSPOT_SET;
        return this.post.useMusic ? PublishState.MUSIC_SET : PublishState.READY_TO_SUBMIT;
      case PublishState.HOTSPOT_SET:
        return this.post.useMusic ? PublishState.MUSIC_SET : PublishState.READY_TO_SUBMIT;
      case PublishState.MUSIC_SET:
        return PublishState.READY_TO_SUBMIT;
      case PublishState.READY_TO_SUBMIT:
        return this.post.debug ? PublishState.DEBUG_PAUSE : PublishState.SUBMITTED;
      case PublishState.DEBUG_PAUSE:
        return PublishState.SUBMITTED;
      case PublishState.SUBMITTED:
      case PublishState.FAILED:
        return state;
    }
  }

  private enter(state: PublishState, history: PublishState[]): void {
    history.push(state);
    log.info(`[workflow] state=${state}`);
    this.options.onStateChange?.(state);
  }

  private requireAuthenticated(step: PublishState): void {
    if (!this.authenticated) {
      throw new PublishError('NOT_LOGGED_IN', step, `[LOGIN_GATE_REQUIRED] step=${step} mutating action before login confirmation`);
    }
  }

  private async advance(state: PublishState): Promise<Transition> {
    const next = this.plannedStep(state);
    const { steps } = this.options;

    switch (next) {
      case PublishState.NAVIGATED:
        await this.driver.goto(this.options.postUrl, steps.navigate.timeoutMs);
        await this.driver.pause(steps.navigate.settleMs);
        return { next };

      case PublishState.AUTHENTICATED: {
        // 영상 페이지의 제목 입력창은 업로드 후에야 나타나므로 업로드 컨트롤로 판정한다
        const signal = this.post.mediaType === 'video' ? target(S.uploadTrigger) : target(S.titleInput);
        const gate = await ensureAuthenticated(this.driver, {
          ...this.options.login,
          signal,
          returnUrl: this.options.postUrl,
          navigateTimeoutMs: steps.navigate.timeoutMs,
        });
        this.authenticated = true;
        return { next, detail: `waited=${gate.waitedMs}ms` };
      }

      case PublishState.IMAGES_UPLOADED:
        this.requireAuthenticated(next);
        await uploadImages(this.driver, this.post.images, steps.upload);
        return { next, detail: `images=${this.post.images.length}` };

      case PublishState.VIDEO_UPLOADED: {
        this.requireAuthenticated(next);
        const video = this.post.images[0] ?? '';
        await uploadVideo(this.driver, video, steps.upload, steps.videoProcessing);
        return { next, detail: `video=${video.split(/[\\/]/).pop() ?? video}` };
      }

      case PublishState.TITLE_SET:
        if (this.post.title === undefined) return { next, skipped: true };
        this.requireAuthenticated(next);
        await setTitle(
          this.driver,
          this.post.title,
          steps.title,
          this.post.mediaType === 'video' ? S.videoTitleInput : S.titleInput,
        );
        return { next };

      case PublishState.DESCRIPTION_SET:
        if (!this.post.description) return { next, skipped: true };
        this.requireAuthenticated(next);
        await typeDescription(this.driver, this.post.description, steps.description);
        return { next };

      case PublishState.HOTSPOT_SET: {
        this.requireAuthenticated(next);
        const keyword = this.post.hotspot ?? '';
        const selected = await selectHotspot(this.driver, keyword, steps.hotspot);
        return { next, detail: selected };
      }

      case PublishState.MUSIC_SET: {
        this.requireAuthenticated(next);
        const { trackIndex } = await selectMusic(this.driver, steps.music);
        return { next, detail: `track=${trackIndex + 1}` };
      }

      case PublishState.READY_TO_SUBMIT: {
        this.requireAuthenticated(next);
        const dismissed = await dismissSidePanel(this.driver, steps.submit);
        return dismissed ? { next, detail: 'side_panel_dismissed' } : { next };
      }

      case PublishState.DEBUG_PAUSE:
        return { next };

      case PublishState.SUBMITTED: {
        if (state === PublishState.DEBUG_PAUSE) {
          await this.awaitContinuation();
        }
        this.requireAuthenticated(next);
        const label = await clickSubmit(this.driver, steps.submit);
        return { next, detail: label };
      }

      case PublishState.START:
      case PublishState.FAILED:
        throw new PublishError('UNEXPECTED', next, `[INVALID_TRANSITION] from=${state} to=${next}`);
    }
  }

  private async awaitContinuation(): Promise<void> {
    if (!this.options.waitForContinue) {
      throw new PublishError('UNEXPECTED', PublishState.DEBUG_PAUSE, '[DEBUG_PAUSE] continuation signal not configured');
    }
    log.info('[workflow] debug pause: 브라우저에서 확인 후 계속 신호를 보내세요');
    await this.options.waitForContinue();
    log.info('[workflow] debug pause released');
  }
}

export function toFailure(error: unknown, state: PublishState, step: PublishState): PublishFailure {
  if (error instanceof StepTimeoutError || error instanceof NotLoggedInError) {
    return {
      state,
      step,
      code: error.code,
      reason: error.message,
      waitedFor: error instanceof StepTimeoutError ? error.waitedFor : undefined,
    };
  }
  if (error instanceof PublishError) {
    return { state, step, code: error.code, reason: error.message };
  }
  if (error instanceof WaitTimeoutError) {
    return {
      state,
      step,
      code: 'STEP_TIMEOUT',
      reason: `[STEP_TIMEOUT] step=${step} ${error.message}`,
      waitedFor: error.waitedFor,
    };
  }
  return {
    state,
    step,
    code: 'UNEXPECTED',
    reason: error instanceof Error ? error.message : String(error),
  };
}
