import type { StepTiming } from '../common/config';
import * as log from '../utils/logger';
import { describeTarget, target, type ElementDescriptor, type Target } from './descriptors';
import { FileChooserTimeoutError, WaitTimeoutError, type PageDriver } from './driver';
import { HotspotError, StepTimeoutError, SubmitAmbiguousError, UploadError } from './errors';
import { DOUYIN_SELECTORS as S, SUBMIT_EXCLUDED_LABEL, SUBMIT_LABEL } from './selectors';
import { PublishState } from './types';

const TRACK_REVEAL_TIMEOUT_MS = 5_000;
const ENABLED_POLL_MS = 200;

async function waitVisible(
  driver: PageDriver,
  step: PublishState,
  t: Target,
  timeoutMs: number,
): Promise<void> {
  try {
    await driver.waitFor(t, 'visible', timeoutMs);
  } catch (error) {
    if (error instanceof WaitTimeoutError) throw new StepTimeoutError(step, describeTarget(t), timeoutMs);
    throw error;
  }
}

/** chooser 가로채기를 건 뒤 업로드 컨트롤을 눌러 파일 목록을 한 번에 넘긴다 */
async function chooseFiles(
  driver: PageDriver,
  step: PublishState,
  files: readonly string[],
  timing: StepTiming,
): Promise<void> {
  const trigger = target(S.uploadTrigger);
  await waitVisible(driver, step, trigger, timing.timeoutMs);
  try {
    await driver.withFileChooser(
      async () => await driver.click(trigger, timing.timeoutMs),
      files,
      timing.timeoutMs,
    );
  } catch (error) {
    if (error instanceof FileChooserTimeoutError) {
      throw new UploadError(
        `file chooser not opened within ${timing.timeoutMs}ms after clicking ${describeTarget(trigger)}`,
        step,
      );
    }
    throw error;
  }
  log.info(`[upload] files=${files.length} ${files.map((p) => p.split(/[\\/]/).pop()).join(', ')}`);
  await driver.pause(timing.settleMs);
}

export async function uploadImages(
  driver: PageDriver,
  images: readonly string[],
  timing: StepTiming,
): Promise<void> {
  await chooseFiles(driver, PublishState.IMAGES_UPLOADED, images, timing);
}

/** 영상은 서버 처리가 끝나야 제목 입력창이 나타나므로 그때까지 기다린다 */
export async function uploadVideo(
  driver: PageDriver,
  video: string,
  upload: StepTiming,
  processing: StepTiming,
): Promise<void> {
  await chooseFiles(driver, PublishState.VIDEO_UPLOADED, [video], upload);
  await waitVisible(driver, PublishState.VIDEO_UPLOADED, target(S.videoTitleInput), processing.timeoutMs);
  log.info('[upload] video processed');
  await driver.pause(processing.settleMs);
}

export async function setTitle(
  driver: PageDriver,
  title: string,
  timing: StepTiming,
  input: ElementDescriptor = S.titleInput,
): Promise<void> {
  const field = target(input);
  await waitVisible(driver, PublishState.TITLE_SET, field, timing.timeoutMs);
  await driver.fill(field, title, timing.timeoutMs);
  log.info(`[title] ${title.slice(0, 20)}${title.length > 20 ? '...' : ''}`);
  await driver.pause(timing.settleMs);
}

/** contenteditable 영역은 값 대입이 반영되지 않아 키 입력으로 넣는다 */
export async function typeDescription(driver: PageDriver, description: string, timing: StepTiming): Promise<void> {
  const editor = target(S.descriptionEditor);
  await waitVisible(driver, PublishState.DESCRIPTION_SET, editor, timing.timeoutMs);
  await driver.click(editor, timing.timeoutMs);
  await driver.typeText(description);
  log.info(`[description] chars=${description.length}`);
  await driver.pause(timing.settleMs);
}

export async function selectHotspot(driver: PageDriver, keyword: string, timing: StepTiming): Promise<string> {
  const prompt = target(S.hotspotPrompt);
  await waitVisible(driver, PublishState.HOTSPOT_SET, prompt, timing.timeoutMs);
  await driver.click(prompt, timing.timeoutMs);
  await driver.typeText(keyword);

  const suggestion = target(S.hotspotSuggestion, 'first');
  try {
    await driver.waitFor(suggestion, 'visible', timing.timeoutMs);
  } catch (error) {
    if (error instanceof WaitTimeoutError) {
      throw new HotspotError(keyword, `no suggestion within ${timing.timeoutMs}ms waitedFor=[${describeTarget(suggestion)}]`);
    }
    throw error;
  }
  const label = (await driver.textContent(suggestion, timing.timeoutMs)).trim();
  await driver.click(suggestion, timing.timeoutMs);
  log.info(`[hotspot] keyword=${keyword} selected=${label}`);
  await driver.pause(timing.settleMs);
  return label;
}

/**
 * 추천 트랙을 순서대로 hover 해서 숨겨진 "使用" 버튼이 드러나는 첫 트랙을 고른다.
 * 선택 후 패널을 반드시 닫는다. 열린 패널은 발행 버튼을 가린다.
 */
export async function selectMusic(driver: PageDriver, timing: StepTiming): Promise<{ trackIndex: number }> {
  const open = target(S.musicOpen, 'last');
  await waitVisible(driver, PublishState.MUSIC_SET, open, timing.timeoutMs);
  await driver.click(open, timing.timeoutMs);
  await waitVisible(driver, PublishState.MUSIC_SET, target(S.musicPanel), timing.timeoutMs);

  const firstTrack = target(S.musicTrackLabel, 'first');
  try {
    await driver.waitFor(firstTrack, 'attached', timing.timeoutMs);
  } catch (error) {
    if (error instanceof WaitTimeoutError) {
      throw new StepTimeoutError(PublishState.MUSIC_SET, describeTarget(firstTrack), timing.timeoutMs);
    }
    throw error;
  }

  const trackCount = await driver.count(firstTrack);
  const useButton = target(S.musicUseButton, 'first');
  const revealTimeoutMs = Math.min(TRACK_REVEAL_TIMEOUT_MS, timing.timeoutMs);
  let chosen = -1;

  for (let i = 0; i < trackCount && chosen < 0; i++) {
    const hovered = await driver.pointerOver(target(S.musicTrackLabel, i));
    if (!hovered) {
      log.warn(`[music] track=${i + 1} has no bounding box, skip`);
      continue;
    }
    try {
      await driver.waitFor(useButton, 'visible', revealTimeoutMs);
    } catch (error) {
      if (!(error instanceof WaitTimeoutError)) throw error;
      log.warn(`[music] track=${i + 1} use button not revealed within ${revealTimeoutMs}ms`);
      continue;
    }
    await driver.click(useButton, timing.timeoutMs);
    chosen = i;
  }

  if (chosen < 0) {
    throw new StepTimeoutError(
      PublishState.MUSIC_SET,
      `${describeTarget(useButton)} after hover over ${trackCount} track(s)`,
      revealTimeoutMs,
    );
  }
  log.info(`[music] selected track=${chosen + 1}/${trackCount}`);
  await driver.pause(timing.settleMs);
  await closeMusicPanel(driver, timing);
  return { trackIndex: chosen };
}

export async function closeMusicPanel(driver: PageDriver, timing: StepTiming): Promise<void> {
  const panel = target(S.musicPanel);
  await driver.click(target(S.musicPanelClose), timing.timeoutMs);
  try {
    await driver.waitFor(panel, 'hidden', timing.timeoutMs);
    return;
  } catch (error) {
    if (!(error instanceof WaitTimeoutError)) throw error;
  }

  log.warn('[music] panel still open after close, dismiss via mask');
  await dismissSidePanel(driver, timing);
  try {
    await driver.waitFor(panel, 'hidden', timing.timeoutMs);
  } catch (error) {
    if (error instanceof WaitTimeoutError) {
      throw new StepTimeoutError(PublishState.MUSIC_SET, `${describeTarget(panel)} hidden`, timing.timeoutMs);
    }
    throw error;
  }
}

/** 남아 있는 사이드 패널 마스크가 있으면 닫는다. 없으면 아무 동작도 하지 않는다 */
export async function dismissSidePanel(driver: PageDriver, timing: StepTiming): Promise<boolean> {
  const mask = target(S.sidePanelMask);
  if (!(await driver.isVisible(mask))) return false;
  await driver.click(mask, timing.timeoutMs);
  await driver.pause(timing.settleMs);
  return true;
}

/**
 * "发布" 버튼을 누른다. 비슷하게 생긴 "高清发布" 버튼은 절대 누르지 않는다.
 * 클릭 후 확인 UI는 기다리지 않는다.
 */
export async function clickSubmit(driver: PageDriver, timing: StepTiming): Promise<string> {
  const submit = target(S.submitButton, 'first');
  try {
    await driver.waitFor(submit, 'visible', timing.timeoutMs);
  } catch (error) {
    if (error instanceof WaitTimeoutError) {
      throw new SubmitAmbiguousError('no_match', `waitedFor=[${describeTarget(submit)}] timeoutMs=${timing.timeoutMs}`);
    }
    throw error;
  }

  const label = (await driver.textContent(submit, timing.timeoutMs)).trim();
  if (label.includes(SUBMIT_EXCLUDED_LABEL) || !label.includes(SUBMIT_LABEL)) {
    throw new SubmitAmbiguousError('excluded_variant_matched', `label=${label}`);
  }

  const deadline = Date.now() + timing.timeoutMs;
  while (!(await driver.isEnabled(submit))) {
    if (Date.now() >= deadline) {
      throw new StepTimeoutError(PublishState.SUBMITTED, `${describeTarget(submit)} enabled`, timing.timeoutMs);
    }
    await driver.pause(ENABLED_POLL_MS);
  }

  await driver.click(submit, timing.timeoutMs);
  log.info(`[submit] clicked label=${label}`);
  await driver.pause(timing.settleMs);
  return label;
}
