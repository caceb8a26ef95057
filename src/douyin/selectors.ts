import {
  byAttributePattern,
  byPlaceholder,
  byText,
  within,
  type ElementDescriptor,
} from './descriptors';

/**
 * 크리에이터 플랫폼 UI와의 계약.
 * 플랫폼 마크업이 바뀌면 버전 신호 없이 깨질 수 있으므로 모든 로케이터를 이 파일에 모은다.
 */
export const SUBMIT_LABEL = '发布';
export const SUBMIT_EXCLUDED_LABEL = '高清发布';

const musicPanel = byAttributePattern('class', 'sidesheet');

export const DOUYIN_SELECTORS = {
  /** 로그인 상태에서만 렌더링되는 제목 입력창 (로그인 판정 신호 겸용) */
  titleInput: byPlaceholder('添加作品标题', { exact: true }),
  /** 동영상 게시 페이지의 제목 입력창. 영상 업로드 처리가 끝나야 나타난다 */
  videoTitleInput: byPlaceholder('标题'),
  uploadTrigger: byText('点击上传'),
  descriptionEditor: byAttributePattern('contenteditable', 'true', { match: 'equals' }),
  hotspotPrompt: byText('点击输入热点词'),
  hotspotSuggestion: byAttributePattern('class', 'option', { visibleOnly: true }),
  musicOpen: byText('选择音乐'),
  musicPanel,
  /** 트랙 행마다 있는 "使用" 라벨. hover 전에는 버튼이 숨겨져 있다 */
  musicTrackLabel: within(musicPanel, byText('使用')),
  musicUseButton: byAttributePattern('class', 'primary', { tag: 'button', hasText: '使用', visibleOnly: true }),
  musicPanelClose: within(musicPanel, byAttributePattern('class', 'close')),
  sidePanelMask: byAttributePattern('class', 'sidesheet-mask', { visibleOnly: true }),
  submitButton: byText(SUBMIT_LABEL, { tag: 'button', excludeText: SUBMIT_EXCLUDED_LABEL, visibleOnly: true }),
} satisfies Record<string, ElementDescriptor>;
