export enum PublishState {
  START = 'START',
  NAVIGATED = 'NAVIGATED',
  AUTHENTICATED = 'AUTHENTICATED',
  IMAGES_UPLOADED = 'IMAGES_UPLOADED',
  VIDEO_UPLOADED = 'VIDEO_UPLOADED',
  TITLE_SET = 'TITLE_SET',
  DESCRIPTION_SET = 'DESCRIPTION_SET',
  HOTSPOT_SET = 'HOTSPOT_SET',
  MUSIC_SET = 'MUSIC_SET',
  READY_TO_SUBMIT = 'READY_TO_SUBMIT',
  DEBUG_PAUSE = 'DEBUG_PAUSE',
  SUBMITTED = 'SUBMITTED',
  FAILED = 'FAILED',
}

export type FailureCode =
  | 'CONNECTION_ERROR'
  | 'NOT_LOGGED_IN'
  | 'UPLOAD_ERROR'
  | 'HOTSPOT_ERROR'
  | 'STEP_TIMEOUT'
  | 'SUBMIT_AMBIGUOUS'
  | 'INVALID_POST'
  | 'PROFILE_LOCKED'
  | 'UNEXPECTED';

export type PostMediaType = 'image' | 'video';

/** Workflow 한 번의 실행이 소유하는 입력. 생성 후 변경하지 않는다. */
export interface PostDescriptor {
  readonly mediaType: PostMediaType;
  /** 업로드 순서대로의 파일. video면 영상 파일 하나 */
  readonly images: readonly string[];
  readonly title?: string;
  readonly description?: string;
  readonly hotspot?: string;
  readonly useMusic: boolean;
  readonly debug: boolean;
}
