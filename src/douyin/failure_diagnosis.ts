import { PublishError } from './errors';
import type { FailureCode } from './types';

/**
 * 운영자용 실패 분류.
 * a) 브라우저 연결  b) 로그인  c) 화면 변경/느린 로딩  d) 입력 문제
 */
export type DiagnosisCategory = 'a' | 'b' | 'c' | 'd' | 'unknown';

export type FailureDiagnosis = {
  category: DiagnosisCategory;
  reason: string;
  hint: string;
};

const CATEGORY_HINTS: Record<DiagnosisCategory, string> = {
  a: 'a) 브라우저 연결 실패: Chrome 실행 경로(DOUYIN_CHROME_PATH)와 CDP 포트, 다른 실행 중인 발행 작업을 확인하세요',
  b: 'b) 로그인 필요: 열린 브라우저 창에서 로그인한 뒤 다시 실행하세요',
  c: 'c) 화면 변경 또는 로딩 지연: 브라우저 화면과 debug 디렉토리의 스크린샷을 확인하세요',
  d: 'd) 입력 문제: 파일 경로와 텍스트 인자, edge-tts/ffmpeg 설치를 확인하세요',
  unknown: '분류되지 않은 실패: 로그와 스택을 확인하세요',
};

const CODE_CATEGORY: Record<FailureCode, DiagnosisCategory> = {
  CONNECTION_ERROR: 'a',
  PROFILE_LOCKED: 'a',
  NOT_LOGGED_IN: 'b',
  UPLOAD_ERROR: 'c',
  HOTSPOT_ERROR: 'c',
  STEP_TIMEOUT: 'c',
  SUBMIT_AMBIGUOUS: 'c',
  INVALID_POST: 'd',
  UNEXPECTED: 'unknown',
};

export function diagnoseFailureCode(code: FailureCode): FailureDiagnosis {
  const category = CODE_CATEGORY[code];
  return { category, reason: code.toLowerCase(), hint: CATEGORY_HINTS[category] };
}

export function classifyExecutionFailure(error: unknown): FailureDiagnosis {
  if (error instanceof PublishError) {
    return diagnoseFailureCode(error.code);
  }
  const message = error instanceof Error ? error.message : String(error);
  if (/^\[(TTS_FAILED|VIDEO_FAILED)\]/.test(message)) {
    return { category: 'd', reason: 'media_tool_failed', hint: CATEGORY_HINTS.d };
  }
  if (/ECONNREFUSED|connectOverCDP|Target page, context or browser has been closed/i.test(message)) {
    return { category: 'a', reason: 'browser_disconnected', hint: CATEGORY_HINTS.a };
  }
  if (/ENOENT|no such file/i.test(message)) {
    return { category: 'd', reason: 'file_not_found', hint: CATEGORY_HINTS.d };
  }
  return { category: 'unknown', reason: 'unclassified', hint: CATEGORY_HINTS.unknown };
}
