import { classifyExecutionFailure, diagnoseFailureCode } from '../../src/douyin/failure_diagnosis';
import {
  ConnectionError,
  InvalidPostError,
  NotLoggedInError,
  ProfileLockedError,
  StepTimeoutError,
} from '../../src/douyin/errors';

describe('failure diagnosis', () => {
  test('실패 코드를 운영자 분류로 바꾼다', () => {
    expect(diagnoseFailureCode('CONNECTION_ERROR').category).toBe('a');
    expect(diagnoseFailureCode('NOT_LOGGED_IN').category).toBe('b');
    expect(diagnoseFailureCode('HOTSPOT_ERROR')).toEqual({
      category: 'c',
      reason: 'hotspot_error',
      hint: 'c) 화면 변경 또는 로딩 지연: 브라우저 화면과 debug 디렉토리의 스크린샷을 확인하세요',
    });
    expect(diagnoseFailureCode('INVALID_POST').category).toBe('d');
    expect(diagnoseFailureCode('UNEXPECTED').category).toBe('unknown');
  });

  test('PublishError 계열은 코드로 분류한다', () => {
    expect(classifyExecutionFailure(new ConnectionError('http://127.0.0.1:9222', 'x')).reason).toBe('connection_error');
    expect(classifyExecutionFailure(new ProfileLockedError('/p/.lock', 42)).category).toBe('a');
    expect(classifyExecutionFailure(new NotLoggedInError('placeholder="x"', 10)).category).toBe('b');
    expect(classifyExecutionFailure(new StepTimeoutError('TITLE_SET', 'x', 10)).reason).toBe('step_timeout');
    expect(classifyExecutionFailure(new InvalidPostError('images=0')).category).toBe('d');
  });

  test('일반 에러는 메시지로 분류한다', () => {
    expect(classifyExecutionFailure(new Error('connect ECONNREFUSED 127.0.0.1:9222')).reason).toBe('browser_disconnected');
    expect(classifyExecutionFailure(new Error('ENOENT: no such file or directory')).reason).toBe('file_not_found');
    expect(classifyExecutionFailure(new Error('[TTS_FAILED] status=null stderr=edge-tts 실행 실패: spawn edge-tts ENOENT')))
      .toEqual({
        category: 'd',
        reason: 'media_tool_failed',
        hint: 'd) 입력 문제: 파일 경로와 텍스트 인자, edge-tts/ffmpeg 설치를 확인하세요',
      });
    expect(classifyExecutionFailure(new Error('[VIDEO_FAILED] stage=encode status=1 stderr=x')).reason).toBe('media_tool_failed');
    expect(classifyExecutionFailure('boom')).toEqual({
      category: 'unknown',
      reason: 'unclassified',
      hint: '분류되지 않은 실패: 로그와 스택을 확인하세요',
    });
  });
});
