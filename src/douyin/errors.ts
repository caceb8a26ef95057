import type { FailureCode } from './types';

export class PublishError extends Error {
  readonly code: FailureCode;
  readonly step: string;

  constructor(code: FailureCode, step: string, message: string) {
    super(message);
    this.name = 'PublishError';
    this.code = code;
    this.step = step;
  }
}

export class ConnectionError extends PublishError {
  readonly endpoint: string;

  constructor(endpoint: string, detail: string) {
    super('CONNECTION_ERROR', 'SESSION', `[CONNECTION_ERROR] endpoint=${endpoint} ${detail}`);
    this.name = 'ConnectionError';
    this.endpoint = endpoint;
  }
}

export class NotLoggedInError extends PublishError {
  readonly timeoutMs: number;

  constructor(waitedFor: string, timeoutMs: number) {
    super(
      'NOT_LOGGED_IN',
      'AUTHENTICATED',
      `[NOT_LOGGED_IN] waitedFor=[${waitedFor}] timeoutMs=${timeoutMs}`,
    );
    this.name = 'NotLoggedInError';
    this.timeoutMs = timeoutMs;
  }
}

export class UploadError extends PublishError {
  constructor(detail: string, step: string = 'IMAGES_UPLOADED') {
    super('UPLOAD_ERROR', step, `[UPLOAD_ERROR] step=${step} ${detail}`);
    this.name = 'UploadError';
  }
}

export class HotspotError extends PublishError {
  readonly keyword: string;

  constructor(keyword: string, detail: string) {
    super('HOTSPOT_ERROR', 'HOTSPOT_SET', `[HOTSPOT_ERROR] keyword=${keyword} ${detail}`);
    this.name = 'HotspotError';
    this.keyword = keyword;
  }
}

export class StepTimeoutError extends PublishError {
  readonly waitedFor: string;
  readonly timeoutMs: number;

  constructor(step: string, waitedFor: string, timeoutMs: number) {
    super('STEP_TIMEOUT', step, `[STEP_TIMEOUT] step=${step} waitedFor=[${waitedFor}] timeoutMs=${timeoutMs}`);
    this.name = 'StepTimeoutError';
    this.waitedFor = waitedFor;
    this.timeoutMs = timeoutMs;
  }
}

export class SubmitAmbiguousError extends PublishError {
  readonly reason: 'no_match' | 'excluded_variant_matched';

  constructor(reason: 'no_match' | 'excluded_variant_matched', detail: string) {
    super('SUBMIT_AMBIGUOUS', 'SUBMITTED', `[SUBMIT_AMBIGUOUS] reason=${reason} ${detail}`);
    this.name = 'SubmitAmbiguousError';
    this.reason = reason;
  }
}

export class InvalidPostError extends PublishError {
  constructor(detail: string) {
    super('INVALID_POST', 'START', `[INVALID_POST] ${detail}`);
    this.name = 'InvalidPostError';
  }
}

export class ProfileLockedError extends PublishError {
  readonly lockPath: string;
  readonly holderPid: number;

  constructor(lockPath: string, holderPid: number) {
    super('PROFILE_LOCKED', 'SESSION', `[PROFILE_LOCKED] lock=${lockPath} pid=${holderPid}`);
    this.name = 'ProfileLockedError';
    this.lockPath = lockPath;
    this.holderPid = holderPid;
  }
}
