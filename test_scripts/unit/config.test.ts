import * as path from 'path';
import {
  DEFAULT_CDP_ENDPOINT,
  DEFAULT_POST_URL,
  DEFAULT_VIDEO_POST_URL,
  DEFAULT_VOICE,
  getConfig,
  readIntEnv,
} from '../../src/common/config';

describe('config', () => {
  test('환경변수가 없으면 기본값을 쓴다', () => {
    const config = getConfig({}, {});

    expect(config.postUrl).toBe(DEFAULT_POST_URL);
    expect(config.cdpEndpoint).toBe(DEFAULT_CDP_ENDPOINT);
    expect(config.profileDir).toBe(path.resolve('./.secrets/douyin_profile'));
    expect(config.dataDir).toBe(path.resolve('./data'));
    expect(config.voice).toBe(DEFAULT_VOICE);
    expect(config.chromePath).toBeUndefined();
    expect(config.loginTimeoutMs).toBe(120_000);
    expect(config.steps.navigate).toEqual({ timeoutMs: 60_000, settleMs: 5_000 });
    expect(config.steps.submit).toEqual({ timeoutMs: 10_000, settleMs: 3_000 });
    expect(config.videoPostUrl).toBe(DEFAULT_VIDEO_POST_URL);
    expect(config.steps.videoProcessing).toEqual({ timeoutMs: 120_000, settleMs: 2_000 });
  });

  test('동영상 게시 URL과 처리 대기 시간을 환경변수로 바꾼다', () => {
    const config = getConfig({}, {
      DOUYIN_VIDEO_POST_URL: 'https://creator.example.test/upload',
      DOUYIN_VIDEO_PROCESSING_TIMEOUT_MS: '300000',
    });
    expect(config.videoPostUrl).toBe('https://creator.example.test/upload');
    expect(config.steps.videoProcessing).toEqual({ timeoutMs: 300_000, settleMs: 2_000 });
  });

  test('CLI override가 환경변수보다 우선한다', () => {
    const env = {
      DOUYIN_PROFILE_DIR: '/env/profile',
      DOUYIN_CDP_ENDPOINT: 'http://127.0.0.1:9333',
      DOUYIN_CHROME_PATH: '/opt/chrome/chrome',
    };
    expect(getConfig({}, env).profileDir).toBe('/env/profile');
    expect(getConfig({ profileDir: '/cli/profile' }, env).profileDir).toBe('/cli/profile');
    expect(getConfig({ cdpEndpoint: 'http://127.0.0.1:9444' }, env).cdpEndpoint).toBe('http://127.0.0.1:9444');
    expect(getConfig({}, env).chromePath).toBe('/opt/chrome/chrome');
  });

  test('단계별 timeout/settle 환경변수', () => {
    const config = getConfig({}, { DOUYIN_HOTSPOT_TIMEOUT_MS: '20_000', DOUYIN_MUSIC_SETTLE_MS: '0' });
    expect(config.steps.hotspot).toEqual({ timeoutMs: 20_000, settleMs: 1_000 });
    expect(config.steps.music).toEqual({ timeoutMs: 10_000, settleMs: 0 });
  });

  test('잘못된 숫자는 기본값, 하한 미만은 하한으로', () => {
    expect(readIntEnv({ X: 'abc' }, 'X', 500)).toBe(500);
    expect(readIntEnv({ X: '' }, 'X', 500)).toBe(500);
    expect(readIntEnv({ X: '10' }, 'X', 500, 100)).toBe(100);
    expect(readIntEnv({ X: '1_500' }, 'X', 500)).toBe(1500);
  });
});
