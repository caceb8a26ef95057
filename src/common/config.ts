import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

export const DEFAULT_POST_URL =
  'https://creator.douyin.com/creator-micro/content/post/image?enter_from=publish_page&media_type=image&type=new';
export const DEFAULT_VIDEO_POST_URL =
  'https://creator.douyin.com/creator-micro/content/upload?enter_from=publish_page';
export const DEFAULT_CDP_ENDPOINT = 'http://127.0.0.1:9222';
export const DEFAULT_PROFILE_DIR = './.secrets/douyin_profile';
export const DEFAULT_VOICE = 'zh-CN-XiaoxiaoNeural';

export type StepTiming = {
  timeoutMs: number;
  settleMs: number;
};

export type StepTimings = {
  navigate: StepTiming;
  upload: StepTiming;
  title: StepTiming;
  description: StepTiming;
  hotspot: StepTiming;
  music: StepTiming;
  submit: StepTiming;
  /** 영상 업로드 후 제목 입력창이 나타날 때까지 */
  videoProcessing: StepTiming;
};

export type AppConfig = {
  postUrl: string;
  videoPostUrl: string;
  cdpEndpoint: string;
  profileDir: string;
  chromePath?: string;
  dataDir: string;
  voice: string;
  launchTimeoutMs: number;
  loginTimeoutMs: number;
  loginPollIntervalMs: number;
  steps: StepTimings;
};

let envLoaded = false;

export function loadEnvFile(cwd: string = process.cwd()): void {
  if (envLoaded) return;
  envLoaded = true;
  const envPath = path.resolve(cwd, '.env');
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

export function readIntEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number = 0,
): number {
  const raw = (env[name] ?? '').replace(/_/g, '').trim();
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, parsed);
}

function readStep(
  env: NodeJS.ProcessEnv,
  key: string,
  defaults: StepTiming,
): StepTiming {
  return {
    timeoutMs: readIntEnv(env, `DOUYIN_${key}_TIMEOUT_MS`, defaults.timeoutMs, 1_000),
    settleMs: readIntEnv(env, `DOUYIN_${key}_SETTLE_MS`, defaults.settleMs, 0),
  };
}

export function getConfig(
  overrides: { profileDir?: string; cdpEndpoint?: string } = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const profileDir = overrides.profileDir?.trim()
    || env.DOUYIN_PROFILE_DIR?.trim()
    || DEFAULT_PROFILE_DIR;
  const chromePath = env.DOUYIN_CHROME_PATH?.trim();
  return {
    postUrl: env.DOUYIN_POST_URL?.trim() || DEFAULT_POST_URL,
    videoPostUrl: env.DOUYIN_VIDEO_POST_URL?.trim() || DEFAULT_VIDEO_POST_URL,
    cdpEndpoint: overrides.cdpEndpoint?.trim() || env.DOUYIN_CDP_ENDPOINT?.trim() || DEFAULT_CDP_ENDPOINT,
    profileDir: path.resolve(profileDir),
    ...(chromePath ? { chromePath } : {}),
    dataDir: path.resolve(env.DOUYIN_DATA_DIR?.trim() || './data'),
    voice: env.DOUYIN_TTS_VOICE?.trim() || DEFAULT_VOICE,
    launchTimeoutMs: readIntEnv(env, 'DOUYIN_LAUNCH_TIMEOUT_MS', 30_000, 5_000),
    loginTimeoutMs: readIntEnv(env, 'DOUYIN_LOGIN_TIMEOUT_MS', 120_000, 5_000),
    loginPollIntervalMs: readIntEnv(env, 'DOUYIN_LOGIN_POLL_MS', 1_000, 100),
    steps: {
      navigate: readStep(env, 'NAVIGATE', { timeoutMs: 60_000, settleMs: 5_000 }),
      upload: readStep(env, 'UPLOAD', { timeoutMs: 15_000, settleMs: 3_000 }),
      title: readStep(env, 'TITLE', { timeoutMs: 15_000, settleMs: 500 }),
      description: readStep(env, 'DESCRIPTION', { timeoutMs: 15_000, settleMs: 500 }),
      hotspot: readStep(env, 'HOTSPOT', { timeoutMs: 10_000, settleMs: 1_000 }),
      music: readStep(env, 'MUSIC', { timeoutMs: 10_000, settleMs: 1_000 }),
      submit: readStep(env, 'SUBMIT', { timeoutMs: 10_000, settleMs: 3_000 }),
      videoProcessing: readStep(env, 'VIDEO_PROCESSING', { timeoutMs: 120_000, settleMs: 2_000 }),
    },
  };
}
