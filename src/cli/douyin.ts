#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { Command } from 'commander';

import * as log from '../utils/logger';
import { createDebugRunDir } from '../common/debug_paths';
import { getConfig, loadEnvFile, type AppConfig } from '../common/config';
import { createPostFolder, resolveMusicOutput } from '../utils/post_folder';
import { renderCover } from '../media/cover';
import { synthesizeSpeech } from '../media/tts';
import { buildShareVideo } from '../media/share_video';
import { parseShareText, toShareDescription, type ShareText } from '../utils/share_content';
import { InvalidPostError } from '../douyin/errors';
import { createPostDescriptor, type PostDescriptorInput } from '../douyin/post_descriptor';
import { acquireProfileLock } from '../douyin/profile_lock';
import { acquireSession, releaseSession, type SessionHandle } from '../douyin/session';
import { PublishWorkflow } from '../douyin/publish_workflow';
import type { PostDescriptor } from '../douyin/types';
import { classifyExecutionFailure, diagnoseFailureCode, type FailureDiagnosis } from '../douyin/failure_diagnosis';

export type PostCommandOptions = {
  title?: string;
  description?: string;
  hotspot?: string;
  music?: boolean;
  debug?: boolean;
  profileDir?: string;
  cdpEndpoint?: string;
};

export type ShareCommandOptions = {
  fromFile?: string;
  post?: boolean;
  hotspot?: string;
  voice?: string;
  sanitize?: boolean;
  debug?: boolean;
  profileDir?: string;
  cdpEndpoint?: string;
};

export function toPostInput(images: string[], opts: PostCommandOptions): PostDescriptorInput {
  return {
    images,
    ...(opts.title !== undefined ? { title: opts.title } : {}),
    ...(opts.description !== undefined ? { description: opts.description } : {}),
    ...(opts.hotspot !== undefined ? { hotspot: opts.hotspot } : {}),
    useMusic: opts.music ?? true,
    debug: opts.debug ?? false,
  };
}

/** --from-file이 있으면 파일에서, 없으면 두 인자에서 제목과 본문을 읽는다 */
export function toShareText(
  title: string | undefined,
  content: string | undefined,
  fromFile: string | undefined,
  readFile: (filePath: string) => string = (p) => fs.readFileSync(p, 'utf-8'),
): ShareText {
  if (fromFile) return parseShareText(readFile(path.resolve(fromFile)));
  if (title?.trim() && content?.trim()) return { title: title.trim(), content: content.trim() };
  throw new InvalidPostError('share: <title> <content> 또는 --from-file <file> 이 필요합니다');
}

export function toShareVideoInput(video: string, text: ShareText, opts: ShareCommandOptions): PostDescriptorInput {
  return {
    mediaType: 'video',
    images: [video],
    title: text.title,
    description: toShareDescription(text.content),
    ...(opts.hotspot !== undefined ? { hotspot: opts.hotspot } : {}),
    useMusic: false,
    debug: opts.debug ?? false,
  };
}

function printDiagnosis(diagnosis: FailureDiagnosis): void {
  log.error(`[diagnostic] category=${diagnosis.category} reason=${diagnosis.reason}`);
  log.info(`[diagnostic] ${diagnosis.hint}`);
}

function waitForEnter(prompt: string): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(prompt, () => {
      rl.close();
      resolve();
    });
  });
}

async function runPost(images: string[], opts: PostCommandOptions): Promise<number> {
  loadEnvFile();
  const config = getConfig({ profileDir: opts.profileDir, cdpEndpoint: opts.cdpEndpoint });
  const post = createPostDescriptor(toPostInput(images, opts));
  return await publishPost(post, config);
}

async function runShare(
  title: string | undefined,
  content: string | undefined,
  opts: ShareCommandOptions,
): Promise<number> {
  loadEnvFile();
  const config = getConfig({ profileDir: opts.profileDir, cdpEndpoint: opts.cdpEndpoint });
  const text = toShareText(title, content, opts.fromFile);
  const artifacts = await buildShareVideo({
    ...text,
    dataDir: config.dataDir,
    voice: opts.voice ?? config.voice,
    sanitize: opts.sanitize ?? true,
  });
  log.success(`영상: ${artifacts.videoPath}`);
  if (!opts.post) {
    log.info('[share] --post 를 붙이면 바로 발행합니다');
    return 0;
  }
  const post = createPostDescriptor(toShareVideoInput(artifacts.videoPath, artifacts, opts));
  return await publishPost(post, config);
}

async function publishPost(post: PostDescriptor, config: AppConfig): Promise<number> {
  log.info(
    `[post] media=${post.mediaType} files=${post.images.length} title=${post.title ?? '(none)'} ` +
    `hotspot=${post.hotspot ?? '(none)'} music=${post.useMusic} debug=${post.debug}`,
  );

  const lock = acquireProfileLock(config.profileDir);
  let session: SessionHandle | null = null;
  try {
    session = await acquireSession({
      endpoint: config.cdpEndpoint,
      profileDir: config.profileDir,
      ...(config.chromePath ? { chromePath: config.chromePath } : {}),
      launchTimeoutMs: config.launchTimeoutMs,
    });
    const page = session.page;
    log.info(`[session] ${session.attached ? 'attached' : 'launched'} endpoint=${session.endpoint} profileDir=${session.profileDir}`);

    const workflow = new PublishWorkflow(session.driver, post, {
      postUrl: post.mediaType === 'video' ? config.videoPostUrl : config.postUrl,
      steps: config.steps,
      login: { timeoutMs: config.loginTimeoutMs, pollIntervalMs: config.loginPollIntervalMs },
      waitForContinue: async () => await waitForEnter('[debug] 브라우저에서 확인한 뒤 Enter를 누르면 발행합니다...'),
      onFailure: async (failure) => {
        const runName = post.mediaType === 'video' ? 'douyin_share' : 'douyin_publish';
        const debugDir = createDebugRunDir(runName, failure.step.toLowerCase());
        const saved = await log.captureFailure(page, failure.step, debugDir);
        log.error(`[debug] artifacts=${saved.length} dir=${debugDir}`);
      },
    });

    const result = await workflow.run();
    log.logStructured('publish_result', {
      media: post.mediaType,
      success: result.success,
      state: result.state,
      history: result.history,
      failure: result.failure ?? null,
    });
    if (!result.success) {
      if (result.failure) printDiagnosis(diagnoseFailureCode(result.failure.code));
      log.info('[post] 브라우저는 열린 상태로 유지됩니다. 화면에서 이어서 처리할 수 있습니다.');
      return 1;
    }
    log.success('[post] 발행 완료');
    return 0;
  } finally {
    if (session) await releaseSession(session);
    lock.release();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('douyin-poster')
    .description('抖音 이미지/동영상 게시물 표지 생성, TTS 음성, 발행 자동화');

  program
    .command('cover')
    .description('표지 이미지 생성 (첫 줄 제목, \\n 으로 줄바꿈)')
    .argument('<text>', '표지 문구')
    .option('-o, --output <path>', '출력 경로 (기본: data/ 아래 새 게시물 폴더)')
    .action(async (text: string, opts: { output?: string }) => {
      loadEnvFile();
      const config = getConfig();
      const normalized = text.replace(/\\n/g, '\n');
      const output = opts.output
        ? path.resolve(opts.output)
        : createPostFolder(normalized, config.dataDir).coverPath;
      await renderCover(normalized, output);
      log.success(`표지: ${output}`);
    });

  program
    .command('music')
    .description('edge-tts로 음성 파일 생성 (가장 최근 게시물 폴더의 music.mp3)')
    .argument('<text>', '변환할 문구')
    .option('--voice <voice>', 'TTS 음성')
    .option('-o, --output <path>', '출력 경로')
    .action((text: string, opts: { voice?: string; output?: string }) => {
      loadEnvFile();
      const config = getConfig();
      const output = opts.output ? path.resolve(opts.output) : resolveMusicOutput(config.dataDir);
      synthesizeSpeech(text, opts.voice ?? config.voice, output);
      log.success(`음악: ${output}`);
    });

  program
    .command('post')
    .description('이미지 게시물 발행')
    .argument('<images...>', '이미지 파일 (순서대로 업로드)')
    .option('-t, --title <title>', '제목')
    .option('-d, --description <text>', '설명')
    .option('--hotspot <word>', '연결할 热点 키워드')
    .option('--music', '추천 음악 선택 (기본)')
    .option('--no-music', '음악 선택 건너뛰기')
    .option('--debug', '발행 직전 멈추고 Enter 입력을 기다림', false)
    .option('--profileDir <path>', 'Chrome 프로필 디렉토리 (기본: DOUYIN_PROFILE_DIR)')
    .option('--cdpEndpoint <url>', 'CDP endpoint (기본: DOUYIN_CDP_ENDPOINT)')
    .action(async (images: string[], opts: PostCommandOptions) => {
      process.exitCode = await runPost(images, opts);
    });

  program
    .command('share')
    .description('제목+본문으로 표지, 음성, 영상을 만들고 (--post 시) 동영상으로 발행')
    .argument('[title]', '영상 제목 (표지 문구)')
    .argument('[content]', '본문 (TTS 문구)')
    .option('-f, --from-file <file>', '첫 줄 제목, 나머지 본문인 텍스트 파일')
    .option('--post', '생성 후 바로 발행', false)
    .option('--hotspot <word>', '연결할 热点 키워드')
    .option('--voice <voice>', 'TTS 음성')
    .option('--no-sanitize', '플랫폼 이름/@계정 제거 건너뛰기')
    .option('--debug', '발행 직전 멈추고 Enter 입력을 기다림', false)
    .option('--profileDir <path>', 'Chrome 프로필 디렉토리 (기본: DOUYIN_PROFILE_DIR)')
    .option('--cdpEndpoint <url>', 'CDP endpoint (기본: DOUYIN_CDP_ENDPOINT)')
    .action(async (title: string | undefined, content: string | undefined, opts: ShareCommandOptions) => {
      process.exitCode = await runShare(title, content, opts);
    });

  return program;
}

async function main(argv: string[]): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    printDiagnosis(classifyExecutionFailure(error));
    log.error(`실행 실패: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof Error && error.stack) log.error(error.stack);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main(process.argv);
}
