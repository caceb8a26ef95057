import * as path from 'path';
import * as log from '../utils/logger';
import { AUDIO_FILENAME, createPostFolder, VIDEO_FILENAME } from '../utils/post_folder';
import { sanitizeContent, type ShareText } from '../utils/share_content';
import { renderCover } from './cover';
import { synthesizeSpeech } from './tts';
import { composeVideo } from './video';

export type ShareVideoInput = ShareText & {
  dataDir: string;
  voice: string;
  /** false면 플랫폼 이름/@계정을 지우지 않는다 */
  sanitize: boolean;
  now?: Date;
};

export type ShareVideoArtifacts = ShareText & {
  dir: string;
  coverPath: string;
  audioPath: string;
  videoPath: string;
};

export type ShareVideoDeps = {
  renderCover: (text: string, outputPath: string) => Promise<string>;
  synthesizeSpeech: (text: string, voice: string, outputPath: string) => string;
  composeVideo: (imagePath: string, audioPath: string, outputPath: string) => string;
};

const DEFAULT_DEPS: ShareVideoDeps = {
  renderCover,
  synthesizeSpeech: (text, voice, outputPath) => synthesizeSpeech(text, voice, outputPath),
  composeVideo: (imagePath, audioPath, outputPath) => composeVideo(imagePath, audioPath, outputPath),
};

/**
 * 게시물 폴더 하나에 표지(cover.png), 음성(audio.mp3), 영상(video.mp4)을 차례로 만든다.
 * 표지는 제목만, 음성은 본문 전체로 만든다.
 */
export async function buildShareVideo(
  input: ShareVideoInput,
  deps: ShareVideoDeps = DEFAULT_DEPS,
): Promise<ShareVideoArtifacts> {
  const title = input.sanitize ? sanitizeContent(input.title) : input.title;
  const content = input.sanitize ? sanitizeContent(input.content) : input.content;

  const folder = createPostFolder(`${title}\n${content}`, input.dataDir, input.now);
  const coverPath = await deps.renderCover(title, folder.coverPath);
  const audioPath = deps.synthesizeSpeech(content, input.voice, path.join(folder.dir, AUDIO_FILENAME));
  const videoPath = deps.composeVideo(coverPath, audioPath, path.join(folder.dir, VIDEO_FILENAME));

  log.info(`[share] dir=${folder.dir} video=${videoPath}`);
  return { title, content, dir: folder.dir, coverPath, audioPath, videoPath };
}
